export * from "./types.js";
export * from "./errors.js";

export {
    DEFAULT_DATA_DIR,
    MIX_SUM_TOLERANCE,
    REFERENCE_FILES,
    getReferenceData,
    loadReferenceData,
    normalizeCurve,
    parseReferenceData,
} from "./reference/referenceData.js";
export type { RawReferenceTables } from "./reference/referenceData.js";

export {
    DEFAULT_REGION,
    MAX_RENEWABLE_ADJUST,
    SOURCE_INTENSITIES,
    clampRenewableAdjust,
    getGridMix,
    getRegion,
    getRegionMeta,
    impliedIntensity,
    listRegions,
    lookupRegionCode,
    resolve,
    resolveOrDefault,
} from "./grid/gridMix.js";
export type { EffectiveElectricityFactor, FallbackResolution, RegionLookup, RegionSummary, ResolveOptions } from "./grid/gridMix.js";

export { calculate, calculateWithTableFactors, normalizeActivityName, normalizeEntry } from "./emissions/calculator.js";
export type { CalculateOptions, EmissionsResult } from "./emissions/calculator.js";

export { isSeason, parseSeason } from "./intensity/seasons.js";
export { FLAT_TEMPLATE, SEASON_DEFAULT_TEMPLATES, SHAPE_RULES, selectShape } from "./intensity/shapeRules.js";
export type { ShapeRule, ShapeRuleId, ShapeSelection } from "./intensity/shapeRules.js";
export { buildProfile, buildProfileDetails } from "./intensity/hourlyProfile.js";
export type { ProfileDetails, ProfileOptions } from "./intensity/hourlyProfile.js";

export {
    DAYS_PER_MONTH,
    DAYS_PER_YEAR,
    DEFAULT_COST_PER_TONNE_USD,
    annualize,
    compare,
    evaluate,
    optimalHour,
    topNLowHours,
} from "./optimizer/loadShift.js";
export type { AnnualProjection, TaskComparison, TaskEvaluation } from "./optimizer/loadShift.js";

export {
    deviceDailyKwh,
    electricityFromDevices,
    estimateDeviceUsage,
    getDevicePreset,
    listDevicePresetsByCategory,
    seasonalHours,
} from "./devices/devicePresets.js";
export type { DeviceSelection, DeviceUsage } from "./devices/devicePresets.js";

export { CATEGORY_BASELINES, CATEGORY_WEIGHTS, badgeFor, categoryScore, efficiencyScore } from "./insights/efficiency.js";
export type { EfficiencyBadge, EfficiencyScore } from "./insights/efficiency.js";
export { OFFSET_MIX, estimateOffsets } from "./insights/offsets.js";
export type { OffsetEstimate, OffsetProject } from "./insights/offsets.js";
export { forecastNext7, weeklyGoalPlan } from "./insights/forecast.js";
export type { WeeklyGoalPlan } from "./insights/forecast.js";
export { findInvalidFields, hasMeaningfulInput } from "./insights/inputScreening.js";

export { CarbonEngine, MEMO_LIMIT, createCarbonEngine } from "./engine.js";
export type { CarbonEngineOptions, DailyEstimate } from "./engine.js";
