import { ReferenceDataError } from "../errors.js";
import { REFERENCE_FILES } from "../reference/referenceData.js";
import { getRegion, resolve, resolveOrDefault } from "../grid/gridMix.js";
import type { IntensityBasis, IntensityProfile, LogLevel, ReferenceData, Season, ShapeTemplate } from "../types.js";
import { parseSeason } from "./seasons.js";
import { FLAT_TEMPLATE, type ShapeRuleId, selectShape } from "./shapeRules.js";

export interface ProfileOptions {
    basis?: IntensityBasis;
    renewableAdjust?: number | null;
    // substitute the default region instead of throwing UnknownRegionError
    fallback?: boolean;
    log?: LogLevel;
}

export interface ProfileDetails {
    regionCode: string;
    fallbackUsed: boolean;
    season: Season;
    rule: ShapeRuleId;
    template: string;
    // kg CO2/kWh the normalized template is scaled to
    scale: number;
    profile: number[];
}

function templateCurve(template: ShapeTemplate, season: Season): readonly number[] {
    return template.seasons[season] ?? template.curve;
}

function findTemplate(data: ReferenceData, name: string): ShapeTemplate {
    const template = data.shapes.get(name) ?? data.shapes.get(FLAT_TEMPLATE);
    if (!template) {
        throw new ReferenceDataError(REFERENCE_FILES.shapes, `missing template "${name}" and no "${FLAT_TEMPLATE}" fallback`);
    }
    return template;
}

export function buildProfileDetails(
    data: ReferenceData,
    regionCode: string,
    season: Season | string,
    options: ProfileOptions = {},
): ProfileDetails {
    const parsedSeason = parseSeason(season);
    const resolved = options.fallback
        ? resolveOrDefault(data, regionCode, options.renewableAdjust, { basis: options.basis, log: options.log })
        : { ...resolve(data, regionCode, options.renewableAdjust, { basis: options.basis }), fallbackUsed: false };

    const region = getRegion(data, resolved.regionCode);
    const selection = selectShape(region.gridMix, parsedSeason);
    const template = findTemplate(data, selection.template);
    const scale = resolved.effectiveFactor;

    return {
        regionCode: resolved.regionCode,
        fallbackUsed: resolved.fallbackUsed,
        season: parsedSeason,
        rule: selection.rule,
        template: template.name,
        scale,
        profile: templateCurve(template, parsedSeason).map((v) => v * scale),
    };
}

export function buildProfile(
    data: ReferenceData,
    regionCode: string,
    season: Season | string,
    options: ProfileOptions = {},
): IntensityProfile {
    return buildProfileDetails(data, regionCode, season, options).profile;
}
