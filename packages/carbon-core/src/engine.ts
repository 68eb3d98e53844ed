import { calculate, type CalculateOptions, type EmissionsResult } from "./emissions/calculator.js";
import {
    type EffectiveElectricityFactor,
    type FallbackResolution,
    clampRenewableAdjust,
    lookupRegionCode,
    resolve,
} from "./grid/gridMix.js";
import { buildProfileDetails, type ProfileDetails } from "./intensity/hourlyProfile.js";
import { parseSeason } from "./intensity/seasons.js";
import { annualize, type AnnualProjection, compare, evaluate, type TaskComparison, type TaskEvaluation, topNLowHours } from "./optimizer/loadShift.js";
import { getReferenceData } from "./reference/referenceData.js";
import type { ActivityEntry, IntensityBasis, IntensityProfile, LogLevel, RawActivityEntry, ReferenceData, Season, Task } from "./types.js";

export interface CarbonEngineOptions {
    basis?: IntensityBasis;
    strict?: boolean;
    log?: LogLevel;
}

/** Entries kept per memo table; the oldest is evicted first. */
export const MEMO_LIMIT = 512;

export interface DailyEstimate extends EmissionsResult {
    electricity: FallbackResolution;
}

function remember<V>(memo: Map<string, V>, key: string, value: V): V {
    if (memo.size >= MEMO_LIMIT) {
        const oldest = memo.keys().next();
        if (!oldest.done) memo.delete(oldest.value);
    }
    memo.set(key, value);
    return value;
}

/**
 * Engine bound to one set of reference tables.
 * Resolutions and profiles are memoized by resolved region, clamped slider and season,
 * so requests that fall back to the default region share one entry.
 */
export class CarbonEngine {
    readonly data: ReferenceData;
    readonly basis: IntensityBasis;
    readonly strict: boolean;
    readonly log: LogLevel;

    private readonly resolutions = new Map<string, FallbackResolution>();
    private readonly profiles = new Map<string, ProfileDetails>();

    constructor(data: ReferenceData, options: CarbonEngineOptions = {}) {
        this.data = data;
        this.basis = options.basis ?? "base";
        this.strict = options.strict ?? false;
        this.log = options.log ?? "silent";
    }

    /** Throws UnknownRegionError. */
    resolve(regionCode: string, renewableAdjust?: number | null): EffectiveElectricityFactor {
        return resolve(this.data, regionCode, renewableAdjust, { basis: this.basis });
    }

    /** Falls back to the default region. */
    resolveOrDefault(regionCode: string | null | undefined, renewableAdjust?: number | null): FallbackResolution {
        const lookup = lookupRegionCode(this.data, regionCode, this.log);
        const r = clampRenewableAdjust(renewableAdjust);
        const key = `${lookup.regionCode}|${r}`;

        const resolved = this.resolutions.get(key) ?? remember(
            this.resolutions,
            key,
            Object.freeze({ ...resolve(this.data, lookup.regionCode, r, { basis: this.basis }), requestedRegion: lookup.regionCode, fallbackUsed: false }),
        );
        if (!lookup.fallbackUsed) return resolved;
        return Object.freeze({ ...resolved, requestedRegion: lookup.requestedRegion, fallbackUsed: true });
    }

    calculate(entry: RawActivityEntry, effectiveElectricityFactor: number, options: CalculateOptions = {}): EmissionsResult {
        return calculate(this.data, entry, effectiveElectricityFactor, { strict: options.strict ?? this.strict });
    }

    /** Region and renewable slider resolved, then the entry charged. */
    estimateDay(entry: ActivityEntry, regionCode?: string | null, renewableAdjust?: number | null): DailyEstimate {
        const electricity = this.resolveOrDefault(regionCode, renewableAdjust);
        return { ...this.calculate(entry, electricity.effectiveFactor), electricity };
    }

    profileDetails(regionCode: string | null | undefined, season: Season | string, renewableAdjust?: number | null): ProfileDetails {
        const parsedSeason = parseSeason(season);
        const lookup = lookupRegionCode(this.data, regionCode, this.log);
        const r = clampRenewableAdjust(renewableAdjust);
        const key = `${lookup.regionCode}|${parsedSeason}|${r}`;

        const details = this.profiles.get(key) ?? remember(
            this.profiles,
            key,
            buildProfileDetails(this.data, lookup.regionCode, parsedSeason, { basis: this.basis, renewableAdjust: r }),
        );
        return { ...details, fallbackUsed: lookup.fallbackUsed, profile: [...details.profile] };
    }

    /** Entries currently held by the resolution and profile memos. */
    memoSizes(): { resolutions: number; profiles: number } {
        return { resolutions: this.resolutions.size, profiles: this.profiles.size };
    }

    buildProfile(regionCode: string | null | undefined, season: Season | string, renewableAdjust?: number | null): IntensityProfile {
        return this.profileDetails(regionCode, season, renewableAdjust).profile;
    }

    evaluate(profile: IntensityProfile, task: Task): TaskEvaluation {
        return evaluate(profile, task);
    }

    compare(profile: IntensityProfile, tasks: readonly Task[]): TaskComparison {
        return compare(profile, tasks);
    }

    annualize(profile: IntensityProfile, dailyKwh: number, currentHour: number, costPerTonneUSD?: number): AnnualProjection {
        return annualize(profile, dailyKwh, currentHour, costPerTonneUSD);
    }

    topNLowHours(profile: IntensityProfile, n: number): number[] {
        return topNLowHours(profile, n);
    }
}

export async function createCarbonEngine(options: CarbonEngineOptions & { data?: ReferenceData } = {}): Promise<CarbonEngine> {
    const data = options.data ?? await getReferenceData();
    return new CarbonEngine(data, options);
}
