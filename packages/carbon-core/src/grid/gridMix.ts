import { UnknownRegionError } from "../errors.js";
import type { GridMix, IntensityBasis, LogLevel, ReferenceData, Region, RegionMeta } from "../types.js";

/** Region substituted when a caller asks for an unknown one. */
export const DEFAULT_REGION = "EU-avg";

/** Upper bound of the renewable slider; larger values saturate. */
export const MAX_RENEWABLE_ADJUST = 0.8;

/** Approximate life-cycle intensity per generation source, kg CO2/kWh. */
export const SOURCE_INTENSITIES: Readonly<Record<string, number>> = Object.freeze({
    coal: 0.9,
    gas: 0.45,
    oil: 0.7,
    nuclear: 0.012,
    hydro: 0.01,
    wind: 0.01,
    solar: 0.05,
    biomass: 0.1,
    geothermal: 0.038,
});

export interface ResolveOptions {
    basis?: IntensityBasis;
}

export interface EffectiveElectricityFactor {
    regionCode: string;
    baseFactor: number;
    impliedIntensity: number;
    basis: IntensityBasis;
    // value of the selected basis before renewable scaling
    factor: number;
    renewableAdjust: number;
    effectiveFactor: number;
    meta: RegionMeta;
}

export interface FallbackResolution extends EffectiveElectricityFactor {
    requestedRegion: string;
    fallbackUsed: boolean;
}

export interface RegionSummary {
    code: string;
    baseFactor: number;
    impliedIntensity: number;
    meta: RegionMeta;
}

export function clampRenewableAdjust(r: number | null | undefined): number {
    if (typeof r !== "number" || !Number.isFinite(r) || r <= 0) return 0;
    if (r > MAX_RENEWABLE_ADJUST) return MAX_RENEWABLE_ADJUST;
    return r;
}

/**
 * Σ share × source intensity. Unknown sources and non-positive shares contribute nothing.
 */
export function impliedIntensity(mix: GridMix): number {
    let total = 0;
    for (const [source, share] of Object.entries(mix)) {
        if (!Number.isFinite(share) || share <= 0) continue;
        const intensity = SOURCE_INTENSITIES[source.toLowerCase()];
        if (intensity === undefined) continue;
        total += share * intensity;
    }
    return total;
}

export function getRegion(data: ReferenceData, regionCode: string): Region {
    const region = data.regions.get(regionCode.trim());
    if (!region) {
        throw new UnknownRegionError(regionCode);
    }
    return region;
}

/** Mix of a region, rescaled so the shares sum to exactly 1. */
export function getGridMix(data: ReferenceData, regionCode: string): GridMix {
    const { gridMix } = getRegion(data, regionCode);
    const total = Object.values(gridMix).reduce((acc, v) => acc + v, 0);
    if (total <= 0) return { ...gridMix };

    const out: Record<string, number> = {};
    for (const [source, share] of Object.entries(gridMix)) {
        out[source] = share / total;
    }
    return out;
}

export function getRegionMeta(data: ReferenceData, regionCode: string | null | undefined): RegionMeta & { regionCode: string } {
    const region = regionCode ? data.regions.get(regionCode.trim()) : undefined;
    if (!region) {
        return { source: "Default factors", version: "n/a", url: "", regionCode: regionCode || "default" };
    }
    return { ...region.meta, regionCode: region.code };
}

export function listRegions(data: ReferenceData): RegionSummary[] {
    return [...data.regions.values()]
        .map((region) => ({
            code: region.code,
            baseFactor: region.baseFactor,
            impliedIntensity: impliedIntensity(region.gridMix),
            meta: { ...region.meta },
        }))
        .sort((a, b) => a.code.localeCompare(b.code));
}

export function resolve(
    data: ReferenceData,
    regionCode: string,
    renewableAdjust?: number | null,
    options: ResolveOptions = {},
): EffectiveElectricityFactor {
    const region = getRegion(data, regionCode);
    const basis = options.basis ?? "base";
    const implied = impliedIntensity(region.gridMix);
    const factor = basis === "implied" ? implied : region.baseFactor;
    const r = clampRenewableAdjust(renewableAdjust);

    return {
        regionCode: region.code,
        baseFactor: region.baseFactor,
        impliedIntensity: implied,
        basis,
        factor,
        renewableAdjust: r,
        effectiveFactor: factor * (1 - r),
        meta: { ...region.meta },
    };
}

export interface RegionLookup {
    requestedRegion: string;
    regionCode: string;
    fallbackUsed: boolean;
}

/**
 * Code of the region that `resolveOrDefault` charges: the requested one when known,
 * otherwise `DEFAULT_REGION`.
 */
export function lookupRegionCode(data: ReferenceData, regionCode: string | null | undefined, log?: LogLevel): RegionLookup {
    const requestedRegion = regionCode?.trim() || DEFAULT_REGION;
    if (data.regions.has(requestedRegion)) {
        return { requestedRegion, regionCode: requestedRegion, fallbackUsed: false };
    }
    if (log === "debug") {
        console.warn(`[gridMix] unknown region '${requestedRegion}', falling back to ${DEFAULT_REGION}`);
    }
    return { requestedRegion, regionCode: DEFAULT_REGION, fallbackUsed: true };
}

/**
 * Same as `resolve`, but an unknown region is replaced by `DEFAULT_REGION`.
 */
export function resolveOrDefault(
    data: ReferenceData,
    regionCode: string | null | undefined,
    renewableAdjust?: number | null,
    options: ResolveOptions & { log?: LogLevel } = {},
): FallbackResolution {
    const { requestedRegion, regionCode: code, fallbackUsed } = lookupRegionCode(data, regionCode, options.log);
    return { ...resolve(data, code, renewableAdjust, options), requestedRegion, fallbackUsed };
}
