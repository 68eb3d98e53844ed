import { DEFAULT_COST_PER_TONNE_USD } from "../optimizer/loadShift.js";

export interface OffsetProject {
    project: string;
    share: number;
}

export interface OffsetEstimate {
    tonnes: number;
    pricePerTonne: number;
    costUSD: number;
    mix: OffsetProject[];
}

/** Illustrative portfolio, shares sum to 1. */
export const OFFSET_MIX: readonly OffsetProject[] = Object.freeze([
    { project: "Reforestation", share: 0.4 },
    { project: "Renewable Energy", share: 0.35 },
    { project: "Cookstoves", share: 0.25 },
]);

function toEstimate(kg: number, pricePerTonne: number): OffsetEstimate {
    const tonnes = Math.max(0, Number.isFinite(kg) ? kg : 0) / 1000;
    return {
        tonnes,
        pricePerTonne,
        costUSD: tonnes * pricePerTonne,
        mix: OFFSET_MIX.map((p) => ({ ...p })),
    };
}

export function estimateOffsets(
    kgToday: number,
    kgWeek?: number,
    pricePerTonneUSD: number = DEFAULT_COST_PER_TONNE_USD,
): { today: OffsetEstimate; week?: OffsetEstimate } {
    const today = toEstimate(kgToday, pricePerTonneUSD);
    if (kgWeek === undefined) {
        return { today };
    }
    return { today, week: toEstimate(kgWeek, pricePerTonneUSD) };
}
