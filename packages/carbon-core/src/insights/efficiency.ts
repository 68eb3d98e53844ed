import { calculateWithTableFactors } from "../emissions/calculator.js";
import { type ActivityEntry, CATEGORIES, type Category, type ReferenceData } from "../types.js";

/** Reference daily emissions per category, kg CO2e. */
export const CATEGORY_BASELINES: Readonly<Record<Category, number>> = Object.freeze({
    Energy: 8,
    Transport: 6,
    Meals: 5,
});

export const CATEGORY_WEIGHTS: Readonly<Record<Category, number>> = Object.freeze({
    Energy: 0.45,
    Transport: 0.35,
    Meals: 0.2,
});

export type EfficiencyBadge = "Excellent" | "Good" | "Moderate" | "Needs improvement";

export interface EfficiencyScore {
    score: number;
    categoryScores: Record<Category, number>;
    badge: EfficiencyBadge;
    notes: string[];
}

const CATEGORY_NOTES: Readonly<Record<Category, string>> = {
    Energy: "Focus on electricity and gas usage: standby power, thermostat setpoints, efficient appliances.",
    Transport: "Shift trips to lower-carbon modes (walk, bike, transit) or consolidate car journeys.",
    Meals: "Try more plant-forward meals and reduce high-impact ingredients on heavy days.",
};

function clamp(x: number, min: number, max: number) {
    return Math.min(max, Math.max(min, x));
}

/**
 * 50..100 at or under baseline, dropping 70 points per baseline over it.
 */
export function categoryScore(kg: number, baseline: number): number {
    const ratio = kg / Math.max(0.1, baseline);
    const raw = ratio <= 1 ? 100 - ratio * 50 : 50 - (ratio - 1) * 70;
    return Math.round(clamp(raw, 0, 100));
}

export function badgeFor(score: number): EfficiencyBadge {
    if (score >= 85) return "Excellent";
    if (score >= 70) return "Good";
    if (score >= 50) return "Moderate";
    return "Needs improvement";
}

export function efficiencyScore(data: ReferenceData, entry: ActivityEntry): EfficiencyScore {
    const { perCategory } = calculateWithTableFactors(data, entry);

    const categoryScores = { Energy: 0, Transport: 0, Meals: 0 };
    let overall = 0;
    let worst: Category = CATEGORIES[0];

    for (const category of CATEGORIES) {
        const s = categoryScore(perCategory[category], CATEGORY_BASELINES[category]);
        categoryScores[category] = s;
        overall += CATEGORY_WEIGHTS[category] * s;
        if (s < categoryScores[worst]) worst = category;
    }

    const score = Math.round(clamp(overall, 0, 100));
    return {
        score,
        categoryScores,
        badge: badgeFor(score),
        notes: [CATEGORY_NOTES[worst]],
    };
}
