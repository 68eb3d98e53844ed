import type { GridMix, Season } from "../types.js";

export type ShapeRuleId = "solar_heavy" | "wind_heavy" | "coal_heavy" | "season_default";

export interface ShapeRule {
    id: Exclude<ShapeRuleId, "season_default">;
    template: string;
    matches(mix: GridMix): boolean;
}

export interface ShapeSelection {
    rule: ShapeRuleId;
    template: string;
}

function share(mix: GridMix, source: string): number {
    return mix[source] ?? 0;
}

/** Evaluated in order, first match wins. */
export const SHAPE_RULES: readonly ShapeRule[] = Object.freeze([
    { id: "solar_heavy", template: "solar_heavy", matches: (mix: GridMix) => share(mix, "solar") > 0.15 },
    { id: "wind_heavy", template: "wind_heavy", matches: (mix: GridMix) => share(mix, "wind") > 0.2 },
    { id: "coal_heavy", template: "coal_heavy", matches: (mix: GridMix) => share(mix, "coal") > 0.5 },
]);

export const SEASON_DEFAULT_TEMPLATES: Readonly<Record<Season, string>> = Object.freeze({
    Spring: "spring_solar",
    Summer: "evening_peak",
    Autumn: "autumn_transition",
    Winter: "winter_dual_peak",
});

export const FLAT_TEMPLATE = "flat";

export function selectShape(
    mix: GridMix,
    season: Season,
    rules: readonly ShapeRule[] = SHAPE_RULES,
): ShapeSelection {
    const rule = rules.find((r) => r.matches(mix));
    if (rule) {
        return { rule: rule.id, template: rule.template };
    }
    return { rule: "season_default", template: SEASON_DEFAULT_TEMPLATES[season] };
}
