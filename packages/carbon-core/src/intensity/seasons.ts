import { InvalidSeasonError } from "../errors.js";
import { SEASONS, type Season } from "../types.js";

const ALIASES: Readonly<Record<string, Season>> = {
    fall: "Autumn",
};

/**
 * Case-insensitive season parsing; "fall" is read as Autumn.
 */
export function parseSeason(value: string): Season {
    const key = value.trim().toLowerCase();
    const season = SEASONS.find((s) => s.toLowerCase() === key) ?? ALIASES[key];
    if (!season) {
        throw new InvalidSeasonError(value);
    }
    return season;
}

export function isSeason(value: unknown): value is Season {
    return SEASONS.some((s) => s === value);
}
