import { InvalidQuantityError, UnknownActivityError } from "../errors.js";
import { type ActivityEntry, CATEGORIES, type Category, ELECTRICITY_ACTIVITY, type RawActivityEntry, type ReferenceData } from "../types.js";

export interface CalculateOptions {
    // unknown activity identifiers raise instead of being skipped
    strict?: boolean;
}

export interface EmissionsResult {
    total: number;
    perActivity: Record<string, number>;
    perCategory: Record<Category, number>;
    // input keys that matched no activity (lenient mode only)
    ignored: string[];
}

/**
 * "Electricity (kWh)" -> "electricity_kwh"
 */
export function normalizeActivityName(key: string): string {
    return key
        .trim()
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, "_")
        .replace(/^_+|_+$/g, "");
}

export function emptyCategories(): Record<Category, number> {
    return { Energy: 0, Transport: 0, Meals: 0 };
}

export function sumCategories(perCategory: Record<Category, number>): number {
    let total = 0;
    for (const category of CATEGORIES) {
        total += perCategory[category];
    }
    return total;
}

function readQuantity(key: string, value: unknown): number {
    if (value === null || value === undefined) return 0;
    if (typeof value !== "number" || !Number.isFinite(value) || value < 0) {
        throw new InvalidQuantityError(key, value);
    }
    return value;
}

/**
 * Merge an entry onto canonical activity identifiers.
 * Keys normalizing to the same identifier add up.
 */
export function normalizeEntry(
    data: ReferenceData,
    entry: RawActivityEntry,
    options: CalculateOptions = {},
): { quantities: Map<string, number>; ignored: string[] } {
    const quantities = new Map<string, number>();
    const ignored: string[] = [];

    for (const [key, value] of Object.entries(entry)) {
        const id = normalizeActivityName(key);
        if (!data.activities.has(id)) {
            if (options.strict) throw new UnknownActivityError(key);
            ignored.push(key);
            continue;
        }
        const quantity = readQuantity(key, value);
        quantities.set(id, (quantities.get(id) ?? 0) + quantity);
    }

    return { quantities, ignored };
}

export function calculate(
    data: ReferenceData,
    entry: RawActivityEntry,
    effectiveElectricityFactor: number,
    options: CalculateOptions = {},
): EmissionsResult {
    if (!Number.isFinite(effectiveElectricityFactor) || effectiveElectricityFactor < 0) {
        throw new InvalidQuantityError("effectiveElectricityFactor", effectiveElectricityFactor);
    }

    const { quantities, ignored } = normalizeEntry(data, entry, options);
    const perActivity: Record<string, number> = {};
    const perCategory = emptyCategories();

    for (const [id, quantity] of quantities) {
        const activity = data.activities.get(id);
        if (!activity) continue;

        const factor = id === ELECTRICITY_ACTIVITY ? effectiveElectricityFactor : activity.factor;
        const kg = quantity * factor;
        perActivity[id] = kg;
        perCategory[activity.category] += kg;
    }

    return {
        total: sumCategories(perCategory),
        perActivity,
        perCategory,
        ignored,
    };
}

/** Emissions using the static table factor for electricity. */
export function calculateWithTableFactors(data: ReferenceData, entry: ActivityEntry): EmissionsResult {
    const electricity = data.activities.get(ELECTRICITY_ACTIVITY);
    return calculate(data, entry, electricity?.factor ?? 0);
}
