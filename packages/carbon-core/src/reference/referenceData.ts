import path from "node:path";
import { fileURLToPath } from "node:url";
import { isPlainObject, readJsonFile } from "@gridshift/shared";
import { ReferenceDataError } from "../errors.js";
import {
    type ActivityFactor,
    CATEGORIES,
    type Category,
    type DevicePreset,
    type GridMix,
    HOURS_PER_DAY,
    type ReferenceData,
    type Region,
    SEASONS,
    type Season,
    type ShapeTemplate,
} from "../types.js";

export const DEFAULT_DATA_DIR = fileURLToPath(new URL("../../data/", import.meta.url));

export const REFERENCE_FILES = {
    regions: "regions.json",
    activities: "activities.json",
    devices: "devices.json",
    shapes: "shapes.json",
} as const;

/** tolerance on Σ grid mix shares */
export const MIX_SUM_TOLERANCE = 0.01;

const DEFAULT_META = { source: "Default factors", version: "n/a", url: "" };

export interface RawReferenceTables {
    regions: unknown;
    activities: unknown;
    devices: unknown;
    shapes: unknown;
}

function isNonNegative(n: unknown): n is number {
    return typeof n === "number" && Number.isFinite(n) && n >= 0;
}

function isCategory(value: unknown): value is Category {
    return CATEGORIES.some((c) => c === value);
}

function asSeason(value: string): Season | undefined {
    return SEASONS.find((s) => s === value);
}

function requireObject(file: string, value: unknown, where: string): Record<string, unknown> {
    if (!isPlainObject(value)) {
        throw new ReferenceDataError(file, `${where} must be an object`);
    }
    return value;
}

function requireNonNegative(file: string, value: unknown, where: string): number {
    if (!isNonNegative(value)) {
        throw new ReferenceDataError(file, `${where} must be a finite number >= 0`);
    }
    return value;
}

function optionalString(value: unknown, fallback: string): string {
    return typeof value === "string" ? value : fallback;
}

function deepFreeze<T extends object>(value: T): Readonly<T> {
    for (const key of Object.keys(value)) {
        const child: unknown = Reflect.get(value, key);
        if (typeof child === "object" && child !== null && !Object.isFrozen(child)) {
            deepFreeze(child);
        }
    }
    return Object.freeze(value);
}

export function parseRegions(raw: unknown): Map<string, Region> {
    const file = REFERENCE_FILES.regions;
    const table = requireObject(file, raw, "catalog");
    const regions = new Map<string, Region>();

    for (const [code, value] of Object.entries(table)) {
        const pack = requireObject(file, value, code);
        const factors = requireObject(file, pack.factors, `${code}.factors`);
        const baseFactor = requireNonNegative(file, factors.electricity_kwh, `${code}.factors.electricity_kwh`);

        const rawMix = requireObject(file, pack.grid_mix, `${code}.grid_mix`);
        const mix: Record<string, number> = {};
        let total = 0;
        for (const [source, share] of Object.entries(rawMix)) {
            const s = requireNonNegative(file, share, `${code}.grid_mix.${source}`);
            if (s > 1) {
                throw new ReferenceDataError(file, `${code}.grid_mix.${source} must be <= 1`);
            }
            const key = source.toLowerCase();
            mix[key] = (mix[key] ?? 0) + s;
            total += s;
        }
        if (Math.abs(total - 1) > MIX_SUM_TOLERANCE) {
            throw new ReferenceDataError(file, `${code}.grid_mix shares must sum to 1`, `sum=${total.toFixed(4)}`);
        }

        const meta = isPlainObject(pack.__meta__) ? pack.__meta__ : {};

        regions.set(code, deepFreeze({
            code,
            baseFactor,
            gridMix: mix satisfies GridMix,
            meta: {
                source: optionalString(meta.source, DEFAULT_META.source),
                version: optionalString(meta.version, DEFAULT_META.version),
                url: optionalString(meta.url, DEFAULT_META.url),
            },
        }));
    }

    if (regions.size === 0) {
        throw new ReferenceDataError(file, "catalog is empty");
    }
    return regions;
}

export function parseActivities(raw: unknown): Map<string, ActivityFactor> {
    const file = REFERENCE_FILES.activities;
    const table = requireObject(file, raw, "table");
    const activities = new Map<string, ActivityFactor>();

    for (const [id, value] of Object.entries(table)) {
        const entry = requireObject(file, value, id);
        const factor = requireNonNegative(file, entry.factor, `${id}.factor`);
        if (!isCategory(entry.category)) {
            throw new ReferenceDataError(file, `${id}.category must be one of ${CATEGORIES.join(", ")}`);
        }
        activities.set(id, deepFreeze({
            id,
            factor,
            category: entry.category,
            unit: optionalString(entry.unit, "unit"),
        }));
    }
    return activities;
}

function parseHours(file: string, value: unknown, where: string): number {
    const hours = requireNonNegative(file, value, where);
    if (hours > HOURS_PER_DAY) {
        throw new ReferenceDataError(file, `${where} must be <= ${HOURS_PER_DAY}`);
    }
    return hours;
}

export function parseDevices(raw: unknown): Map<string, DevicePreset> {
    const file = REFERENCE_FILES.devices;
    const table = requireObject(file, raw, "table");
    const devices = new Map<string, DevicePreset>();

    for (const [name, value] of Object.entries(table)) {
        const entry = requireObject(file, value, name);
        const seasonalHours: Partial<Record<Season, number>> = {};

        if (entry.seasonal_hours !== undefined) {
            const overrides = requireObject(file, entry.seasonal_hours, `${name}.seasonal_hours`);
            for (const [key, hours] of Object.entries(overrides)) {
                const season = asSeason(key);
                if (!season) {
                    throw new ReferenceDataError(file, `${name}.seasonal_hours has unknown season "${key}"`);
                }
                seasonalHours[season] = parseHours(file, hours, `${name}.seasonal_hours.${key}`);
            }
        }

        devices.set(name, deepFreeze({
            name,
            powerW: requireNonNegative(file, entry.power_w, `${name}.power_w`),
            hoursPerDay: parseHours(file, entry.hours_per_day, `${name}.hours_per_day`),
            category: optionalString(entry.category, "Other"),
            seasonalHours,
        }));
    }
    return devices;
}

/**
 * Scale a 24 point curve so that its mean is 1.0.
 * A curve whose mean is 0 becomes flat.
 */
export function normalizeCurve(curve: readonly number[]): number[] {
    const avg = curve.reduce((acc, v) => acc + v, 0) / curve.length;
    if (!(avg > 0)) {
        return curve.map(() => 1);
    }
    return curve.map((v) => v / avg);
}

function parseCurve(file: string, value: unknown, where: string): number[] {
    if (!Array.isArray(value) || value.length !== HOURS_PER_DAY) {
        throw new ReferenceDataError(file, `${where} must be an array of ${HOURS_PER_DAY} numbers`);
    }
    const curve = value.map((v, hour) => requireNonNegative(file, v, `${where}[${hour}]`));
    return normalizeCurve(curve);
}

export function parseShapes(raw: unknown): Map<string, ShapeTemplate> {
    const file = REFERENCE_FILES.shapes;
    const table = requireObject(file, raw, "table");
    const shapes = new Map<string, ShapeTemplate>();

    for (const [name, value] of Object.entries(table)) {
        const entry = requireObject(file, value, name);
        const seasons: Partial<Record<Season, number[]>> = {};

        if (entry.seasons !== undefined) {
            const variants = requireObject(file, entry.seasons, `${name}.seasons`);
            for (const [key, curve] of Object.entries(variants)) {
                const season = asSeason(key);
                if (!season) {
                    throw new ReferenceDataError(file, `${name}.seasons has unknown season "${key}"`);
                }
                seasons[season] = parseCurve(file, curve, `${name}.seasons.${key}`);
            }
        }

        shapes.set(name, deepFreeze({
            name,
            description: optionalString(entry.description, ""),
            curve: parseCurve(file, entry.curve, `${name}.curve`),
            seasons,
        }));
    }
    return shapes;
}

export function parseReferenceData(raw: RawReferenceTables): ReferenceData {
    return Object.freeze({
        regions: parseRegions(raw.regions),
        activities: parseActivities(raw.activities),
        devices: parseDevices(raw.devices),
        shapes: parseShapes(raw.shapes),
    });
}

async function readTable(dataDir: string, file: string): Promise<unknown> {
    const result = await readJsonFile(path.join(dataDir, file));
    if (!result.ok) {
        throw new ReferenceDataError(file, result.error, result.detail);
    }
    return result.value;
}

export async function loadReferenceData(dataDir: string = DEFAULT_DATA_DIR): Promise<ReferenceData> {
    const [regions, activities, devices, shapes] = await Promise.all([
        readTable(dataDir, REFERENCE_FILES.regions),
        readTable(dataDir, REFERENCE_FILES.activities),
        readTable(dataDir, REFERENCE_FILES.devices),
        readTable(dataDir, REFERENCE_FILES.shapes),
    ]);
    return parseReferenceData({ regions, activities, devices, shapes });
}

let bundled: Promise<ReferenceData> | null = null;

/** Bundled tables, read once per process. */
export function getReferenceData(): Promise<ReferenceData> {
    if (!bundled) {
        bundled = loadReferenceData().catch((error: unknown) => {
            bundled = null;
            throw error;
        });
    }
    return bundled;
}
