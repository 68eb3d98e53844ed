export const SEASONS = ["Spring", "Summer", "Autumn", "Winter"] as const;
export type Season = typeof SEASONS[number];

export const CATEGORIES = ["Energy", "Transport", "Meals"] as const;
export type Category = typeof CATEGORIES[number];

export const ELECTRICITY_ACTIVITY = "electricity_kwh";

export const HOURS_PER_DAY = 24;

/** generation source -> share in [0, 1] */
export type GridMix = Readonly<Record<string, number>>;

export interface RegionMeta {
    source: string;
    version: string;
    url: string;
}

export interface Region {
    code: string;
    baseFactor: number; // kg CO2e / kWh
    gridMix: GridMix;
    meta: RegionMeta;
}

export interface ActivityFactor {
    id: string;
    factor: number; // kg CO2e / unit
    category: Category;
    unit: string;
}

export interface DevicePreset {
    name: string;
    powerW: number;
    hoursPerDay: number;
    category: string;
    seasonalHours: Readonly<Partial<Record<Season, number>>>;
}

export interface ShapeTemplate {
    name: string;
    description: string;
    // normalized to mean 1.0
    curve: readonly number[];
    seasons: Readonly<Partial<Record<Season, readonly number[]>>>;
}

export interface ReferenceData {
    regions: ReadonlyMap<string, Region>;
    activities: ReadonlyMap<string, ActivityFactor>;
    devices: ReadonlyMap<string, DevicePreset>;
    shapes: ReadonlyMap<string, ShapeTemplate>;
}

/** quantities keyed by activity identifier, one day */
export type ActivityEntry = Readonly<Record<string, number | null | undefined>>;

/** entry as received from a caller; only known activities are checked for a quantity */
export type RawActivityEntry = Readonly<Record<string, unknown>>;

/** 24 kg CO2/kWh values indexed by hour of day */
export type IntensityProfile = readonly number[];

export interface Task {
    name: string;
    kwh: number;
    hour: number;
}

export type IntensityBasis = "base" | "implied";

export type LogLevel = "silent" | "debug";
