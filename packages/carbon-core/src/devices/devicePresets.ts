import { InvalidQuantityError, UnknownDeviceError } from "../errors.js";
import type { DevicePreset, ReferenceData, Season } from "../types.js";

export interface DeviceSelection {
    name: string;
    // number of identical units, default 1
    quantity?: number;
    // overrides nominal/seasonal hours
    hours?: number;
}

export interface DeviceUsage {
    name: string;
    category: string;
    powerW: number;
    hours: number;
    quantity: number;
    kwh: number;
}

export function getDevicePreset(data: ReferenceData, name: string): DevicePreset {
    const preset = data.devices.get(name);
    if (!preset) {
        throw new UnknownDeviceError(name);
    }
    return preset;
}

export function listDevicePresetsByCategory(data: ReferenceData): Record<string, string[]> {
    const categories: Record<string, string[]> = {};
    for (const preset of data.devices.values()) {
        if (!categories[preset.category]) {
            categories[preset.category] = [];
        }
        categories[preset.category].push(preset.name);
    }
    return categories;
}

/** Seasonal usage override when the preset has one, nominal hours otherwise. */
export function seasonalHours(preset: DevicePreset, season?: Season): number {
    if (season) {
        const override = preset.seasonalHours[season];
        if (override !== undefined) return override;
    }
    return preset.hoursPerDay;
}

export function deviceDailyKwh(preset: DevicePreset, season?: Season, hoursOverride?: number): number {
    const hours = hoursOverride ?? seasonalHours(preset, season);
    if (!Number.isFinite(hours) || hours < 0) {
        throw new InvalidQuantityError(`${preset.name}.hours`, hours);
    }
    return (preset.powerW * hours) / 1000;
}

export function estimateDeviceUsage(
    data: ReferenceData,
    selections: readonly DeviceSelection[],
    season?: Season,
): DeviceUsage[] {
    return selections.map((selection) => {
        const preset = getDevicePreset(data, selection.name);
        const quantity = selection.quantity ?? 1;
        if (!Number.isFinite(quantity) || quantity < 0) {
            throw new InvalidQuantityError(`${selection.name}.quantity`, quantity);
        }
        const hours = selection.hours ?? seasonalHours(preset, season);
        return {
            name: preset.name,
            category: preset.category,
            powerW: preset.powerW,
            hours,
            quantity,
            kwh: deviceDailyKwh(preset, season, hours) * quantity,
        };
    });
}

/** Daily electricity (kWh) for a set of devices, ready for an ActivityEntry. */
export function electricityFromDevices(
    data: ReferenceData,
    selections: readonly DeviceSelection[],
    season?: Season,
): number {
    return estimateDeviceUsage(data, selections, season).reduce((acc, usage) => acc + usage.kwh, 0);
}
