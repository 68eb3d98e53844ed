export type CarbonErrorCode =
    | "unknown_region"
    | "invalid_season"
    | "invalid_quantity"
    | "unknown_activity"
    | "invalid_hour"
    | "invalid_profile"
    | "unknown_device"
    | "invalid_reference_data";

export class CarbonEngineError extends Error {
    readonly code: CarbonErrorCode;

    constructor(code: CarbonErrorCode, message: string) {
        super(message);
        this.name = new.target.name;
        this.code = code;
    }
}

export class UnknownRegionError extends CarbonEngineError {
    readonly regionCode: string;

    constructor(regionCode: string) {
        super("unknown_region", `Unknown region: ${regionCode}`);
        this.regionCode = regionCode;
    }
}

export class InvalidSeasonError extends CarbonEngineError {
    readonly season: string;

    constructor(season: string) {
        super("invalid_season", `Invalid season: "${season}" (expected Spring, Summer, Autumn or Winter)`);
        this.season = season;
    }
}

export class InvalidQuantityError extends CarbonEngineError {
    readonly field: string;
    readonly value: unknown;

    constructor(field: string, value: unknown) {
        super("invalid_quantity", `${field} must be a finite number >= 0 (got ${String(value)})`);
        this.field = field;
        this.value = value;
    }
}

export class UnknownActivityError extends CarbonEngineError {
    readonly activity: string;

    constructor(activity: string) {
        super("unknown_activity", `Unknown activity: ${activity}`);
        this.activity = activity;
    }
}

export class InvalidHourError extends CarbonEngineError {
    readonly hour: unknown;

    constructor(hour: unknown) {
        super("invalid_hour", `hour must be an integer in 0..23 (got ${String(hour)})`);
        this.hour = hour;
    }
}

export class InvalidProfileError extends CarbonEngineError {
    constructor(reason: string) {
        super("invalid_profile", `Invalid intensity profile: ${reason}`);
    }
}

export class UnknownDeviceError extends CarbonEngineError {
    readonly device: string;

    constructor(device: string) {
        super("unknown_device", `Unknown device preset: ${device}`);
        this.device = device;
    }
}

export class ReferenceDataError extends CarbonEngineError {
    readonly file: string;
    readonly reason: string;

    constructor(file: string, reason: string, detail?: string) {
        super("invalid_reference_data", `${file}: ${reason}${detail ? ` (${detail})` : ""}`);
        this.file = file;
        this.reason = reason;
    }
}
