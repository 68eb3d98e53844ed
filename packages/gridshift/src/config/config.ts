import path from "node:path";
import process from "node:process";
import { errorMessage, isPlainObject, readJsonFile } from "@gridshift/shared";
import {
    DEFAULT_COST_PER_TONNE_USD,
    DEFAULT_REGION,
    type IntensityBasis,
    clampRenewableAdjust,
    type Season,
    parseSeason,
} from "@gridshift/carbon-core";

export const DEFAULT_CONFIG_FILE = "gridshift.config.json";

export interface ServerConfig {
    port: number;
    host: string;
}

export interface AppConfig {
    region: string;
    renewableAdjust: number;
    intensityBasis: IntensityBasis;
    costPerTonneUSD: number;
    season: Season;
    server: ServerConfig;
}

export interface LoadedConfig {
    config: AppConfig;
    // null when no file was found and defaults apply
    path: string | null;
    // top-level keys set by the file
    keys: string[];
}

export function defaultConfig(): AppConfig {
    return {
        region: DEFAULT_REGION,
        renewableAdjust: 0,
        intensityBasis: "base",
        costPerTonneUSD: DEFAULT_COST_PER_TONNE_USD,
        season: "Summer",
        server: { port: 3000, host: "127.0.0.1" },
    };
}

function invalid(key: string, expected: string, value: unknown): Error {
    return new Error(`[config] ${key}: expected ${expected} (got ${JSON.stringify(value)})`);
}

function readString(obj: Record<string, unknown>, key: string, fallback: string, where = key): string {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== "string" || value.trim() === "") {
        throw invalid(where, "a non-empty string", value);
    }
    return value.trim();
}

function readNumber(
    obj: Record<string, unknown>,
    key: string,
    fallback: number,
    accept: (n: number) => boolean,
    expected: string,
    where = key,
): number {
    const value = obj[key];
    if (value === undefined) return fallback;
    if (typeof value !== "number" || !Number.isFinite(value) || !accept(value)) {
        throw invalid(where, expected, value);
    }
    return value;
}

function readBasis(value: unknown, fallback: IntensityBasis): IntensityBasis {
    if (value === undefined) return fallback;
    if (value === "base" || value === "implied") return value;
    throw invalid("intensityBasis", '"base" or "implied"', value);
}

function readSeason(value: unknown, fallback: Season): Season {
    if (value === undefined) return fallback;
    if (typeof value !== "string") throw invalid("season", "a season name", value);
    try {
        return parseSeason(value);
    } catch (error) {
        throw new Error(`[config] season: ${errorMessage(error)}`);
    }
}

/**
 * Validate a parsed config object. Missing keys take their defaults, unknown keys are ignored.
 */
export function parseConfig(raw: unknown): AppConfig {
    if (!isPlainObject(raw)) {
        throw new Error("[config]: invalid JSON object");
    }
    const defaults = defaultConfig();

    let server: Record<string, unknown> = {};
    if (raw.server !== undefined) {
        if (!isPlainObject(raw.server)) throw invalid("server", "an object", raw.server);
        server = raw.server;
    }

    return {
        region: readString(raw, "region", defaults.region),
        renewableAdjust: clampRenewableAdjust(readNumber(raw, "renewableAdjust", defaults.renewableAdjust, () => true, "a number")),
        intensityBasis: readBasis(raw.intensityBasis, defaults.intensityBasis),
        costPerTonneUSD: readNumber(raw, "costPerTonneUSD", defaults.costPerTonneUSD, (n) => n >= 0, "a number >= 0"),
        season: readSeason(raw.season, defaults.season),
        server: {
            port: readNumber(server, "port", defaults.server.port, (n) => Number.isInteger(n) && n > 0 && n <= 65535, "a port number", "server.port"),
            host: readString(server, "host", defaults.server.host, "server.host"),
        },
    };
}

/**
 * Load `configPath`, or `gridshift.config.json` from `cwd` when no path is given.
 * Only the default file may be absent.
 */
export async function loadConfig(configPath?: string, cwd: string = process.cwd()): Promise<LoadedConfig> {
    const file = path.resolve(cwd, configPath ?? DEFAULT_CONFIG_FILE);
    const result = await readJsonFile(file);

    if (!result.ok) {
        if (result.error === "file_not_found") {
            if (configPath === undefined) return { config: defaultConfig(), path: null, keys: [] };
            throw new Error(`[--config]: no such file ${file}`);
        }
        if (result.error === "invalid_json") {
            throw new Error(`[--config]: invalid JSON in ${file} (${result.detail})`);
        }
        throw new Error(`[--config]: cannot read ${file} (${result.error})`);
    }

    const config = parseConfig(result.value);
    return { config, path: file, keys: isPlainObject(result.value) ? Object.keys(result.value) : [] };
}
