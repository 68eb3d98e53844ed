import { clampRenewableAdjust, createCarbonEngine, type CarbonEngine, type IntensityBasis, type Season, type Task, parseSeason } from "@gridshift/carbon-core";
import { type AppConfig, loadConfig } from "../../config/config.js";

/**
 * level : 0 | 1 | 2
 * 0 === results only
 * 1 === --verbose or -v (where each setting came from)
 * 2 === -vv or --debug (engine fallbacks are reported)
 */
export function extractVerbosity(args: string[]) {
    let level = 0;
    const rest: string[] = [];

    for (const arg of args) {
        if (arg === "--verbose" || arg === "-v") {
            level += 1;
            continue;
        }

        if (arg === "--debug") {
            level = Math.max(level, 2);
            continue;
        }

        if (/^-v{2,}$/.test(arg)) {
            level += arg.length - 1; // -vv
            continue;
        }

        rest.push(arg);
    }

    return { level, rest };
}

export function parsePositiveNumberFromCommand(name: string, v: string | undefined, fallback: number) {
    const n = v === undefined ? fallback : Number(v);
    if (!Number.isFinite(n) || n <= 0) {
        throw new Error(`${name} must be a positive number`);
    }
    return n;
}

export function parseNonNegativeNumberFromCommand(name: string, v: string | undefined, fallback: number) {
    const n = v === undefined ? fallback : Number(v);
    if (v === "" || !Number.isFinite(n) || n < 0) {
        throw new Error(`${name} must be a number >= 0`);
    }
    return n;
}

/** Any finite number is accepted; values outside the slider's range saturate. */
export function parseRenewableFromCommand(name: string, v: string | undefined, fallback: number) {
    const n = v === undefined ? fallback : Number(v);
    if (v?.trim() === "" || !Number.isFinite(n)) {
        throw new Error(`${name} must be a number`);
    }
    return clampRenewableAdjust(n);
}

export function parseHourFromCommand(name: string, v: string | undefined) {
    if (v === undefined) {
        throw new Error(`${name} is required`);
    }
    const n = Number(v);
    if (v.trim() === "" || !Number.isInteger(n) || n < 0 || n > 23) {
        throw new Error(`${name} must be an hour between 0 and 23`);
    }
    return n;
}

/**
 * ["electricity_kwh=10", "bus_km=4.5"] -> { electricity_kwh: 10, bus_km: 4.5 }
 * Repeated keys add up.
 */
export function parseEntryPairs(pairs: readonly string[]): Record<string, number> {
    const entry: Record<string, number> = {};
    for (const pair of pairs) {
        const eq = pair.indexOf("=");
        const key = eq > 0 ? pair.slice(0, eq).trim() : "";
        if (!key) {
            throw new Error(`--entry: expected key=value (got "${pair}")`);
        }
        const value = parseNonNegativeNumberFromCommand(`--entry ${key}`, pair.slice(eq + 1).trim(), 0);
        entry[key] = (entry[key] ?? 0) + value;
    }
    return entry;
}

/**
 * "name:kwh:hour". The name may itself contain colons.
 */
export function parseTaskSpec(spec: string): Task {
    const parts = spec.split(":");
    if (parts.length < 3) {
        throw new Error(`--task: expected name:kwh:hour (got "${spec}")`);
    }
    const hour = parts.pop();
    const kwh = parts.pop();
    const name = parts.join(":").trim();
    if (!name) {
        throw new Error(`--task: missing name in "${spec}"`);
    }
    return {
        name,
        kwh: parseNonNegativeNumberFromCommand(`--task ${name} kwh`, kwh, 0),
        hour: parseHourFromCommand(`--task ${name} hour`, hour),
    };
}

export function parseBasisFromCommand(v: string | undefined, fallback: IntensityBasis): IntensityBasis {
    if (v === undefined) return fallback;
    if (v === "base" || v === "implied") return v;
    throw new Error('--basis must be "base" or "implied"');
}

export type SettingSource = "cli" | "config" | "default";

export interface CommandSettings {
    region: string;
    renewableAdjust: number;
    season: Season;
    basis: IntensityBasis;
    costPerTonneUSD: number;
    config: AppConfig;
    configPath: string | null;
    sources: Record<"region" | "renewableAdjust" | "season" | "basis" | "costPerTonneUSD", SettingSource>;
}

export interface SettingFlags {
    config?: string;
    region?: string;
    renewable?: string;
    season?: string;
    basis?: string;
    cost?: string;
}

//CLIFLAGS > CONFIG > DEFAULT
export async function resolveSettings(flags: SettingFlags, cwd?: string): Promise<CommandSettings> {
    const { config, path, keys } = await loadConfig(flags.config, cwd);
    const fromFile = (key: keyof AppConfig): SettingSource => (keys.includes(key) ? "config" : "default");

    return {
        region: flags.region?.trim() || config.region,
        renewableAdjust: parseRenewableFromCommand("--renewable", flags.renewable, config.renewableAdjust),
        season: flags.season !== undefined ? parseSeason(flags.season) : config.season,
        basis: parseBasisFromCommand(flags.basis, config.intensityBasis),
        costPerTonneUSD: parseNonNegativeNumberFromCommand("--cost", flags.cost, config.costPerTonneUSD),
        config,
        configPath: path,
        sources: {
            region: flags.region?.trim() ? "cli" : fromFile("region"),
            renewableAdjust: flags.renewable !== undefined ? "cli" : fromFile("renewableAdjust"),
            season: flags.season !== undefined ? "cli" : fromFile("season"),
            basis: flags.basis !== undefined ? "cli" : fromFile("intensityBasis"),
            costPerTonneUSD: flags.cost !== undefined ? "cli" : fromFile("costPerTonneUSD"),
        },
    };
}

export function engineFor(settings: CommandSettings, verbosity: number): Promise<CarbonEngine> {
    return createCarbonEngine({ basis: settings.basis, log: verbosity >= 2 ? "debug" : "silent" });
}

export function printSources(settings: CommandSettings) {
    if (settings.configPath) console.log(`Config: ${settings.configPath}`);
    for (const [key, source] of Object.entries(settings.sources)) {
        console.log(`${key}: ${source.toUpperCase()}`);
    }
    console.log("");
}

export function formatHour(hour: number) {
    return `${String(hour).padStart(2, "0")}:00`;
}
