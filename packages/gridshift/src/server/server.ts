import fastify, { type FastifyInstance } from "fastify";
import {
    type CarbonEngine,
    CarbonEngineError,
    type Task,
    getGridMix,
    listDevicePresetsByCategory,
    listRegions,
    type RawActivityEntry,
} from "@gridshift/carbon-core";
import { type AppConfig, defaultConfig } from "../config/config.js";

export type ServerDefaults = Pick<AppConfig, "region" | "renewableAdjust" | "season" | "costPerTonneUSD">;

export interface ServerOptions {
    logger?: boolean;
    defaults?: ServerDefaults;
}

interface GridQuery {
    region?: string;
    season?: string;
    renewableAdjust?: number;
}

interface EmissionsBody {
    entry: RawActivityEntry;
    region?: string;
    renewableAdjust?: number;
    strict?: boolean;
}

interface ProfileQuery extends GridQuery {
    top?: number;
}

interface OptimizeBody extends GridQuery {
    tasks: Task[];
}

interface AnnualizeBody extends GridQuery {
    kwh: number;
    hour: number;
    costPerTonneUSD?: number;
}

const gridProperties = {
    region: { type: "string" },
    season: { type: "string" },
    renewableAdjust: { type: "number" },
} as const;

const emissionsSchema = {
    body: {
        type: "object",
        required: ["entry"],
        properties: {
            // quantities are checked by the calculator; unknown keys pass through and are ignored
            entry: { type: "object" },
            region: { type: "string" },
            renewableAdjust: { type: "number" },
            strict: { type: "boolean" },
        },
    },
} as const;

const profileSchema = {
    querystring: {
        type: "object",
        properties: { ...gridProperties, top: { type: "integer", minimum: 1 } },
    },
} as const;

const optimizeSchema = {
    body: {
        type: "object",
        required: ["tasks"],
        properties: {
            ...gridProperties,
            tasks: {
                type: "array",
                items: {
                    type: "object",
                    required: ["name", "kwh", "hour"],
                    properties: {
                        name: { type: "string" },
                        kwh: { type: "number" },
                        hour: { type: "number" },
                    },
                },
            },
        },
    },
} as const;

const annualizeSchema = {
    body: {
        type: "object",
        required: ["kwh", "hour"],
        properties: {
            ...gridProperties,
            kwh: { type: "number" },
            hour: { type: "number" },
            costPerTonneUSD: { type: "number" },
        },
    },
} as const;

export function buildServer(engine: CarbonEngine, options: ServerOptions = {}): FastifyInstance {
    const app = fastify({ logger: options.logger ?? true });
    const defaults = options.defaults ?? defaultConfig();

    const profileFor = (query: GridQuery) =>
        engine.profileDetails(
            query.region ?? defaults.region,
            query.season ?? defaults.season,
            query.renewableAdjust ?? defaults.renewableAdjust,
        );

    app.setErrorHandler((error, request, reply) => {
        if (error instanceof CarbonEngineError) {
            request.log.info({ code: error.code }, error.message);
            return reply.code(400).send({ error: error.code, message: error.message });
        }
        if (error.validation) {
            return reply.code(400).send({ error: "invalid_request", message: error.message });
        }
        request.log.error(error);
        return reply.code(500).send({ error: "internal_error", message: "Internal Server Error" });
    });

    app.get('/status', async () => {
        return {
            status: 'OK',
            timestamp: new Date().toISOString(),
        };
    });

    app.get('/regions', async () => {
        return listRegions(engine.data);
    });

    app.get<{ Params: { code: string } }>('/regions/:code', async (request, reply) => {
        const { code } = request.params;
        const summary = listRegions(engine.data).find((r) => r.code === code);
        if (!summary) {
            return reply.code(404).send({ error: "unknown_region", message: `Unknown region: ${code}` });
        }
        return { ...summary, gridMix: getGridMix(engine.data, code) };
    });

    app.post<{ Body: EmissionsBody }>('/emissions', { schema: emissionsSchema }, async (request) => {
        const { entry, region, renewableAdjust, strict } = request.body;
        const electricity = engine.resolveOrDefault(region ?? defaults.region, renewableAdjust ?? defaults.renewableAdjust);
        const result = engine.calculate(entry, electricity.effectiveFactor, { strict });
        return { ...result, electricity };
    });

    app.get<{ Querystring: ProfileQuery }>('/profile', { schema: profileSchema }, async (request) => {
        const details = profileFor(request.query);
        return { ...details, lowHours: engine.topNLowHours(details.profile, request.query.top ?? 3) };
    });

    app.post<{ Body: OptimizeBody }>('/optimize', { schema: optimizeSchema }, async (request) => {
        const details = profileFor(request.body);
        return {
            regionCode: details.regionCode,
            season: details.season,
            ...engine.compare(details.profile, request.body.tasks),
        };
    });

    app.post<{ Body: AnnualizeBody }>('/annualize', { schema: annualizeSchema }, async (request) => {
        const { kwh, hour, costPerTonneUSD } = request.body;
        const details = profileFor(request.body);
        return {
            regionCode: details.regionCode,
            season: details.season,
            ...engine.annualize(details.profile, kwh, hour, costPerTonneUSD ?? defaults.costPerTonneUSD),
        };
    });

    app.get('/devices', async () => {
        return {
            categories: listDevicePresetsByCategory(engine.data),
            presets: [...engine.data.devices.values()],
        };
    });

    return app;
}
