export { buildServer } from "./server/server.js";
export type { ServerDefaults, ServerOptions } from "./server/server.js";
export { DEFAULT_CONFIG_FILE, defaultConfig, loadConfig, parseConfig } from "./config/config.js";
export type { AppConfig, LoadedConfig, ServerConfig } from "./config/config.js";
export { run, VALID_COMMANDS } from "./cli/run.js";
