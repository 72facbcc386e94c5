export { loadConfig, writeDefaultConfig, validateConfig, applyEnvOverrides, getConfigPath } from "./loader.js";
export type { LauncherConfig } from "./types.js";
export { CONFIG_DEFAULTS, ENV_OVERRIDES } from "./types.js";
