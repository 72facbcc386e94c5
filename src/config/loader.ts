import * as fs from "node:fs";
import * as path from "node:path";
import * as yaml from "yaml";
import type { LauncherConfig } from "./types.js";
import { CONFIG_DEFAULTS, ENV_OVERRIDES } from "./types.js";
import { ConfigError } from "../launcher/errors.js";

/**
 * Path of the config file inside an install directory.
 */
export function getConfigPath(installDir: string): string {
    return path.join(installDir, CONFIG_DEFAULTS.configFileName);
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
    const value = raw[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== "string" || value.trim() === "") {
        throw new ConfigError(`${key} must be a non-empty string`);
    }
    return value;
}

/**
 * Validate a loaded configuration object. Throws on invalid config.
 * `null` (an empty YAML document) yields the defaults.
 */
export function validateConfig(config: unknown): LauncherConfig {
    if (config === null || config === undefined) {
        config = {};
    }
    if (typeof config !== "object" || Array.isArray(config)) {
        throw new ConfigError("Configuration must be a YAML object");
    }

    const raw = config as Record<string, unknown>;

    const maxLogSizeMB =
        typeof raw.maxLogSizeMB === "number" ? raw.maxLogSizeMB : CONFIG_DEFAULTS.maxLogSizeMB;
    if (maxLogSizeMB <= 0) {
        throw new ConfigError("maxLogSizeMB must be a positive number");
    }

    const maxLogFiles =
        typeof raw.maxLogFiles === "number" ? raw.maxLogFiles : CONFIG_DEFAULTS.maxLogFiles;
    if (maxLogFiles <= 0 || !Number.isInteger(maxLogFiles)) {
        throw new ConfigError("maxLogFiles must be a positive integer");
    }

    const result: LauncherConfig = {
        program: optionalString(raw, "program") ?? CONFIG_DEFAULTS.program,
        settings: optionalString(raw, "settings") ?? CONFIG_DEFAULTS.settings,
        logDir: optionalString(raw, "logDir") ?? CONFIG_DEFAULTS.logDir,
        launcherLogDir: optionalString(raw, "launcherLogDir") ?? CONFIG_DEFAULTS.launcherLogDir,
        maxLogSizeMB,
        maxLogFiles,
    };

    const environment = optionalString(raw, "environment");
    if (environment !== undefined) {
        result.environment = environment;
    }

    return result;
}

/**
 * Apply DICOM_MONITOR_SETTINGS / DICOM_MONITOR_LOGDIR. Empty values are ignored.
 */
export function applyEnvOverrides(
    config: LauncherConfig,
    env: NodeJS.ProcessEnv = process.env,
): LauncherConfig {
    const settings = env[ENV_OVERRIDES.settings];
    const logDir = env[ENV_OVERRIDES.logDir];
    return {
        ...config,
        settings: settings ? settings : config.settings,
        logDir: logDir ? logDir : config.logDir,
    };
}

/**
 * Load the launcher config from an install directory.
 * A missing config file is not an error: the built-in defaults apply.
 */
export function loadConfig(installDir: string, env: NodeJS.ProcessEnv = process.env): LauncherConfig {
    const configPath = getConfigPath(installDir);

    let parsed: unknown = null;
    if (fs.existsSync(configPath)) {
        const raw = fs.readFileSync(configPath, "utf-8");
        try {
            parsed = yaml.parse(raw);
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            throw new ConfigError(`Invalid YAML in ${configPath}: ${message}`);
        }
    }

    return applyEnvOverrides(validateConfig(parsed), env);
}

/**
 * Write a default dicom-launcher.yml configuration file.
 * @returns The path of the created file
 */
export function writeDefaultConfig(installDir: string): string {
    const configPath = getConfigPath(installDir);

    if (fs.existsSync(configPath)) {
        throw new ConfigError(`Config file already exists: ${configPath}`);
    }

    fs.mkdirSync(installDir, { recursive: true });

    const doc = new yaml.Document({
        program: CONFIG_DEFAULTS.program,
        settings: CONFIG_DEFAULTS.settings,
        logDir: CONFIG_DEFAULTS.logDir,
    });
    doc.commentBefore = [
        " DICOM monitor launcher configuration",
        "",
        " settings and logDir are handed to the monitor unchanged.",
        ` ${ENV_OVERRIDES.settings} and ${ENV_OVERRIDES.logDir} override them when set.`,
    ].join("\n");

    const template = [
        doc.toString().trimEnd(),
        "",
        "# Virtual environment directory (default: venv, then .venv)",
        "# environment: venv",
        "",
        "# Launcher log settings (optional)",
        "# launcherLogDir: launcher-logs",
        "# maxLogSizeMB: 10    # Max log file size in MB before rotation (default: 10)",
        "# maxLogFiles: 5      # Max number of rotated log files to keep (default: 5)",
    ].join("\n") + "\n";

    fs.writeFileSync(configPath, template, "utf-8");
    return configPath;
}
