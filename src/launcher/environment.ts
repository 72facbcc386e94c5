import * as fs from "node:fs";
import * as path from "node:path";
import { CONFIG_DEFAULTS } from "../config/types.js";
import { EnvironmentActivationError } from "./errors.js";

/**
 * An activated, pre-provisioned Python virtual environment.
 */
export interface ExecutionEnvironment {
    /** Absolute venv root (the directory holding pyvenv.cfg) */
    root: string;
    /** `Scripts` on Windows, `bin` elsewhere */
    binDir: string;
    /** The venv's own interpreter */
    interpreter: string;
    /** Child environment with the venv activated */
    env: NodeJS.ProcessEnv;
}

export interface EnvironmentOptions {
    /** Explicit venv directory; relative paths resolve against the install directory */
    environment?: string;
    /** Parent environment to derive the child's from (defaults to process.env) */
    baseEnv?: NodeJS.ProcessEnv;
    /** Host platform (defaults to process.platform) */
    platform?: NodeJS.Platform;
}

function venvLayout(root: string, platform: NodeJS.Platform): { binDir: string; interpreter: string } {
    if (platform === "win32") {
        const binDir = path.join(root, "Scripts");
        return { binDir, interpreter: path.join(binDir, "python.exe") };
    }
    const binDir = path.join(root, "bin");
    return { binDir, interpreter: path.join(binDir, "python") };
}

function isExecutable(file: string, platform: NodeJS.Platform): boolean {
    if (platform === "win32") {
        return fs.existsSync(file);
    }
    try {
        fs.accessSync(file, fs.constants.X_OK);
        return true;
    } catch {
        return false;
    }
}

function isProvisioned(root: string, interpreter: string, platform: NodeJS.Platform): boolean {
    return fs.existsSync(path.join(root, "pyvenv.cfg")) && isExecutable(interpreter, platform);
}

/**
 * Build the environment a venv's activate script would produce:
 * VIRTUAL_ENV set, the venv bin directory first on PATH, PYTHONHOME unset.
 */
export function activateEnvironment(
    root: string,
    binDir: string,
    baseEnv: NodeJS.ProcessEnv,
    platform: NodeJS.Platform,
): NodeJS.ProcessEnv {
    const env: NodeJS.ProcessEnv = { ...baseEnv };
    const delimiter = platform === "win32" ? ";" : ":";

    // Windows env keys are case-insensitive; reuse whichever spelling exists
    const pathKey =
        platform === "win32"
            ? (Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "Path")
            : "PATH";
    const currentPath = env[pathKey];

    env[pathKey] = currentPath ? `${binDir}${delimiter}${currentPath}` : binDir;
    env.VIRTUAL_ENV = root;
    delete env.PYTHONHOME;

    return env;
}

/**
 * Find and activate the virtual environment provisioned for `installDir`.
 * Never creates one and never falls back to a global interpreter.
 *
 * @throws EnvironmentActivationError when no provisioned venv exists
 */
export function enterExecutionEnvironment(
    installDir: string,
    options: EnvironmentOptions = {},
): ExecutionEnvironment {
    const platform = options.platform ?? process.platform;
    const baseEnv = options.baseEnv ?? process.env;
    const candidates = options.environment
        ? [options.environment]
        : [...CONFIG_DEFAULTS.environmentCandidates];

    for (const candidate of candidates) {
        const root = path.resolve(installDir, candidate);
        const { binDir, interpreter } = venvLayout(root, platform);
        if (isProvisioned(root, interpreter, platform)) {
            return {
                root,
                binDir,
                interpreter,
                env: activateEnvironment(root, binDir, baseEnv, platform),
            };
        }
    }

    throw new EnvironmentActivationError(installDir, candidates);
}
