import * as fs from "node:fs";
import * as path from "node:path";
import { loadConfig } from "../config/loader.js";
import type { LauncherConfig } from "../config/types.js";
import { enterExecutionEnvironment, type ExecutionEnvironment } from "./environment.js";
import { SpawnError } from "./errors.js";
import { resolveOwnDirectory, setWorkingDirectory } from "./location.js";
import { Logger, type LauncherLog } from "./logger.js";
import { spawnBackground, type DetachedTask, type SpawnFn, type SpawnRequest } from "./spawn.js";

/**
 * Everything the shell used to hold implicitly: where we run, and which
 * environment the child inherits.
 */
export interface LaunchContext {
    installDir: string;
    environment: ExecutionEnvironment;
}

export interface LaunchPlan {
    context: LaunchContext;
    config: LauncherConfig;
    programPath: string;
    /** Exactly `--settings <settings> --logdir <logDir>` */
    monitorArgs: string[];
    request: SpawnRequest;
}

export interface LaunchResult {
    plan: LaunchPlan;
    task: DetachedTask;
}

export interface LaunchOptions {
    /** Skip location resolution and use this directory */
    installDir?: string;
    /** Entry script used to locate the install directory */
    scriptPath?: string;
    env?: NodeJS.ProcessEnv;
    platform?: NodeJS.Platform;
    spawn?: SpawnFn;
    /** Replaces the file logger built from the config */
    logger?: LauncherLog;
}

export function monitorArguments(config: Pick<LauncherConfig, "settings" | "logDir">): string[] {
    return ["--settings", config.settings, "--logdir", config.logDir];
}

function resolveInstallDir(options: LaunchOptions): string {
    return options.installDir !== undefined
        ? path.resolve(options.installDir)
        : resolveOwnDirectory(options.scriptPath);
}

function buildPlan(installDir: string, config: LauncherConfig, options: LaunchOptions): LaunchPlan {
    const environment = enterExecutionEnvironment(installDir, {
        environment: config.environment,
        baseEnv: options.env ?? process.env,
        platform: options.platform,
    });

    const programPath = path.resolve(installDir, config.program);
    if (!fs.existsSync(programPath)) {
        throw new SpawnError(`Monitor program not found: ${programPath}`);
    }

    const monitorArgs = monitorArguments(config);

    return {
        context: { installDir, environment },
        config,
        programPath,
        monitorArgs,
        request: {
            command: environment.interpreter,
            args: [programPath, ...monitorArgs],
            cwd: installDir,
            env: environment.env,
        },
    };
}

/**
 * Resolve the install directory, enter it, activate its venv and check the
 * monitor program exists. Nothing is spawned.
 */
export function planLaunch(options: LaunchOptions = {}): LaunchPlan {
    const installDir = resolveInstallDir(options);
    setWorkingDirectory(installDir);
    const config = loadConfig(installDir, options.env ?? process.env);
    return buildPlan(installDir, config, options);
}

/**
 * Start the monitor as a detached background process and return at once.
 * Any failure before the spawn aborts the launch; nothing is retried.
 */
export function launch(options: LaunchOptions = {}): LaunchResult {
    const installDir = resolveInstallDir(options);
    setWorkingDirectory(installDir);
    const config = loadConfig(installDir, options.env ?? process.env);
    const logger =
        options.logger ??
        new Logger({
            logDir: path.resolve(installDir, config.launcherLogDir),
            maxLogSizeMB: config.maxLogSizeMB,
            maxLogFiles: config.maxLogFiles,
        });

    try {
        const plan = buildPlan(installDir, config, options);
        const task = spawnBackground(plan.request, { spawn: options.spawn, logger });

        logger.info(
            `Started ${config.program} (PID: ${task.pid ?? "unknown"}) in ${installDir} ` +
            `using ${plan.context.environment.interpreter} with: ${plan.monitorArgs.join(" ")}`,
        );
        return { plan, task };
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(`Launch aborted: ${message}`);
        throw err;
    }
}
