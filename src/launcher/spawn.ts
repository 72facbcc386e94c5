/**
 * Fire-and-forget child processes.
 *
 * A detached task is started, released (`unref`) and never observed again:
 * no handle is returned and no liveness check is made.
 */
import * as child_process from "node:child_process";
import type { SpawnOptions } from "node:child_process";
import { SpawnError } from "./errors.js";
import { silentLogger, type LauncherLog } from "./logger.js";

/** The parts of a ChildProcess the launcher touches. */
export interface SpawnedChild {
    pid?: number;
    unref(): void;
    on(event: "error", listener: (err: Error) => void): unknown;
}

export type SpawnFn = (command: string, args: readonly string[], options: SpawnOptions) => SpawnedChild;

export interface SpawnRequest {
    command: string;
    args: readonly string[];
    cwd: string;
    env: NodeJS.ProcessEnv;
}

/** Record of a released child. Holds no handle to it. */
export interface DetachedTask {
    pid: number | undefined;
    command: string;
    args: readonly string[];
    cwd: string;
    startedAt: Date;
}

export interface SpawnBackgroundOptions {
    spawn?: SpawnFn;
    logger?: LauncherLog;
}

/**
 * Start `request.command` with the literal `request.args`, detached from the
 * launcher so it outlives the launcher's exit.
 *
 * @throws SpawnError when the spawn call throws or no process was created
 */
export function spawnBackground(
    request: SpawnRequest,
    options: SpawnBackgroundOptions = {},
): DetachedTask {
    const spawn: SpawnFn = options.spawn ?? child_process.spawn;
    const logger = options.logger ?? silentLogger;

    let child: SpawnedChild;
    try {
        child = spawn(request.command, [...request.args], {
            cwd: request.cwd,
            env: request.env,
            detached: true,
            stdio: "ignore",
            windowsHide: true,
        });
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new SpawnError(`Failed to start ${request.command}: ${message}`);
    }

    // ENOENT and friends arrive asynchronously; record them, never crash on them
    child.on("error", (err) => {
        logger.error(`Background process ${request.command} failed to start: ${err.message}`);
    });

    child.unref();

    // Node leaves pid unset when the OS refused to create the process
    if (child.pid === undefined) {
        throw new SpawnError(`Failed to start ${request.command}: no process was created`);
    }

    return {
        pid: child.pid,
        command: request.command,
        args: request.args,
        cwd: request.cwd,
        startedAt: new Date(),
    };
}
