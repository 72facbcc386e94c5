/**
 * Launcher failures. Each carries the process exit code the CLI reports.
 */
export abstract class LauncherError extends Error {
    abstract readonly exitCode: number;
}

export class ConfigError extends LauncherError {
    readonly exitCode = 1;

    constructor(message: string) {
        super(message);
        this.name = "ConfigError";
    }
}

export class LocationError extends LauncherError {
    readonly exitCode = 2;

    constructor(message: string) {
        super(message);
        this.name = "LocationError";
    }
}

export class EnvironmentActivationError extends LauncherError {
    readonly exitCode = 3;

    constructor(installDir: string, searched: string[]) {
        super(
            `No provisioned virtual environment found in ${installDir} ` +
            `(looked for: ${searched.join(", ")})`,
        );
        this.name = "EnvironmentActivationError";
    }
}

export class SpawnError extends LauncherError {
    readonly exitCode = 4;

    constructor(message: string) {
        super(message);
        this.name = "SpawnError";
    }
}

/**
 * Map any thrown value to the exit code the launcher should report.
 */
export function exitCodeFor(err: unknown): number {
    return err instanceof LauncherError ? err.exitCode : 1;
}
