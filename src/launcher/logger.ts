import * as fs from "node:fs";
import * as path from "node:path";

const DEFAULT_MAX_LOG_SIZE_MB = 10;
const DEFAULT_MAX_LOG_FILES = 5;
const LOG_BASENAME = "launcher";

export interface LoggerOptions {
    logDir: string;
    maxLogSizeMB?: number;
    maxLogFiles?: number;
}

export type LogLevel = "INFO" | "WARN" | "ERROR";

/**
 * Append-only launcher log with size-based rotation
 * (launcher.log → launcher.1.log → … → launcher.N.log).
 */
export class Logger {
    private logDir: string;
    private logFile: string;
    private maxLogSize: number;
    private maxLogFiles: number;

    constructor(options: LoggerOptions) {
        this.logDir = options.logDir;
        this.maxLogSize = (options.maxLogSizeMB ?? DEFAULT_MAX_LOG_SIZE_MB) * 1024 * 1024;
        this.maxLogFiles = options.maxLogFiles ?? DEFAULT_MAX_LOG_FILES;
        this.logFile = path.join(this.logDir, `${LOG_BASENAME}.log`);
        fs.mkdirSync(this.logDir, { recursive: true });
    }

    /**
     * Get the path to the current log file.
     */
    getLogFilePath(): string {
        return this.logFile;
    }

    /**
     * Record a completed step, such as the started child and its arguments.
     */
    info(message: string): void {
        this.write("INFO", message);
    }

    /**
     * Write a warning log message.
     */
    warn(message: string): void {
        this.write("WARN", message);
    }

    /**
     * Record a failure: an aborted launch or a child that never started.
     */
    error(message: string): void {
        this.write("ERROR", message);
    }

    private write(level: LogLevel, message: string): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] [pid ${process.pid}] ${message}\n`;

        this.rotateIfNeeded();
        fs.appendFileSync(this.logFile, line, "utf-8");
    }

    /** launcher.<index>.log beside the current file */
    private rotatedPath(index: number): string {
        return path.join(this.logDir, `${LOG_BASENAME}.${index}.log`);
    }

    private rotateIfNeeded(): void {
        try {
            if (!fs.existsSync(this.logFile)) return;

            const stat = fs.statSync(this.logFile);
            if (stat.size < this.maxLogSize) return;

            // Shift existing numbered logs, dropping the oldest
            for (let i = this.maxLogFiles - 1; i > 0; i--) {
                const from = this.rotatedPath(i);
                if (fs.existsSync(from)) {
                    if (i + 1 >= this.maxLogFiles) {
                        fs.unlinkSync(from);
                    } else {
                        fs.renameSync(from, this.rotatedPath(i + 1));
                    }
                }
            }

            fs.renameSync(this.logFile, this.rotatedPath(1));
        } catch (err) {
            // Rotation is best effort; keep appending to the current file
            const message = err instanceof Error ? err.message : String(err);
            process.emitWarning(`Launcher log rotation failed: ${message}`);
        }
    }
}

export type LauncherLog = Pick<Logger, "info" | "warn" | "error">;

/** Discards everything; the default sink for a bare spawnBackground call. */
export const silentLogger: LauncherLog = {
    info: () => undefined,
    warn: () => undefined,
    error: () => undefined,
};
