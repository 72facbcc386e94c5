/**
 * Launcher configuration (maps to dicom-launcher.yml in the install directory).
 */
export interface LauncherConfig {
    /** Monitor script, resolved against the install directory when relative */
    program: string;
    /** Passed to the monitor as `--settings`; never interpreted by the launcher */
    settings: string;
    /** Passed to the monitor as `--logdir`; never interpreted by the launcher */
    logDir: string;
    /** Virtual environment directory. When absent, `venv` then `.venv` are tried. */
    environment?: string;
    /** Directory for the launcher's own log file */
    launcherLogDir: string;
    /** Maximum size of a single launcher log file in MB before rotation (default: 10) */
    maxLogSizeMB: number;
    /** Maximum number of rotated launcher log files to keep (default: 5) */
    maxLogFiles: number;
}

/** Environment variables that override the monitor paths from the config file. */
export const ENV_OVERRIDES = {
    settings: "DICOM_MONITOR_SETTINGS",
    logDir: "DICOM_MONITOR_LOGDIR",
} as const;

/** Default configuration values */
export const CONFIG_DEFAULTS = {
    program: "dicom_monitor.py",
    settings: "path\\to\\settings.json",
    logDir: "path\\to\\logs",
    environmentCandidates: ["venv", ".venv"],
    launcherLogDir: "launcher-logs",
    maxLogSizeMB: 10,
    maxLogFiles: 5,
    configFileName: "dicom-launcher.yml",
} as const;
