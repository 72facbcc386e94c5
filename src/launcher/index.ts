export { launch, planLaunch, monitorArguments } from "./launcher.js";
export type { LaunchContext, LaunchPlan, LaunchResult, LaunchOptions } from "./launcher.js";
export { resolveOwnDirectory, setWorkingDirectory } from "./location.js";
export { enterExecutionEnvironment, activateEnvironment } from "./environment.js";
export type { ExecutionEnvironment, EnvironmentOptions } from "./environment.js";
export { spawnBackground } from "./spawn.js";
export type { DetachedTask, SpawnFn, SpawnRequest, SpawnedChild } from "./spawn.js";
export { Logger, silentLogger } from "./logger.js";
export type { LauncherLog, LoggerOptions } from "./logger.js";
export {
    LauncherError,
    ConfigError,
    LocationError,
    EnvironmentActivationError,
    SpawnError,
    exitCodeFor,
} from "./errors.js";
