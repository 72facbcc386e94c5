import * as fs from "node:fs";
import * as path from "node:path";
import { LocationError } from "./errors.js";

/** Where the CLI entry sits inside this package, built and from source. */
const ENTRY_LAYOUTS: readonly string[][] = [
    ["dist", "src", "cli"],
    ["src", "cli"],
];

/**
 * The package root when `scriptDir` is this package's own CLI directory,
 * otherwise undefined. Only the known layouts are checked; nothing above
 * the package root is ever consulted.
 */
function packageRootFor(scriptDir: string): string | undefined {
    for (const layout of ENTRY_LAYOUTS) {
        const root = path.resolve(scriptDir, ...layout.map(() => ".."));
        if (
            path.join(root, ...layout) === scriptDir &&
            fs.existsSync(path.join(root, "package.json"))
        ) {
            return root;
        }
    }
    return undefined;
}

/**
 * Resolve the launcher's install directory from the running entry script.
 *
 * Symlinks (npm bin shims) are followed first. A script that is this
 * package's own CLI resolves to the package root; any other script resolves
 * to the directory it lives in.
 *
 * @param scriptPath Entry script path (defaults to `process.argv[1]`)
 */
export function resolveOwnDirectory(scriptPath: string | undefined = process.argv[1]): string {
    if (!scriptPath) {
        throw new LocationError("Cannot determine the launcher's own path");
    }

    let realScript: string;
    try {
        realScript = fs.realpathSync(path.resolve(scriptPath));
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new LocationError(`Cannot resolve launcher path ${scriptPath}: ${message}`);
    }

    const scriptDir = path.dirname(realScript);
    return packageRootFor(scriptDir) ?? scriptDir;
}

/**
 * Make `dir` the process working directory. Everything relative after this
 * point (venv lookup, program path) resolves against it.
 */
export function setWorkingDirectory(dir: string): void {
    try {
        process.chdir(dir);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new LocationError(`Cannot change directory to ${dir}: ${message}`);
    }
}
