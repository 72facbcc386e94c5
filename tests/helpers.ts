import * as fs from "node:fs";
import * as path from "node:path";
import * as os from "node:os";
import { EventEmitter } from "node:events";
import type { SpawnOptions } from "node:child_process";
import type { SpawnedChild, SpawnFn } from "../src/launcher/spawn.js";

export function createTempDir(prefix = "dicom-launcher-"): string {
    return fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), prefix)));
}

export function cleanupDir(dir: string): void {
    fs.rmSync(dir, { recursive: true, force: true });
}

/**
 * Lay out a virtual environment the way `python -m venv` would, minus the
 * packages. The interpreter is an empty executable file unless
 * `interpreterTarget` names a real executable to symlink to; with
 * `executable: false` it is left without the execute bit.
 */
export function provisionVenv(
    installDir: string,
    options: {
        name?: string;
        platform?: NodeJS.Platform;
        interpreterTarget?: string;
        executable?: boolean;
    } = {},
): string {
    const root = path.join(installDir, options.name ?? "venv");
    const platform = options.platform ?? process.platform;
    const binDir = path.join(root, platform === "win32" ? "Scripts" : "bin");
    const interpreter = path.join(binDir, platform === "win32" ? "python.exe" : "python");

    fs.mkdirSync(binDir, { recursive: true });
    fs.writeFileSync(path.join(root, "pyvenv.cfg"), "home = /usr/bin\n", "utf-8");
    if (options.interpreterTarget) {
        fs.symlinkSync(options.interpreterTarget, interpreter);
    } else {
        fs.writeFileSync(interpreter, "");
        fs.chmodSync(interpreter, options.executable === false ? 0o644 : 0o755);
    }
    return root;
}

export interface RecordedSpawn {
    command: string;
    args: string[];
    options: SpawnOptions;
    child: FakeChild;
}

export class FakeChild extends EventEmitter implements SpawnedChild {
    unrefCalls = 0;

    constructor(readonly pid: number | undefined) {
        super();
    }

    unref(): void {
        this.unrefCalls++;
    }
}

/**
 * A SpawnFn that records each call and hands back a FakeChild with an
 * increasing PID.
 */
export function createFakeSpawn(): { spawn: SpawnFn; calls: RecordedSpawn[] } {
    const calls: RecordedSpawn[] = [];
    let nextPid = 4000;
    const spawn: SpawnFn = (command, args, options) => {
        const child = new FakeChild(nextPid++);
        calls.push({ command, args: [...args], options, child });
        return child;
    };
    return { spawn, calls };
}
