import { describe, it, expect, vi } from "vitest";
import { spawnBackground, type SpawnFn, type SpawnRequest } from "../src/launcher/spawn.js";
import { SpawnError } from "../src/launcher/errors.js";
import { createFakeSpawn, FakeChild } from "./helpers.js";

const request: SpawnRequest = {
    command: "/opt/monitor/venv/bin/python",
    args: ["/opt/monitor/dicom_monitor.py", "--settings", "s.json", "--logdir", "logs"],
    cwd: "/opt/monitor",
    env: { PATH: "/opt/monitor/venv/bin", VIRTUAL_ENV: "/opt/monitor/venv" },
};

describe("spawnBackground", () => {
    it("should spawn detached with ignored stdio in the requested directory", () => {
        const { spawn, calls } = createFakeSpawn();
        spawnBackground(request, { spawn });

        expect(calls).toHaveLength(1);
        expect(calls[0].command).toBe("/opt/monitor/venv/bin/python");
        expect(calls[0].args).toEqual(request.args);
        expect(calls[0].options).toEqual({
            cwd: "/opt/monitor",
            env: request.env,
            detached: true,
            stdio: "ignore",
            windowsHide: true,
        });
    });

    it("should release the child so the launcher can exit", () => {
        const { spawn, calls } = createFakeSpawn();
        spawnBackground(request, { spawn });
        expect(calls[0].child.unrefCalls).toBe(1);
    });

    it("should return a task record without a process handle", () => {
        const { spawn } = createFakeSpawn();
        const task = spawnBackground(request, { spawn });
        expect(task.pid).toBe(4000);
        expect(task.command).toBe(request.command);
        expect(task.args).toEqual(request.args);
        expect(task.cwd).toBe("/opt/monitor");
        expect(task.startedAt).toBeInstanceOf(Date);
        expect(Object.keys(task).sort()).toEqual(["args", "command", "cwd", "pid", "startedAt"]);
    });

    it("should log an asynchronous start failure instead of throwing", () => {
        const { spawn, calls } = createFakeSpawn();
        const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };
        spawnBackground(request, { spawn, logger });

        calls[0].child.emit("error", new Error("spawn ENOENT"));
        expect(logger.error).toHaveBeenCalledWith(
            "Background process /opt/monitor/venv/bin/python failed to start: spawn ENOENT",
        );
    });

    it("should wrap a synchronous spawn failure in SpawnError", () => {
        const spawn = (): never => {
            throw new Error("EACCES");
        };
        expect(() => spawnBackground(request, { spawn })).toThrow(
            new SpawnError("Failed to start /opt/monitor/venv/bin/python: EACCES"),
        );
    });

    it("should raise SpawnError when no process was created", () => {
        const { spawn: recordingSpawn, calls } = createFakeSpawn();
        const spawn: SpawnFn = (command, args, options) => {
            recordingSpawn(command, args, options);
            return new FakeChild(undefined);
        };
        const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn() };

        expect(() => spawnBackground(request, { spawn, logger })).toThrow(
            new SpawnError("Failed to start /opt/monitor/venv/bin/python: no process was created"),
        );
        expect(calls).toHaveLength(1);
    });

    it("should start an independent child on every call", () => {
        const { spawn, calls } = createFakeSpawn();
        const first = spawnBackground(request, { spawn });
        const second = spawnBackground(request, { spawn });
        expect(calls).toHaveLength(2);
        expect(first.pid).toBe(4000);
        expect(second.pid).toBe(4001);
    });
});
