import { exitCodeFor } from "../../launcher/errors.js";
import { launch, planLaunch } from "../../launcher/launcher.js";

interface StartOptions {
    dryRun?: boolean;
    installDir?: string;
}

export function startCommand(options: StartOptions): void {
    try {
        if (options.dryRun) {
            const plan = planLaunch({ installDir: options.installDir });
            console.log(`Install dir: ${plan.context.installDir}`);
            console.log(`Environment: ${plan.context.environment.root}`);
            console.log(`Command: ${plan.request.command}`);
            console.log(`Arguments: ${JSON.stringify(plan.request.args)}`);
            return;
        }

        const { plan, task } = launch({ installDir: options.installDir });
        console.log(`DICOM monitor started in background (PID: ${task.pid ?? "unknown"}).`);
        console.log(`Settings: ${plan.config.settings}`);
        console.log(`Log dir: ${plan.config.logDir}`);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(exitCodeFor(err));
    }

    // The child is detached and unref'd, so the event loop drains on its own
    // once a late spawn error (if any) has reached the launcher log
    process.exitCode = 0;
}
