import { writeDefaultConfig } from "../../config/loader.js";
import { exitCodeFor } from "../../launcher/errors.js";
import { resolveOwnDirectory } from "../../launcher/location.js";

interface InitOptions {
    installDir?: string;
}

export function initCommand(options: InitOptions): void {
    try {
        const installDir = options.installDir ?? resolveOwnDirectory();
        const configPath = writeDefaultConfig(installDir);
        console.log(`Created configuration file: ${configPath}`);
        console.log("Edit settings and logDir, then run 'dicom-launcher'.");
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        console.error(`Error: ${message}`);
        process.exit(exitCodeFor(err));
    }
}
