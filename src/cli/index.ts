#!/usr/bin/env node
import { Command } from "commander";
import { initCommand } from "./commands/init.js";
import { startCommand } from "./commands/start.js";

const program = new Command();

program
    .name("dicom-launcher")
    .description("Start the DICOM monitor in its virtual environment as a background process")
    .version("0.1.0");

program
    .command("start", { isDefault: true })
    .description("Launch the monitor detached and exit (default when no command is given)")
    .option("--dry-run", "Print the resolved invocation without starting anything")
    .option("--install-dir <dir>", "Install directory (defaults to the launcher's own directory)")
    .action(startCommand);

program
    .command("init")
    .description("Create a dicom-launcher.yml configuration file")
    .option("--install-dir <dir>", "Directory to write the config file to (defaults to the launcher's own directory)")
    .action(initCommand);

program.parse();
