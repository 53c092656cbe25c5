import { readFileSync } from "node:fs";
import { Command } from "commander";
import { z } from "zod";
import { doctorCommand } from "./commands/doctor.js";
import { startCommand } from "./commands/start.js";
import { statusCommand } from "./commands/status.js";
import { initLogging } from "./log.js";
import { DEFAULT_SETTINGS_PATH } from "./settings.js";

const pkg = z
    .object({ version: z.string() })
    .passthrough()
    .parse(JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8")));

const program = new Command();

initLogging();

program.name("enginehost").description("Supervisor for the local engine sidecar").version(pkg.version);

program
    .command("start")
    .description("Provision and launch the engine, then keep it running")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .option("--clean", "Remove the environment and reinstall from scratch")
    .action(startCommand);

program
    .command("status")
    .description("Show the recorded engine process and its health")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(statusCommand);

program
    .command("doctor")
    .description("Check the runtime, environment, sidecar files and ports")
    .option("-s, --settings <path>", "Path to settings file", DEFAULT_SETTINGS_PATH)
    .action(doctorCommand);

if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
}

await program.parseAsync(process.argv);
