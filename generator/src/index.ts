#!/usr/bin/env node
import { runCli, reportFatal } from "./cli.js";
import { systemClock } from "./clock.js";
import { runCommand } from "./process-runner.js";
import { createConsoleReporter } from "./reporter.js";

async function main() {
  await runCli(process.argv.slice(2), {
    run: runCommand,
    clock: systemClock,
    reporter: createConsoleReporter(),
    baseDir: process.cwd(),
  });
}

main().catch((error) => reportFatal(error));
