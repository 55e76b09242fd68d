import type { Command } from "commander";
import { parseArguments, createProgram } from "./config.js";
import { fixedClock } from "./clock.js";
import { createAmbientRandom, createSeededRandom } from "./random.js";
import { synthesizeCommitDates } from "./synthesizer.js";
import { determineDirectory } from "./directory.js";
import { generateRepository, previewSchedule } from "./driver.js";
import type { Clock, CommandRunner, GenerationSummary, RandomSource, Reporter } from "./types.js";

export interface CliDeps {
  run: CommandRunner;
  clock: Clock;
  reporter: Reporter;
  /** Directory the new repository is created in. */
  baseDir: string;
  /** Used when no `--seed` is given. */
  random?: RandomSource;
  program?: Command;
}

/**
 * Runs one generation for the given user arguments. Resolves with the
 * summary, or undefined for a dry run.
 */
export async function runCli(argv: string[], deps: CliDeps): Promise<GenerationSummary | undefined> {
  const { config, options } = parseArguments(argv, deps.program ?? createProgram());
  const now = deps.clock();
  const random =
    options.seed === undefined
      ? deps.random ?? createAmbientRandom()
      : createSeededRandom(options.seed);

  const directoryName = determineDirectory(config.repository, now);
  const schedule = synthesizeCommitDates(config, { random, clock: fixedClock(now) });

  if (options.dryRun) {
    previewSchedule(directoryName, schedule, deps.reporter);
    return undefined;
  }

  return generateRepository(config, directoryName, schedule, {
    run: deps.run,
    reporter: deps.reporter,
    failurePolicy: options.strict ? "abort" : "ignore",
    baseDir: deps.baseDir,
  });
}

export function reportFatal(
  error: unknown,
  exit: (code: number) => void = (code) => process.exit(code)
): void {
  console.error("contribution-history fatal:", error);
  exit(1);
}
