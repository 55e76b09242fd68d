import { appendFile, mkdir } from "node:fs/promises";
import { join, resolve } from "node:path";
import type {
  CommandRunner,
  CommitDate,
  CommitSchedule,
  Configuration,
  FailurePolicy,
  GenerationSummary,
  ProcessResult,
  Reporter,
} from "./types.js";
import { contributionLabel, gitDateArgument } from "./dates.js";
import { CommandFailedError } from "./process-runner.js";

export const TRACKED_FILE = "README.md";
export const SUCCESS_NOTICE = "\nRepository generation completed successfully!";

export class DirectoryExistsError extends Error {
  readonly path: string;

  constructor(path: string) {
    super(`Directory already exists: ${path}`);
    this.name = "DirectoryExistsError";
    this.path = path;
  }
}

export interface DriverDeps {
  run: CommandRunner;
  reporter: Reporter;
  failurePolicy: FailurePolicy;
  /** Collects every command result in invocation order. */
  results: ProcessResult[];
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}

async function git(directory: string, args: string[], deps: DriverDeps): Promise<ProcessResult> {
  const result = await deps.run("git", args, {
    cwd: directory,
    onOutput: (chunk, stream) => deps.reporter.output(chunk, stream),
  });
  deps.results.push(result);

  if (result.exitCode !== 0) {
    if (deps.failurePolicy === "abort") {
      throw new CommandFailedError(result);
    }
    deps.reporter.warn(`git ${args[0]} exited with code ${result.exitCode}, continuing`);
  }
  return result;
}

export async function createRepository(
  config: Configuration,
  directory: string,
  deps: DriverDeps
): Promise<void> {
  try {
    await mkdir(directory);
  } catch (error) {
    if (isErrnoException(error) && error.code === "EEXIST") {
      throw new DirectoryExistsError(directory);
    }
    throw error;
  }

  await git(directory, ["init", "-b", "main"], deps);

  if (config.userName) {
    await git(directory, ["config", "user.name", config.userName], deps);
  }
  if (config.userEmail) {
    await git(directory, ["config", "user.email", config.userEmail], deps);
  }
}

export async function contribute(
  directory: string,
  date: CommitDate,
  deps: DriverDeps
): Promise<void> {
  const label = contributionLabel(date);
  await appendFile(join(directory, TRACKED_FILE), `${label}\n\n`);
  await git(directory, ["add", "."], deps);
  await git(directory, ["commit", "-m", label, "--date", gitDateArgument(date)], deps);
}

export async function setupRemote(
  directory: string,
  url: string,
  deps: DriverDeps
): Promise<void> {
  await git(directory, ["remote", "add", "origin", url], deps);
  await git(directory, ["branch", "-M", "main"], deps);
  await git(directory, ["push", "-u", "origin", "main"], deps);
}

export function previewSchedule(
  directoryName: string,
  schedule: CommitSchedule,
  reporter: Reporter
): void {
  for (const date of schedule) {
    reporter.info(contributionLabel(date));
  }
  reporter.info(`${schedule.length} commits would be written to ${directoryName}`);
}

export interface GenerateOptions {
  run: CommandRunner;
  reporter: Reporter;
  failurePolicy: FailurePolicy;
  /** Parent of the target directory. */
  baseDir: string;
}

/**
 * Creates the repository, commits once per scheduled date and, when a
 * remote URL is configured, pushes the result.
 */
export async function generateRepository(
  config: Configuration,
  directoryName: string,
  schedule: CommitSchedule,
  options: GenerateOptions
): Promise<GenerationSummary> {
  const directory = resolve(options.baseDir, directoryName);
  const deps: DriverDeps = {
    run: options.run,
    reporter: options.reporter,
    failurePolicy: options.failurePolicy,
    results: [],
  };

  await createRepository(config, directory, deps);
  for (const date of schedule) {
    await contribute(directory, date, deps);
  }
  if (config.repository) {
    await setupRemote(directory, config.repository, deps);
  }

  options.reporter.info(SUCCESS_NOTICE);
  return { directory, schedule, results: deps.results };
}
