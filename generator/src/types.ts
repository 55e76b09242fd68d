export interface Configuration {
  readonly noWeekends: boolean;
  readonly maxCommits: number;
  readonly frequency: number;
  readonly repository?: string;
  readonly userName?: string;
  readonly userEmail?: string;
  readonly daysBefore: number;
  readonly daysAfter: number;
}

export interface RunOptions {
  readonly seed?: number;
  readonly dryRun: boolean;
  readonly strict: boolean;
}

export interface ParsedArguments {
  config: Configuration;
  options: RunOptions;
}

/** A point in local wall-clock time, minute precision. */
export type CommitDate = Date;

export type CommitSchedule = readonly CommitDate[];

export interface RandomSource {
  /** Uniform integer in [low, high], both ends inclusive. */
  randint(low: number, high: number): number;
}

export type Clock = () => Date;

export interface ProcessResult {
  command: string;
  args: string[];
  stdout: string;
  stderr: string;
  exitCode: number;
}

export type OutputStream = "stdout" | "stderr";

export interface RunCommandOptions {
  cwd: string;
  /** Receives output chunks as the command writes them. */
  onOutput?: (chunk: string, stream: OutputStream) => void;
}

export type CommandRunner = (
  command: string,
  args: string[],
  options: RunCommandOptions
) => Promise<ProcessResult>;

/** "ignore" keeps going after a failed command; "abort" throws. */
export type FailurePolicy = "ignore" | "abort";

export interface Reporter {
  info(message: string): void;
  warn(message: string): void;
  output(chunk: string, stream: OutputStream): void;
}

export interface GenerationSummary {
  directory: string;
  schedule: CommitSchedule;
  results: ProcessResult[];
}
