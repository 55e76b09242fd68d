import { spawn } from "node:child_process";
import type { ProcessResult, RunCommandOptions } from "./types.js";

export class CommandFailedError extends Error {
  readonly result: ProcessResult;

  constructor(result: ProcessResult) {
    super(
      `${result.command} ${result.args.join(" ")} exited with code ${result.exitCode}: ${result.stderr.trim()}`
    );
    this.name = "CommandFailedError";
    this.result = result;
  }
}

/**
 * Runs an external command to completion and resolves with its captured
 * output. Chunks are also handed to `onOutput` as they arrive, and stdin is
 * inherited so the command can prompt (e.g. for push credentials).
 * A non-zero exit status still resolves; only a failure to spawn the
 * process rejects.
 */
export function runCommand(
  command: string,
  args: string[],
  options: RunCommandOptions
): Promise<ProcessResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      stdio: ["inherit", "pipe", "pipe"],
    });
    let stdout = "";
    let stderr = "";
    let settled = false;

    child.stdout.on("data", (data: Buffer) => {
      const chunk = data.toString();
      stdout += chunk;
      options.onOutput?.(chunk, "stdout");
    });

    child.stderr.on("data", (data: Buffer) => {
      const chunk = data.toString();
      stderr += chunk;
      options.onOutput?.(chunk, "stderr");
    });

    child.on("error", (err) => {
      if (settled) return;
      settled = true;
      reject(new Error(`Failed to spawn ${command}: ${err.message}`));
    });

    child.on("close", (code) => {
      if (settled) return;
      settled = true;
      resolve({ command, args, stdout, stderr, exitCode: code ?? 1 });
    });
  });
}
