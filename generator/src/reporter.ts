import type { OutputStream, Reporter } from "./types.js";

const PREFIX = "[contribution-history]";

export function createConsoleReporter(): Reporter {
  return {
    info(message) {
      process.stdout.write(`${message}\n`);
    },
    warn(message) {
      process.stderr.write(`${PREFIX} ${message}\n`);
    },
    output(chunk: string, stream: OutputStream) {
      process[stream].write(chunk);
    },
  };
}

export const silentReporter: Reporter = {
  info() {},
  warn() {},
  output() {},
};
