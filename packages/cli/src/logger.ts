import chalk from "chalk";
import type { Logger } from "@flakepatch/core";

export interface OutputStreams {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

const PROCESS_STREAMS: OutputStreams = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
};

/**
 * Logger for terminal use. Results go to stdout; warnings and errors go to
 * stderr, colored.
 */
export function createConsoleLogger(streams: OutputStreams = PROCESS_STREAMS): Logger {
  return {
    log: (message) => streams.stdout(`${message}\n`),
    info: (message) => streams.stderr(`${message}\n`),
    warn: (message) => streams.stderr(`${chalk.yellow("warning")}: ${message}\n`),
    error: (message) => streams.stderr(`${chalk.red(message)}\n`),
  };
}
