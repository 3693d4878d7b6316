/**
 * User-facing status output.
 *
 * Commands receive an OutputSink instead of writing to the console
 * directly, so tests can capture what a user would see.
 */

import { Chalk } from "chalk";

export interface OutputSink {
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Unstyled text (tables, JSON, YAML) */
  print(text: string): void;
}

export interface ConsoleOutputOptions {
  noColor?: boolean | undefined;
  stdout?: ((text: string) => void) | undefined;
  stderr?: ((text: string) => void) | undefined;
}

/**
 * Console sink: status lines are coloured, errors go to stderr.
 */
export function createConsoleOutput(
  options: ConsoleOutputOptions = {}
): OutputSink {
  const chalk = new Chalk(options.noColor ? { level: 0 } : {});
  const out =
    options.stdout ??
    ((text: string) => {
      process.stdout.write(text);
    });
  const err =
    options.stderr ??
    ((text: string) => {
      process.stderr.write(text);
    });

  return {
    info: (message) => out(chalk.cyan(message) + "\n"),
    success: (message) => out(chalk.green(message) + "\n"),
    warning: (message) => out(chalk.yellow(message) + "\n"),
    error: (message) => err(chalk.red(message) + "\n"),
    print: (text) => out(text.endsWith("\n") ? text : text + "\n"),
  };
}
