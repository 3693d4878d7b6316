import type { LocalTerminal } from "./types.js";

/** The process's own stdin/stdout */
export function processTerminal(): LocalTerminal {
  const { stdin, stdout } = process;

  return {
    input: stdin,
    output: stdout,
    interactive: stdin.isTTY === true,
    size: () =>
      stdout.isTTY === true && stdout.columns > 0 && stdout.rows > 0
        ? { columns: stdout.columns, rows: stdout.rows }
        : null,
    isRaw: () => stdin.isRaw === true,
    setRawMode: (enabled) => {
      stdin.setRawMode(enabled);
    },
    onResize: (listener) => {
      stdout.on("resize", listener);
      return () => {
        stdout.off("resize", listener);
      };
    },
  };
}
