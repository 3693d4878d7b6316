/**
 * Process-wide ownership of the local terminal's raw mode.
 * Only one lease may be held at a time.
 */

import { TerminalBusyError } from "./errors.js";
import type { LocalTerminal } from "./types.js";

export interface RawModeLease {
  /** Restore the mode saved at acquire. Safe to call more than once. */
  release(): void;
}

let held = false;

export function isRawModeHeld(): boolean {
  return held;
}

/**
 * Save the terminal's current mode and switch it to raw.
 * @throws TerminalBusyError if another lease is active
 */
export function acquireRawMode(terminal: LocalTerminal): RawModeLease {
  if (held) {
    throw new TerminalBusyError();
  }

  const previous = terminal.isRaw();
  terminal.setRawMode(true);
  held = true;

  let released = false;
  return {
    release() {
      if (released) return;
      released = true;
      try {
        terminal.setRawMode(previous);
      } finally {
        held = false;
      }
    },
  };
}
