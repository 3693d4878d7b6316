/**
 * Reassembles logical lines from raw keystrokes.
 */

import { stepEscapeFilter, type EscapeState } from "./escape-filter.js";

/**
 * Accumulates filtered keystroke bytes into the current line.
 *
 * Bytes are kept undecoded until a line is taken, because a multi-byte
 * UTF-8 character can itself be split across reads.
 */
export class LineBuffer {
  private bytes: number[] = [];
  private state: EscapeState = "normal";

  /**
   * Feed raw input. Returns every line completed by Enter, in order.
   * Empty lines are never returned.
   */
  push(data: Uint8Array): string[] {
    const lines: string[] = [];

    for (const byte of data) {
      const { next, action } = stepEscapeFilter(this.state, byte);
      this.state = next;

      switch (action.type) {
        case "append":
          this.bytes.push(action.byte);
          break;
        case "erase":
          this.bytes.pop();
          break;
        case "submit": {
          const line = this.take();
          if (line !== null) lines.push(line);
          break;
        }
        case "ignore":
          break;
      }
    }

    return lines;
  }

  /**
   * Remove and decode the pending line, or null if nothing is pending.
   * Invalid UTF-8 becomes U+FFFD.
   */
  take(): string | null {
    if (this.bytes.length === 0) {
      return null;
    }
    const text = Buffer.from(this.bytes).toString("utf8");
    this.bytes = [];
    return text;
  }

  /** Current escape-parser state */
  get escapeState(): EscapeState {
    return this.state;
  }

  get pendingBytes(): number {
    return this.bytes.length;
  }
}
