/**
 * Keystroke filter for raw terminal input.
 *
 * Arrow keys, function keys and modified cursor movement arrive as ANSI
 * escape sequences. The filter is an incremental state machine over single
 * bytes so a sequence may be split across any number of reads.
 *
 *   normal --ESC--> escape --'['--> csi --0x40..0x7E--> normal
 *                          --'O'--> ss3 --any-------> normal
 *                          --other-----------------> normal
 */

export type EscapeState = "normal" | "escape" | "csi" | "ss3";

/** What a single input byte does to the line being typed */
export type KeystrokeAction =
  | { type: "append"; byte: number }
  | { type: "erase" }
  | { type: "submit" }
  | { type: "ignore" };

export interface FilterStep {
  next: EscapeState;
  action: KeystrokeAction;
}

const ESC = 0x1b;
const CR = 0x0d;
const TAB = 0x09;
const BACKSPACE = 0x08;
const DELETE = 0x7f;
const CSI_INTRODUCER = 0x5b; // '['
const SS3_INTRODUCER = 0x4f; // 'O'

const IGNORE: KeystrokeAction = { type: "ignore" };

/** CSI final bytes: '@' through '~' */
function isCsiFinal(byte: number): boolean {
  return byte >= 0x40 && byte <= 0x7e;
}

/**
 * Advance the filter by one byte. Total over every state and byte value.
 */
export function stepEscapeFilter(state: EscapeState, byte: number): FilterStep {
  switch (state) {
    case "escape":
      if (byte === CSI_INTRODUCER) return { next: "csi", action: IGNORE };
      if (byte === SS3_INTRODUCER) return { next: "ss3", action: IGNORE };
      // Two-byte sequence such as Alt+f
      return { next: "normal", action: IGNORE };

    case "csi":
      // Parameter and intermediate bytes keep the sequence open
      return { next: isCsiFinal(byte) ? "normal" : "csi", action: IGNORE };

    case "ss3":
      return { next: "normal", action: IGNORE };

    case "normal":
      if (byte === ESC) return { next: "escape", action: IGNORE };
      if (byte === CR) return { next: "normal", action: { type: "submit" } };
      // Tab usually triggers completion in the agent, it is not content
      if (byte === TAB) return { next: "normal", action: IGNORE };
      if (byte === DELETE || byte === BACKSPACE) {
        return { next: "normal", action: { type: "erase" } };
      }
      // Printable ASCII and every byte of a UTF-8 multi-byte character
      if (byte >= 0x20) {
        return { next: "normal", action: { type: "append", byte } };
      }
      return { next: "normal", action: IGNORE };
  }
}
