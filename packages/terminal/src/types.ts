/**
 * Types for the terminal bridge
 */

import type { Duplex, Readable, Writable } from "node:stream";

export interface TerminalSize {
  columns: number;
  rows: number;
}

/** An attached container pseudo-terminal */
export interface RemoteStream {
  /** Raw TTY bytes in both directions */
  readonly stream: Duplex;
  /** Set the remote pseudo-terminal size */
  resize(size: TerminalSize): Promise<void>;
  /** Detach; the container keeps running */
  close(): void | Promise<void>;
}

/** The local controlling terminal */
export interface LocalTerminal {
  readonly input: Readable;
  readonly output: Writable;
  /** Input is a TTY; raw mode and resize tracking only apply then */
  readonly interactive: boolean;
  /** Current size, or null when output is not a TTY */
  size(): TerminalSize | null;
  isRaw(): boolean;
  setRawMode(enabled: boolean): void;
  /** Subscribe to size changes; returns the unsubscribe function */
  onResize(listener: () => void): () => void;
}

/** Receives a copy of every byte the user types */
export interface InputRecorder {
  record(data: Uint8Array): void;
}

export interface BridgeOptions {
  /** Aborting ends the session with an InterruptedError */
  signal?: AbortSignal | undefined;
}
