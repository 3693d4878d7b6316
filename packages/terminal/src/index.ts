/**
 * @agentpod/terminal
 *
 * Interactive bridge between the local terminal and a container
 * pseudo-terminal, with input capture for the transcript recorder.
 */

export {
  TerminalBridge,
  REMOTE_CHUNK_SIZE,
  LOCAL_CHUNK_SIZE,
  FALLBACK_SIZE,
} from "./bridge.js";
export { processTerminal } from "./local-terminal.js";
export { acquireRawMode, isRawModeHeld, type RawModeLease } from "./raw-mode.js";
export { TerminalBusyError, InterruptedError } from "./errors.js";
export type {
  BridgeOptions,
  InputRecorder,
  LocalTerminal,
  RemoteStream,
  TerminalSize,
} from "./types.js";
