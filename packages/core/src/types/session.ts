/**
 * Session types for agentpod.
 * A session represents one interactive attachment to one agent container.
 */

/** Why a session ended */
export type ExitReason = "normal" | "keyboard_interrupt" | "error";

/**
 * Metadata captured when a session is opened.
 * Written once and never changed afterwards.
 */
export interface SessionMetadata {
  /** Agent kind running in the container (e.g. "claude") */
  agent: string;

  /** Image reference the container was started from */
  image: string;

  /** Absolute host path mounted as the workspace */
  workspace: string;

  /** Container ID on the Docker host */
  containerId: string;

  /** Human-readable container name */
  containerName: string;

  /** agentpod version that started the session */
  version: string;
}

/**
 * A recorded session.
 */
export interface Session extends SessionMetadata {
  /** Opaque session ID (32 hex characters) */
  id: string;

  /** When the session started (ISO 8601) */
  startedAt: string;

  /** When the session ended (ISO 8601, null while still attached) */
  endedAt: string | null;

  /** Set exactly once, when the session is closed */
  exitReason: ExitReason | null;
}

/**
 * One logical line of user input, flushed on Enter or at session close.
 */
export interface Message {
  /** Autoincrement row ID; insertion order is the durable order */
  id: number;

  sessionId: string;

  /** Flush time (ISO 8601) */
  timestamp: string;

  /** Decoded text, invalid UTF-8 replaced with U+FFFD */
  content: string;
}
