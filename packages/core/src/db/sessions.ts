/**
 * Session CRUD operations.
 * Uses better-sqlite3 sync API.
 */

import type Database from "better-sqlite3";
import { randomUUID } from "node:crypto";
import type {
  ExitReason,
  Session,
  SessionMetadata,
} from "../types/index.js";

/** Row shape from SQLite */
interface SessionRow {
  id: string;
  agent: string;
  image: string;
  workspace: string;
  container_id: string;
  container_name: string;
  started_at: string;
  ended_at: string | null;
  exit_reason: string | null;
  version: string;
}

function toExitReason(value: string | null): ExitReason | null {
  switch (value) {
    case "normal":
    case "keyboard_interrupt":
    case "error":
      return value;
    default:
      return null;
  }
}

/** Convert DB row to Session type */
function rowToSession(row: SessionRow): Session {
  return {
    id: row.id,
    agent: row.agent,
    image: row.image,
    workspace: row.workspace,
    containerId: row.container_id,
    containerName: row.container_name,
    startedAt: row.started_at,
    endedAt: row.ended_at,
    exitReason: toExitReason(row.exit_reason),
    version: row.version,
  };
}

/** Generate a session ID: a v4 UUID without dashes */
export function generateSessionId(): string {
  return randomUUID().replace(/-/g, "");
}

/** Insert a new session row */
export function createSession(
  db: Database.Database,
  id: string,
  metadata: SessionMetadata,
  startedAt: string
): void {
  db.prepare(`
    INSERT INTO sessions
      (id, agent, image, workspace, container_id, container_name, started_at, version)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?)
  `).run(
    id,
    metadata.agent,
    metadata.image,
    metadata.workspace,
    metadata.containerId,
    metadata.containerName,
    startedAt,
    metadata.version
  );
}

/**
 * End a session by setting ended_at and exit_reason.
 * Only an open session is updated, so the exit reason is written once.
 * Returns false when no open session with that ID exists.
 */
export function endSession(
  db: Database.Database,
  id: string,
  endedAt: string,
  exitReason: ExitReason
): boolean {
  const result = db
    .prepare(`
      UPDATE sessions SET ended_at = ?, exit_reason = ?
      WHERE id = ? AND ended_at IS NULL
    `)
    .run(endedAt, exitReason, id);

  return result.changes > 0;
}

/** Get session by ID */
export function getSessionById(
  db: Database.Database,
  id: string
): Session | null {
  const row = db.prepare("SELECT * FROM sessions WHERE id = ?").get(id) as
    | SessionRow
    | undefined;
  return row ? rowToSession(row) : null;
}

export interface ListSessionsOptions {
  /** Only sessions for this agent kind */
  agent?: string | undefined;
  /** Maximum number of rows (newest first) */
  limit?: number | undefined;
}

/** List sessions, newest first */
export function listSessions(
  db: Database.Database,
  options: ListSessionsOptions = {}
): Session[] {
  const conditions: string[] = [];
  const params: (string | number)[] = [];

  if (options.agent) {
    conditions.push("agent = ?");
    params.push(options.agent);
  }

  let sql = "SELECT * FROM sessions";
  if (conditions.length > 0) {
    sql += ` WHERE ${conditions.join(" AND ")}`;
  }
  sql += " ORDER BY started_at DESC, rowid DESC";

  if (options.limit !== undefined) {
    sql += " LIMIT ?";
    params.push(options.limit);
  }

  const rows = db.prepare(sql).all(...params) as SessionRow[];
  return rows.map(rowToSession);
}
