/**
 * Message operations.
 * Messages are append-only: there is no update or delete.
 */

import type Database from "better-sqlite3";
import type { Message } from "../types/index.js";

/** Row shape from SQLite */
interface MessageRow {
  id: number;
  session_id: string;
  timestamp: string;
  content: string;
}

function rowToMessage(row: MessageRow): Message {
  return {
    id: row.id,
    sessionId: row.session_id,
    timestamp: row.timestamp,
    content: row.content,
  };
}

/** Append a message and return its row ID */
export function insertMessage(
  db: Database.Database,
  sessionId: string,
  timestamp: string,
  content: string
): number {
  const result = db
    .prepare(
      "INSERT INTO messages (session_id, timestamp, content) VALUES (?, ?, ?)"
    )
    .run(sessionId, timestamp, content);
  return Number(result.lastInsertRowid);
}

/** Get all messages of a session in insertion order */
export function getMessagesBySession(
  db: Database.Database,
  sessionId: string
): Message[] {
  const rows = db
    .prepare("SELECT * FROM messages WHERE session_id = ? ORDER BY id ASC")
    .all(sessionId) as MessageRow[];
  return rows.map(rowToMessage);
}

/** Count messages of a session */
export function countMessagesBySession(
  db: Database.Database,
  sessionId: string
): number {
  const row = db
    .prepare("SELECT COUNT(*) AS count FROM messages WHERE session_id = ?")
    .get(sessionId) as { count: number };
  return row.count;
}
