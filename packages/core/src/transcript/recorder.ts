/**
 * Transcript recorder.
 *
 * Turns the raw bytes a user types into an attached container into
 * discrete messages, stored in SQLite next to a session row.
 */

import type Database from "better-sqlite3";
import {
  openDatabase,
  runMigrations,
  getDefaultMigrationsDir,
  generateSessionId,
  createSession,
  endSession,
  insertMessage,
} from "../db/index.js";
import type { ExitReason, SessionMetadata } from "../types/index.js";
import { LineBuffer } from "./line-buffer.js";

export interface TranscriptRecorderOptions {
  /** Path to the SQLite store */
  dbPath: string;
  /** When false every operation is a no-op and nothing touches disk */
  enabled: boolean;
  /** Override the migrations folder (tests) */
  migrationsDir?: string | undefined;
  /** Clock used for session and message timestamps */
  now?: (() => Date) | undefined;
}

interface OpenSession {
  id: string;
  db: Database.Database;
  startedAt: string;
}

export class TranscriptRecorder {
  private readonly options: TranscriptRecorderOptions;
  private readonly now: () => Date;
  private readonly lines = new LineBuffer();
  private session: OpenSession | null = null;

  constructor(options: TranscriptRecorderOptions) {
    this.options = options;
    this.now = options.now ?? (() => new Date());
  }

  get enabled(): boolean {
    return this.options.enabled;
  }

  /** ID of the open session, or null */
  get sessionId(): string | null {
    return this.session?.id ?? null;
  }

  /**
   * Create the store if needed and insert the session row.
   * Returns the new session ID, or null when recording is disabled.
   * Store errors (permissions, corrupt file) propagate to the caller.
   */
  openSession(metadata: SessionMetadata): string | null {
    if (!this.options.enabled) {
      return null;
    }
    if (this.session) {
      throw new Error(`Session ${this.session.id} is already open`);
    }

    const db = openDatabase(this.options.dbPath);
    try {
      runMigrations(db, this.options.migrationsDir ?? getDefaultMigrationsDir());

      const id = generateSessionId();
      const startedAt = this.timestamp();
      createSession(db, id, metadata, startedAt);

      this.session = { id, db, startedAt };
      return id;
    } catch (error) {
      db.close();
      throw error;
    }
  }

  /**
   * Feed bytes typed by the user. Every completed line is written
   * immediately, in the order its Enter was pressed.
   */
  record(data: Uint8Array): void {
    if (!this.options.enabled || data.length === 0) {
      return;
    }

    for (const line of this.lines.push(data)) {
      this.write(line);
    }
  }

  /**
   * Flush the pending line, stamp the session as ended and release the
   * connection. A second call, or a call without an open session, does
   * nothing.
   *
   * The session is ended even when the final flush fails; the flush
   * error is rethrown afterwards.
   */
  closeSession(exitReason: ExitReason = "normal"): void {
    const session = this.session;
    if (!this.options.enabled || !session) {
      return;
    }
    this.session = null;

    try {
      try {
        const pending = this.lines.take();
        if (pending !== null) {
          insertMessage(session.db, session.id, this.timestamp(), pending);
        }
      } finally {
        // Never end before we started, even if the wall clock stepped back
        const now = this.timestamp();
        const endedAt = now < session.startedAt ? session.startedAt : now;
        endSession(session.db, session.id, endedAt, exitReason);
      }
    } finally {
      session.db.close();
    }
  }

  private write(content: string): void {
    if (!this.session) {
      return;
    }
    insertMessage(this.session.db, this.session.id, this.timestamp(), content);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
