/**
 * Tests for the transcript recorder lifecycle.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  openDatabase,
  getSessionById,
  getMessagesBySession,
} from "../db/index.js";
import type { SessionMetadata } from "../types/index.js";
import { TranscriptRecorder } from "./recorder.js";

const metadata: SessionMetadata = {
  agent: "claude",
  image: "example/claude-container:latest",
  workspace: "/workspace",
  containerId: "abc123",
  containerName: "agentpod-claude-test",
  version: "0.3.0",
};

const bytes = (s: string): Uint8Array => Buffer.from(s, "latin1");

describe("TranscriptRecorder", () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-recorder-test-"));
    dbPath = path.join(tempDir, "nested", "logs.db");
  });

  afterEach(() => {
    if (fs.existsSync(tempDir)) {
      fs.rmSync(tempDir, { recursive: true, force: true });
    }
  });

  function messagesOf(sessionId: string): string[] {
    const db = openDatabase(dbPath);
    try {
      return getMessagesBySession(db, sessionId).map((m) => m.content);
    } finally {
      db.close();
    }
  }

  function record(...chunks: string[]): string[] {
    const recorder = new TranscriptRecorder({ dbPath, enabled: true });
    const sessionId = recorder.openSession(metadata)!;
    for (const chunk of chunks) {
      recorder.record(bytes(chunk));
    }
    recorder.closeSession();
    return messagesOf(sessionId);
  }

  describe("session lifecycle", () => {
    it("creates the store directory and schema", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      recorder.openSession(metadata);
      recorder.closeSession();

      const db = openDatabase(dbPath);
      const tables = (
        db
          .prepare("SELECT name FROM sqlite_master WHERE type = 'table'")
          .all() as { name: string }[]
      ).map((row) => row.name);
      const journal = db.pragma("journal_mode", { simple: true });
      db.close();

      expect(tables).toContain("sessions");
      expect(tables).toContain("messages");
      expect(journal).toBe("wal");
    });

    it("stores metadata exactly as given", () => {
      const recorder = new TranscriptRecorder({
        dbPath,
        enabled: true,
        now: () => new Date("2026-03-01T09:00:00.000Z"),
      });
      const sessionId = recorder.openSession(metadata);
      expect(sessionId).toMatch(/^[0-9a-f]{32}$/);

      const db = openDatabase(dbPath);
      const session = getSessionById(db, sessionId!);
      db.close();

      expect(session).toEqual({
        id: sessionId,
        ...metadata,
        startedAt: "2026-03-01T09:00:00.000Z",
        endedAt: null,
        exitReason: null,
      });
      recorder.closeSession();
    });

    it("sets ended_at and exit reason on close", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      const sessionId = recorder.openSession(metadata)!;
      recorder.closeSession("keyboard_interrupt");

      const db = openDatabase(dbPath);
      const session = getSessionById(db, sessionId)!;
      db.close();

      expect(session.endedAt).not.toBeNull();
      expect(session.endedAt! >= session.startedAt).toBe(true);
      expect(session.exitReason).toBe("keyboard_interrupt");
    });

    it("never ends before it started when the clock steps back", () => {
      const times = [
        new Date("2026-03-01T09:00:00.000Z"),
        new Date("2026-03-01T08:59:00.000Z"),
      ];
      const recorder = new TranscriptRecorder({
        dbPath,
        enabled: true,
        now: () => times.shift() ?? new Date("2026-03-01T08:58:00.000Z"),
      });
      const sessionId = recorder.openSession(metadata)!;
      recorder.closeSession();

      const db = openDatabase(dbPath);
      const session = getSessionById(db, sessionId)!;
      db.close();

      expect(session.endedAt).toBe("2026-03-01T09:00:00.000Z");
    });

    it("treats a second close as a no-op", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      const sessionId = recorder.openSession(metadata)!;
      recorder.closeSession("normal");
      recorder.closeSession("error");

      const db = openDatabase(dbPath);
      const session = getSessionById(db, sessionId)!;
      db.close();

      expect(session.exitReason).toBe("normal");
      expect(recorder.sessionId).toBeNull();
    });

    it("ends the session even when the final flush fails", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      const sessionId = recorder.openSession(metadata)!;
      recorder.record(bytes("unfinished"));

      const other = openDatabase(dbPath);
      other.exec(`
        CREATE TRIGGER reject_messages BEFORE INSERT ON messages
        BEGIN SELECT RAISE(ABORT, 'disk full'); END;
      `);
      other.close();

      expect(() => recorder.closeSession("error")).toThrow("disk full");
      expect(recorder.sessionId).toBeNull();

      const db = openDatabase(dbPath);
      const session = getSessionById(db, sessionId)!;
      db.close();

      expect(session.exitReason).toBe("error");
      expect(session.endedAt).not.toBeNull();
      expect(messagesOf(sessionId)).toEqual([]);
    });

    it("allows close without open", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      expect(() => recorder.closeSession()).not.toThrow();
      expect(fs.existsSync(dbPath)).toBe(false);
    });

    it("refuses to open a second session on the same recorder", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: true });
      recorder.openSession(metadata);
      expect(() => recorder.openSession(metadata)).toThrow(/already open/);
      recorder.closeSession();
    });

    it("propagates store errors from open", () => {
      const blocker = path.join(tempDir, "file");
      fs.writeFileSync(blocker, "");
      const recorder = new TranscriptRecorder({
        dbPath: path.join(blocker, "logs.db"),
        enabled: true,
      });
      expect(() => recorder.openSession(metadata)).toThrow();
      expect(recorder.sessionId).toBeNull();
    });
  });

  describe("message capture", () => {
    it("logs a message on Enter", () => {
      expect(record("ls\r")).toEqual(["ls"]);
    });

    it("assembles keystrokes delivered one at a time", () => {
      expect(record("h", "e", "l", "l", "o", "\r")).toEqual(["hello"]);
    });

    it("records several messages in order", () => {
      expect(record("first\rsecond\r")).toEqual(["first", "second"]);
    });

    it("writes nothing for Enter on an empty buffer", () => {
      expect(record("\r\r\r")).toEqual([]);
    });

    it("handles backspace", () => {
      expect(record("\x7f\x7fhi\r")).toEqual(["hi"]);
      expect(record("helo\x7flo\r")).toEqual(["hello"]);
    });

    it("filters escape sequences and tabs", () => {
      expect(record("\x1b[Ahello\x1b[B\r")).toEqual(["hello"]);
      expect(record("doc\tker\r")).toEqual(["docker"]);
    });

    it("filters an escape sequence split across calls", () => {
      expect(record("hi\x1b", "[Alo\r")).toEqual(["hilo"]);
    });

    it("flushes pending input as one final message on close", () => {
      expect(record("done\rpending")).toEqual(["done", "pending"]);
    });

    it("ignores empty input", () => {
      expect(record("", "x", "", "\r")).toEqual(["x"]);
    });
  });

  describe("disabled", () => {
    it("returns no ID and never creates the store", () => {
      const recorder = new TranscriptRecorder({ dbPath, enabled: false });

      expect(recorder.openSession(metadata)).toBeNull();
      recorder.record(bytes("data\r"));
      recorder.closeSession();

      expect(fs.existsSync(dbPath)).toBe(false);
      expect(fs.existsSync(path.dirname(dbPath))).toBe(false);
    });
  });
});
