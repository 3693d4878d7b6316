/**
 * Tests for the sessions commands
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  EXIT,
  createSession,
  endSession,
  getDefaultMigrationsDir,
  insertMessage,
  openDatabase,
  runMigrations,
} from "@agentpod/core";
import { runAction } from "../context.js";
import { createTestContext } from "../test-utils.js";
import {
  parseLimit,
  sessionsListCommand,
  sessionsShowCommand,
} from "./sessions.js";

const FIRST = "11111111111111111111111111111111";
const SECOND = "22222222222222222222222222222222";

describe("parseLimit", () => {
  it("accepts positive integers", () => {
    expect(parseLimit("5")).toBe(5);
    expect(parseLimit(undefined)).toBeUndefined();
  });

  it.each(["0", "-1", "2.5", "ten"])("rejects %s", (value) => {
    expect(() => parseLimit(value)).toThrow(
      `Invalid --limit '${value}', expected a positive integer`
    );
  });
});

describe("sessions commands", () => {
  let tempDir: string;
  let dbPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-sessions-test-"));
    dbPath = path.join(tempDir, "logs.db");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const context = () => createTestContext({ configDir: tempDir, cwd: tempDir });

  function seed(): void {
    const db = openDatabase(dbPath);
    try {
      runMigrations(db, getDefaultMigrationsDir());
      createSession(
        db,
        FIRST,
        {
          agent: "claude",
          image: "example/claude-container:latest",
          workspace: "/work/one",
          containerId: "c0ffee000000abcd",
          containerName: "agentpod-claude-a1",
          version: "0.3.0",
        },
        "2026-01-01T10:00:00.000Z"
      );
      insertMessage(db, FIRST, "2026-01-01T10:00:05.000Z", "ls");
      insertMessage(db, FIRST, "2026-01-01T10:00:09.000Z", "git status");
      endSession(db, FIRST, "2026-01-01T10:05:00.000Z", "normal");

      createSession(
        db,
        SECOND,
        {
          agent: "codex",
          image: "example/codex-cli:latest",
          workspace: "/work/two",
          containerId: "beef00000000",
          containerName: "agentpod-codex-b2",
          version: "0.3.0",
        },
        "2026-01-02T09:00:00.000Z"
      );
    } finally {
      db.close();
    }
  }

  describe("sessionsListCommand", () => {
    it("reports an empty store without creating it", async () => {
      const ctx = context();

      await runAction(ctx, (c) => sessionsListCommand(c));

      expect(ctx.output.printed).toEqual(["No sessions found."]);
      expect(fs.existsSync(dbPath)).toBe(false);
    });

    it("lists sessions newest first with message counts", async () => {
      seed();
      const ctx = context();

      await runAction(ctx, (c) => sessionsListCommand(c, { json: true }));

      const listed = JSON.parse(ctx.output.printed[0] ?? "[]");
      expect(
        listed.map((s: { id: string; messageCount: number }) => [s.id, s.messageCount])
      ).toEqual([
        [SECOND, 0],
        [FIRST, 2],
      ]);
    });

    it("filters by agent and limits the count", async () => {
      seed();
      const byAgent = context();
      const limited = context();

      await runAction(byAgent, (c) =>
        sessionsListCommand(c, { agent: "claude", json: true })
      );
      await runAction(limited, (c) =>
        sessionsListCommand(c, { limit: "1", json: true })
      );

      const ids = (printed: string[]) =>
        JSON.parse(printed[0] ?? "[]").map((s: { id: string }) => s.id);
      expect(ids(byAgent.output.printed)).toEqual([FIRST]);
      expect(ids(limited.output.printed)).toEqual([SECOND]);
    });

    it("prints a table with the session status", async () => {
      seed();
      const ctx = context();

      await runAction(ctx, (c) => sessionsListCommand(c));

      const lines = (ctx.output.printed[0] ?? "").split("\n");
      expect(lines).toHaveLength(4);
      expect(lines[0]).toMatch(/^ID\s+AGENT\s+STARTED\s+STATUS\s+MESSAGES$/);
      expect(lines[2]).toMatch(
        new RegExp(`^${SECOND}\\s+codex\\s+2026-01-02T09:00:00\\.000Z\\s+active\\s+0$`)
      );
      expect(lines[3]).toMatch(
        new RegExp(`^${FIRST}\\s+claude\\s+2026-01-01T10:00:00\\.000Z\\s+normal\\s+2$`)
      );
    });

    it("rejects a bad limit", async () => {
      const ctx = context();

      const code = await runAction(ctx, (c) =>
        sessionsListCommand(c, { limit: "0" })
      );

      expect(code).toBe(EXIT.INVALID_ARGS);
      expect(ctx.output.lines).toEqual([
        "error: Invalid --limit '0', expected a positive integer",
      ]);
    });

    it("rejects an unknown agent filter", async () => {
      const ctx = context();

      const code = await runAction(ctx, (c) =>
        sessionsListCommand(c, { agent: "cobol" })
      );

      expect(code).toBe(EXIT.INVALID_ARGS);
    });
  });

  describe("sessionsShowCommand", () => {
    it("prints the session and its transcript", async () => {
      seed();
      const ctx = context();

      await runAction(ctx, (c) => sessionsShowCommand(c, FIRST));

      expect(ctx.output.printed).toEqual([
        [
          "Session Details",
          "===============",
          `ID:         ${FIRST}`,
          "Agent:      claude",
          "Image:      example/claude-container:latest",
          "Workspace:  /work/one",
          "Container:  agentpod-claude-a1 (c0ffee000000)",
          "Started:    2026-01-01T10:00:00.000Z",
          "Ended:      2026-01-01T10:05:00.000Z",
          "Exit:       normal",
          "Version:    0.3.0",
          "Messages:   2",
          "",
          "[2026-01-01T10:00:05.000Z] ls",
          "[2026-01-01T10:00:09.000Z] git status",
        ].join("\n"),
      ]);
    });

    it("marks an open session as active", async () => {
      seed();
      const ctx = context();

      await runAction(ctx, (c) => sessionsShowCommand(c, SECOND));

      const lines = (ctx.output.printed[0] ?? "").split("\n");
      expect(lines).toContain("Ended:      N/A");
      expect(lines).toContain("Exit:       active");
      expect(lines.at(-1)).toBe("Messages:   0");
    });

    it("prints JSON with the messages", async () => {
      seed();
      const ctx = context();

      await runAction(ctx, (c) => sessionsShowCommand(c, FIRST, { json: true }));

      const shown = JSON.parse(ctx.output.printed[0] ?? "{}");
      expect(shown.session.exitReason).toBe("normal");
      expect(
        shown.messages.map((m: { content: string }) => m.content)
      ).toEqual(["ls", "git status"]);
    });

    it("fails for an unknown session", async () => {
      seed();
      const ctx = context();

      const code = await runAction(ctx, (c) => sessionsShowCommand(c, "nope"));

      expect(code).toBe(EXIT.ERROR);
      expect(ctx.output.lines).toEqual(["error: Session not found: nope"]);
    });

    it("fails when there is no store yet", async () => {
      const ctx = context();

      const code = await runAction(ctx, (c) => sessionsShowCommand(c, FIRST));

      expect(code).toBe(EXIT.ERROR);
      expect(fs.existsSync(dbPath)).toBe(false);
    });
  });
});
