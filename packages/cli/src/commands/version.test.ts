/**
 * Tests for the version command
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runAction } from "../context.js";
import { FakeRuntime, createTestContext } from "../test-utils.js";
import { versionCommand } from "./version.js";

describe("versionCommand", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-version-test-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("prints agentpod, Node.js and Docker versions", async () => {
    const ctx = createTestContext({
      configDir: tempDir,
      cwd: tempDir,
      runtime: new FakeRuntime(),
    });

    await runAction(ctx, (c) => versionCommand(c));

    expect(ctx.output.printed).toEqual([
      `agentpod 0.3.0\nNode.js  ${process.version}\nDocker   27.0.3`,
    ]);
  });

  it("reports Docker as unavailable", async () => {
    const ctx = createTestContext({
      configDir: tempDir,
      cwd: tempDir,
      runtime: { kind: "unavailable", message: "Docker is not available: connect ENOENT" },
    });

    await runAction(ctx, (c) => versionCommand(c, { json: true }));

    expect(JSON.parse(ctx.output.printed[0] ?? "{}")).toEqual({
      agentpod: "0.3.0",
      node: process.version,
      docker: "unavailable",
    });
  });
});
