import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import {
  readContainerMapping,
  updateContainerMapping,
} from "./container-mapping.js";

const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

describe("container mapping", () => {
  let tempDir: string;
  let mappingPath: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-mapping-test-"));
    mappingPath = path.join(tempDir, "proxy", "containers.json");
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("creates the file with one entry", () => {
    const updated = updateContainerMapping(
      mappingPath,
      "172.18.0.3",
      { container_id: "abc123", container_name: "agentpod-claude-test", agent: "claude" },
      fixedNow
    );

    expect(updated).toBe(true);
    expect(JSON.parse(fs.readFileSync(mappingPath, "utf-8"))).toEqual({
      "172.18.0.3": {
        container_id: "abc123",
        container_name: "agentpod-claude-test",
        agent: "claude",
        started_at: "2026-01-02T03:04:05.000Z",
      },
    });
    expect(fs.readdirSync(path.dirname(mappingPath))).toEqual(["containers.json"]);
  });

  it("keeps other entries and replaces the same IP", () => {
    updateContainerMapping(
      mappingPath,
      "172.18.0.3",
      { container_id: "old", container_name: "old-name", agent: "claude" },
      fixedNow
    );
    updateContainerMapping(
      mappingPath,
      "172.18.0.4",
      { container_id: "other", container_name: "other-name", agent: "codex" },
      fixedNow
    );
    updateContainerMapping(
      mappingPath,
      "172.18.0.3",
      { container_id: "new", container_name: "new-name", agent: "gemini" },
      fixedNow
    );

    const mapping = readContainerMapping(mappingPath);
    expect(Object.keys(mapping).sort()).toEqual(["172.18.0.3", "172.18.0.4"]);
    expect(mapping["172.18.0.3"]?.container_id).toBe("new");
    expect(mapping["172.18.0.4"]?.agent).toBe("codex");
  });

  it("treats a corrupt file as empty", () => {
    fs.mkdirSync(path.dirname(mappingPath), { recursive: true });
    fs.writeFileSync(mappingPath, "{not json");

    expect(
      updateContainerMapping(
        mappingPath,
        "10.0.0.2",
        { container_id: "c1", container_name: "n1", agent: "claude" },
        fixedNow
      )
    ).toBe(true);
    expect(Object.keys(readContainerMapping(mappingPath))).toEqual(["10.0.0.2"]);
  });

  it("returns false when the file cannot be written", () => {
    const blocked = path.join(tempDir, "blocker");
    fs.writeFileSync(blocked, "");

    expect(
      updateContainerMapping(
        path.join(blocked, "containers.json"),
        "10.0.0.2",
        { container_id: "c1", container_name: "n1", agent: "claude" },
        fixedNow
      )
    ).toBe(false);
  });

  it("reads a missing file as empty", () => {
    expect(readContainerMapping(mappingPath)).toEqual({});
  });
});
