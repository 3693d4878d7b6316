import { describe, it, expect, afterEach } from "vitest";
import {
  createLogger,
  describeError,
  getLogLevel,
  setLogLevel,
} from "./logger.js";

describe("createLogger", () => {
  afterEach(() => {
    setLogLevel("info");
  });

  it("prefixes lines with timestamp, scope and level", () => {
    const lines: string[] = [];
    const log = createLogger("bridge", { write: (line) => lines.push(line) });

    log.info("attached");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(
      /^\[\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z\] \[agentpod:bridge\] info: attached\n$/
    );
  });

  it("drops lines below the threshold", () => {
    const lines: string[] = [];
    const log = createLogger("test", { write: (line) => lines.push(line) });

    log.debug("hidden");
    setLogLevel("debug");
    log.debug("shown");
    setLogLevel("error");
    log.warn("hidden");

    expect(lines).toHaveLength(1);
    expect(lines[0]).toContain("debug: shown");
  });

  it("ignores unknown levels", () => {
    setLogLevel("verbose");
    expect(getLogLevel()).toBe("info");
  });
});

describe("describeError", () => {
  it("uses the message of errors and stringifies anything else", () => {
    expect(describeError(new Error("boom"))).toBe("boom");
    expect(describeError(42)).toBe("42");
  });
});
