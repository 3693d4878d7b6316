/**
 * Tests for the proxy commands
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { EXIT } from "@agentpod/core";
import { runAction } from "../context.js";
import { FakeRuntime, createTestContext } from "../test-utils.js";
import {
  proxyStartCommand,
  proxyStatusCommand,
  proxyStopCommand,
} from "./proxy.js";

describe("proxy commands", () => {
  let tempDir: string;
  let runtime: FakeRuntime;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-proxy-cmd-test-"));
    runtime = new FakeRuntime();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const context = () =>
    createTestContext({ configDir: tempDir, cwd: tempDir, runtime });

  const running = () => ({
    id: "proxy0000000",
    name: "agentpod-proxy",
    image: "example/proxy:latest",
    status: "running",
    agent: null,
    workspace: null,
    role: "proxy",
  });

  it("starts the proxy on the requested port", async () => {
    const ctx = context();

    const code = await runAction(ctx, (c) => proxyStartCommand(c, { port: 9090 }));

    expect(code).toBe(EXIT.SUCCESS);
    expect(runtime.calls).toEqual(["network agentpod-network", "ensure-proxy"]);
    expect(runtime.proxyOptions).toEqual([
      {
        image: "example/proxy:latest",
        dbPath: path.join(tempDir, "proxy", "proxy.db"),
        caDir: path.join(tempDir, "proxy", "mitmproxy"),
        port: 9090,
        network: "agentpod-network",
      },
    ]);
    expect(ctx.output.lines).toEqual([
      "info: Starting proxy on port 9090",
      "success: Proxy is running",
    ]);
  });

  it("uses the configured port by default", async () => {
    const ctx = createTestContext({
      configDir: tempDir,
      cwd: tempDir,
      runtime,
      env: { AP_PROXY_PORT: "3128" },
    });

    await runAction(ctx, (c) => proxyStartCommand(c));

    expect(runtime.proxyOptions[0]?.port).toBe(3128);
  });

  it("stops a running proxy", async () => {
    runtime.proxy = running();
    const ctx = context();

    await runAction(ctx, (c) => proxyStopCommand(c, { force: true }));

    expect(runtime.calls).toEqual(["find-proxy", "stop proxy0000000 force"]);
    expect(ctx.output.lines).toEqual(["success: Proxy stopped"]);
  });

  it("warns when there is no proxy to stop", async () => {
    const ctx = context();

    const code = await runAction(ctx, (c) => proxyStopCommand(c));

    expect(code).toBe(EXIT.SUCCESS);
    expect(runtime.calls).toEqual(["find-proxy"]);
    expect(ctx.output.lines).toEqual(["warning: Proxy is not running"]);
  });

  it("reports the proxy container status", async () => {
    runtime.proxy = { ...running(), status: "exited" };
    const stopped = context();
    await runAction(stopped, (c) => proxyStatusCommand(c));

    runtime.proxy = null;
    const missing = context();
    await runAction(missing, (c) => proxyStatusCommand(c));

    expect(stopped.output.lines).toEqual([
      "info: Proxy container: agentpod-proxy (exited)",
    ]);
    expect(missing.output.lines).toEqual(["info: Proxy is not running"]);
  });
});
