/**
 * Proxy commands - manage the HTTP(S) proxy container.
 */

import * as path from "node:path";
import { requireRuntime, type CommandContext } from "../context.js";

export async function proxyStartCommand(
  context: CommandContext,
  options: { port?: number | undefined } = {}
): Promise<void> {
  const { config, output } = context;
  const { proxy } = config;
  const port = options.port ?? proxy.port;

  const runtime = await requireRuntime(context);
  await runtime.ensureNetwork(config.network);

  output.info(`Starting proxy on port ${port}`);
  await runtime.ensureProxy({
    image: proxy.image,
    dbPath: proxy.dbPath,
    caDir: proxy.caDir ?? path.join(path.dirname(proxy.dbPath), "mitmproxy"),
    port,
    network: config.network,
  });
  output.success("Proxy is running");
}

export async function proxyStopCommand(
  context: CommandContext,
  options: { force?: boolean | undefined } = {}
): Promise<void> {
  const runtime = await requireRuntime(context);
  const existing = await runtime.findProxy();
  if (!existing) {
    context.output.warning("Proxy is not running");
    return;
  }

  await runtime.stopContainer(existing.id, { force: options.force ?? false });
  context.output.success("Proxy stopped");
}

export async function proxyStatusCommand(context: CommandContext): Promise<void> {
  const runtime = await requireRuntime(context);
  const existing = await runtime.findProxy();
  if (!existing) {
    context.output.info("Proxy is not running");
    return;
  }

  context.output.info(`Proxy container: ${existing.name} (${existing.status})`);
}
