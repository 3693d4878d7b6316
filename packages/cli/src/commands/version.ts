/**
 * Version command - agentpod, Node.js and Docker versions.
 */

import { AGENTPOD_VERSION, createLogger, describeError } from "@agentpod/core";
import type { CommandContext } from "../context.js";
import { toJson } from "../format.js";

const logger = createLogger("version");

export async function versionCommand(
  context: CommandContext,
  options: { json?: boolean | undefined } = {}
): Promise<void> {
  let docker = "unavailable";
  const connection = await context.connectRuntime();
  if (connection.ok) {
    try {
      docker = await connection.value.version();
    } catch (error) {
      logger.debug(`Docker version query failed: ${describeError(error)}`);
    }
  }

  const versions = { agentpod: AGENTPOD_VERSION, node: process.version, docker };
  if (options.json) {
    context.output.print(toJson(versions));
    return;
  }

  context.output.print(
    [
      `agentpod ${versions.agentpod}`,
      `Node.js  ${versions.node}`,
      `Docker   ${versions.docker}`,
    ].join("\n")
  );
}
