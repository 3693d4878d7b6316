/**
 * Stop command - stop one agent's containers, or every managed container.
 */

import { isAgentKind } from "@agentpod/core";
import { UsageError, requireRuntime, type CommandContext } from "../context.js";

export interface StopCommandOptions {
  all?: boolean | undefined;
  force?: boolean | undefined;
}

export async function stopCommand(
  context: CommandContext,
  agent: string | undefined,
  options: StopCommandOptions = {}
): Promise<void> {
  if (!options.all && agent === undefined) {
    throw new UsageError("Provide an AGENT or use --all");
  }
  if (agent !== undefined && !isAgentKind(agent)) {
    throw new UsageError(`Unknown agent '${agent}'`);
  }

  const runtime = await requireRuntime(context);
  const force = options.force ?? false;

  if (options.all || agent === undefined) {
    const stopped = await runtime.stopAll({ force });
    context.output.success(`Stopped ${stopped} container(s)`);
    return;
  }

  const stopped = await runtime.stopAgent(agent, { force });
  context.output.success(`Stopped ${stopped} container(s) for ${agent}`);
}
