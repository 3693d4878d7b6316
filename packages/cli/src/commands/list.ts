/**
 * List command - known agents and their containers.
 */

import { AGENT_KINDS, EXIT, effectiveAgentImage } from "@agentpod/core";
import type { ManagedContainer } from "@agentpod/containers";
import { CommandError, type CommandContext } from "../context.js";
import { formatTable, toJson } from "../format.js";

export interface ListCommandOptions {
  running?: boolean | undefined;
  json?: boolean | undefined;
}

export interface AgentRow {
  agent: string;
  image: string;
  status: string;
  workspace: string;
}

export async function listCommand(
  context: CommandContext,
  options: ListCommandOptions = {}
): Promise<void> {
  const { config, output } = context;

  let containers: ManagedContainer[] = [];
  const connection = await context.connectRuntime();
  if (connection.ok) {
    containers = await connection.value.listManaged({ all: true });
  } else if (options.running) {
    throw new CommandError(connection.error.message, EXIT.DOCKER_NOT_RUNNING);
  }

  const byAgent = new Map<string, ManagedContainer>();
  for (const container of containers) {
    if (container.agent && !byAgent.has(container.agent)) {
      byAgent.set(container.agent, container);
    }
  }

  let rows: AgentRow[] = AGENT_KINDS.map((kind) => {
    const container = byAgent.get(kind);
    return {
      agent: kind,
      image: effectiveAgentImage(kind, config),
      status: container?.status ?? "stopped",
      workspace: container?.workspace ?? "-",
    };
  });
  if (options.running) {
    rows = rows.filter((row) => row.status === "running");
  }

  if (options.json) {
    output.print(toJson(rows));
    return;
  }

  output.print(
    formatTable<AgentRow>(
      [
        { header: "AGENT", width: 10, value: (row) => row.agent },
        { header: "IMAGE", width: 40, value: (row) => row.image },
        { header: "STATUS", width: 10, value: (row) => row.status },
        { header: "WORKSPACE", width: 20, value: (row) => row.workspace },
      ],
      rows
    )
  );
}
