#!/usr/bin/env node
/**
 * @agentpod/cli
 *
 * Run coding agents in containers and record what you type to them.
 * Commands: run, stop, list, version, config, sessions, proxy
 */

import { Command, InvalidArgumentError } from "commander";
import {
  AGENTPOD_VERSION,
  AGENT_KINDS,
  ConfigError,
  EXIT,
  createConsoleOutput,
  type AgentKind,
} from "@agentpod/core";
import { createContext, runAction, type CommandContext } from "./context.js";
import { configPathCommand, configShowCommand } from "./commands/config.js";
import { listCommand } from "./commands/list.js";
import {
  proxyStartCommand,
  proxyStatusCommand,
  proxyStopCommand,
} from "./commands/proxy.js";
import { runCommand, type RunCommandOptions } from "./commands/run.js";
import { sessionsListCommand, sessionsShowCommand } from "./commands/sessions.js";
import { stopCommand } from "./commands/stop.js";
import { versionCommand } from "./commands/version.js";

/** Short hidden aliases for `run <agent>` */
const RUN_ALIASES: Readonly<Record<string, AgentKind>> = {
  c: "claude",
  g: "gemini",
  o: "opencode",
  d: "devstral",
  a: "auggie",
  p: "copilot",
  x: "codex",
};

const program = new Command();

program
  .name("agentpod")
  .description("Run AI coding agents in Docker containers")
  .version(AGENTPOD_VERSION)
  .option("--no-color", "Disable coloured output");

async function execute(
  action: (context: CommandContext) => Promise<void>
): Promise<void> {
  const { color } = program.opts<{ color: boolean }>();
  let context: CommandContext;
  try {
    context = createContext({ noColor: !color });
  } catch (error) {
    if (error instanceof ConfigError) {
      createConsoleOutput({ noColor: !color }).error(error.message);
      process.exitCode = EXIT.CONFIG_ERROR;
      return;
    }
    throw error;
  }
  process.exitCode = await runAction(context, action);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError("Expected a port between 1 and 65535.");
  }
  return port;
}

function withRunOptions(command: Command): Command {
  return command
    .option("-w, --workspace <dir>", "Workspace directory", ".")
    .option("--pull", "Pull the latest image before running")
    .option("-d, --detach", "Run the container in the background")
    .option("-e, --env <KEY=VALUE>", "Environment variable (repeatable)", collect, [])
    .option("--name <name>", "Custom container name");
}

withRunOptions(program.command("run [agent]"))
  .description("Start an agent container and attach to it")
  .action(async (agent: string | undefined, options: RunCommandOptions) => {
    await execute((context) => runCommand(context, agent, options));
  });

const aliases: [string, AgentKind][] = [
  ...Object.entries(RUN_ALIASES),
  ...AGENT_KINDS.map((kind): [string, AgentKind] => [kind, kind]),
];
for (const [alias, kind] of aliases) {
  withRunOptions(program.command(alias, { hidden: true }))
    .description(`Run ${kind}`)
    .action(async (options: RunCommandOptions) => {
      await execute((context) => runCommand(context, kind, options));
    });
}

program
  .command("stop [agent]")
  .description("Stop an agent's containers, or all managed containers")
  .option("-a, --all", "Stop all agentpod managed containers")
  .option("-f, --force", "Stop without waiting for a clean shutdown")
  .action(async (agent: string | undefined, options) => {
    await execute((context) => stopCommand(context, agent, options));
  });

program
  .command("list")
  .description("List agents and their containers")
  .option("-r, --running", "Show only running agents")
  .option("--json", "Output JSON")
  .action(async (options) => {
    await execute((context) => listCommand(context, options));
  });

program
  .command("version")
  .description("Show agentpod, Node.js and Docker versions")
  .option("--json", "Output JSON")
  .action(async (options) => {
    await execute((context) => versionCommand(context, options));
  });

// Config subcommand group
const config = program.command("config").description("Inspect configuration");

config
  .command("show")
  .description("Show the effective configuration")
  .option("--json", "Output JSON instead of YAML")
  .action(async (options) => {
    await execute((context) => configShowCommand(context, options));
  });

config
  .command("path")
  .description("Show configuration file locations")
  .option("--global", "Only the global config file")
  .option("--project", "Only the project config file")
  .action(async (options) => {
    await execute((context) => configPathCommand(context, options));
  });

// Sessions subcommand group
const sessions = program
  .command("sessions")
  .description("Browse recorded sessions");

sessions
  .command("list")
  .description("List recorded sessions, newest first")
  .option("--agent <kind>", "Only sessions for this agent")
  .option("-n, --limit <n>", "Maximum number of sessions")
  .option("--json", "Output JSON")
  .action(async (options) => {
    await execute((context) => sessionsListCommand(context, options));
  });

sessions
  .command("show <id>")
  .description("Show a session and its messages")
  .option("--json", "Output JSON")
  .action(async (id: string, options) => {
    await execute((context) => sessionsShowCommand(context, id, options));
  });

// Proxy subcommand group
const proxy = program.command("proxy").description("Manage the HTTP(S) proxy");

proxy
  .command("start")
  .description("Start the proxy container")
  .option("--port <port>", "Proxy port", parsePort)
  .action(async (options) => {
    await execute((context) => proxyStartCommand(context, options));
  });

proxy
  .command("stop")
  .description("Stop the proxy container")
  .option("-f, --force", "Stop without waiting for a clean shutdown")
  .action(async (options) => {
    await execute((context) => proxyStopCommand(context, options));
  });

proxy
  .command("status")
  .description("Show proxy container status")
  .action(async () => {
    await execute((context) => proxyStatusCommand(context));
  });

await program.parseAsync();
