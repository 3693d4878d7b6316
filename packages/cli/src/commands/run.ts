/**
 * Run command - start an agent container and attach to it.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import {
  AGENT_KINDS,
  AGENTPOD_VERSION,
  EXIT,
  TranscriptRecorder,
  agentConfigDir,
  createLogger,
  describeError,
  effectiveAgentImage,
  expandHome,
  getAgentSpec,
  isAgentKind,
  updateContainerMapping,
  type ExitReason,
} from "@agentpod/core";
import {
  PROXY_CA_MOUNT,
  parseVolumeSpec,
  proxyEnvironment,
  type ContainerRuntime,
  type VolumeMount,
} from "@agentpod/containers";
import {
  InterruptedError,
  TerminalBridge,
  type BridgeOptions,
  type InputRecorder,
  type RemoteStream,
} from "@agentpod/terminal";
import {
  CommandError,
  UsageError,
  requireRuntime,
  type CommandContext,
} from "../context.js";

const logger = createLogger("run");

const CA_WAIT_MS = 10_000;
const CA_POLL_MS = 250;
const CRASH_LOG_LINES = 50;

export interface RunCommandOptions {
  workspace?: string | undefined;
  pull?: boolean | undefined;
  detach?: boolean | undefined;
  env?: string[] | undefined;
  name?: string | undefined;
}

export interface Bridge {
  begin(
    remote: RemoteStream,
    recorder?: InputRecorder | null,
    options?: BridgeOptions
  ): Promise<void>;
}

export interface RunDependencies {
  bridge?: Bridge | undefined;
  /** Aborts the attached session; defaults to SIGINT/SIGTERM */
  signal?: AbortSignal | undefined;
  /** Resolves true once the file exists, false after the timeout */
  waitForFile?: ((filePath: string, timeoutMs: number) => Promise<boolean>) | undefined;
}

/** Parse repeated KEY=VALUE options */
export function parseEnvPairs(values: readonly string[]): Record<string, string> {
  const parsed: Record<string, string> = {};
  for (const entry of values) {
    const separator = entry.indexOf("=");
    if (separator === -1) {
      throw new UsageError(`Invalid --env value '${entry}', expected KEY=VALUE`);
    }
    const key = entry.slice(0, separator);
    if (!key) {
      throw new UsageError("Environment variable key cannot be empty");
    }
    parsed[key] = entry.slice(separator + 1);
  }
  return parsed;
}

async function pollForFile(filePath: string, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (Date.now() < deadline) {
    if (fs.existsSync(filePath)) {
      return true;
    }
    await sleep(CA_POLL_MS);
  }
  return fs.existsSync(filePath);
}

function hostIds(): Record<string, string> {
  const uid = process.getuid?.();
  const gid = process.getgid?.();
  return uid === undefined || gid === undefined
    ? {}
    : { USER_UID: String(uid), USER_GID: String(gid) };
}

/** Abort on SIGINT/SIGTERM until disposed */
function interruptSignal(): { signal: AbortSignal; dispose: () => void } {
  const controller = new AbortController();
  const onSignal = (): void => {
    controller.abort();
  };
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);
  return {
    signal: controller.signal,
    dispose: () => {
      process.off("SIGINT", onSignal);
      process.off("SIGTERM", onSignal);
    },
  };
}

function resolveWorkspace(context: CommandContext, workspace: string): string {
  const resolved = path.resolve(context.cwd, expandHome(workspace));
  if (!fs.existsSync(resolved) || !fs.statSync(resolved).isDirectory()) {
    throw new UsageError(`Workspace not found: ${resolved}`);
  }
  return resolved;
}

export async function runCommand(
  context: CommandContext,
  agentArg: string | undefined,
  options: RunCommandOptions = {},
  deps: RunDependencies = {}
): Promise<void> {
  const { config, output, env } = context;
  const kind = agentArg ?? config.defaultAgent;

  if (!isAgentKind(kind)) {
    throw new UsageError(
      `Unknown agent '${kind}'. Supported: ${AGENT_KINDS.join(", ")}`
    );
  }
  const agentConfig = config.agents[kind];
  if (!agentConfig.enabled) {
    throw new CommandError(`Agent '${kind}' is disabled in config`);
  }

  const workspace = resolveWorkspace(context, options.workspace ?? ".");
  const cliEnv = parseEnvPairs(options.env ?? []);
  const volumes: VolumeMount[] = agentConfig.volumes.map((spec) => {
    try {
      return parseVolumeSpec(spec);
    } catch (error) {
      throw new CommandError(
        `agents.${kind}.volumes: ${describeError(error)}`,
        EXIT.CONFIG_ERROR
      );
    }
  });

  const spec = getAgentSpec(kind, env);
  const containerEnv: Record<string, string> = {
    ...hostIds(),
    ...spec.env,
    ...agentConfig.env,
    ...cliEnv,
  };
  const image = effectiveAgentImage(kind, config);

  const runtime = await requireRuntime(context);
  await runtime.ensureNetwork(config.network);

  if (options.pull || config.autoPull) {
    output.info(`Pulling image: ${image}`);
    await runtime.pullImage(image);
  }

  const configDir = agentConfigDir(kind, env);
  fs.mkdirSync(configDir, { recursive: true });

  const { proxy } = config;
  if (proxy.enabled) {
    const caDir = proxy.caDir ?? path.join(path.dirname(proxy.dbPath), "mitmproxy");
    await runtime.ensureProxy({
      image: proxy.image,
      dbPath: proxy.dbPath,
      caDir,
      port: proxy.port,
      network: config.network,
    });

    if (proxy.caPath) {
      const waitForFile = deps.waitForFile ?? pollForFile;
      if (!(await waitForFile(proxy.caPath, CA_WAIT_MS))) {
        output.warning(`Proxy CA not found yet at ${proxy.caPath}`);
      }
    }

    for (const [key, value] of Object.entries(proxyEnvironment(proxy.port))) {
      if (!(key in containerEnv)) {
        containerEnv[key] = value;
      }
    }
    if (proxy.caDir) {
      volumes.push({ host: proxy.caDir, container: PROXY_CA_MOUNT, mode: "ro" });
    }
  }

  output.info(`Starting ${kind} with image ${image}`);
  const container = await runtime.runAgent({
    agent: spec,
    image,
    workspace,
    configDir,
    env: containerEnv,
    autoRemove: config.autoRemove,
    name: options.name ?? null,
    network: config.network,
    extraVolumes: volumes,
    version: AGENTPOD_VERSION,
  });

  if (!container.running) {
    const recent = await runtime
      .containerLogs(container.id, CRASH_LOG_LINES)
      .catch((error: unknown) => {
        logger.debug(`No logs for ${container.id}: ${describeError(error)}`);
        return "";
      });
    if (recent.trim()) {
      output.print(recent);
    }
    throw new CommandError(
      "Container exited immediately after start.",
      EXIT.CONTAINER_ERROR
    );
  }

  if (proxy.enabled) {
    const ip = container.networks[config.network];
    if (ip) {
      const mappingPath = path.join(path.dirname(proxy.dbPath), "containers.json");
      const updated = updateContainerMapping(mappingPath, ip, {
        container_id: container.id,
        container_name: container.name,
        agent: kind,
      });
      if (!updated) {
        output.warning(
          `Could not write proxy container mapping at ${mappingPath}. ` +
            "Fix proxy directory permissions to restore container attribution."
        );
      }
    }
  }

  if (options.detach) {
    output.success(`Started ${container.name}`);
    return;
  }

  await attachSession(context, runtime, container, { kind, image, workspace }, deps);
}

async function attachSession(
  context: CommandContext,
  runtime: ContainerRuntime,
  container: { id: string; name: string },
  session: { kind: string; image: string; workspace: string },
  deps: RunDependencies
): Promise<void> {
  const { config, output } = context;
  const remote = await runtime.attach(container.id);

  let recorder: TranscriptRecorder | null = new TranscriptRecorder({
    dbPath: config.logging.dbPath,
    enabled: config.logging.enabled,
  });
  try {
    recorder.openSession({
      agent: session.kind,
      image: session.image,
      workspace: session.workspace,
      containerId: container.id,
      containerName: container.name,
      version: AGENTPOD_VERSION,
    });
  } catch (error) {
    output.warning(`Session logging disabled: ${describeError(error)}`);
    recorder = null;
  }

  const interrupts = deps.signal ? null : interruptSignal();
  const signal = deps.signal ?? interrupts?.signal;
  const bridge = deps.bridge ?? new TerminalBridge();

  let exitReason: ExitReason = "normal";
  output.warning("Attached to container. Exit the agent to end the session.");
  try {
    await bridge.begin(remote, recorder, { signal });
  } catch (error) {
    if (!(error instanceof InterruptedError)) {
      exitReason = "error";
      throw error;
    }
    exitReason = "keyboard_interrupt";
    output.info("Stopping container...");
    await runtime.stopContainer(container.id);
    output.success("Stopped");
  } finally {
    interrupts?.dispose();
    try {
      recorder?.closeSession(exitReason);
    } catch (error) {
      output.warning(`Could not close the session log: ${describeError(error)}`);
    }
  }
}
