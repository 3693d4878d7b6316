/**
 * Test doubles for the command layer.
 */

import { Duplex } from "node:stream";
import {
  loadRawConfig,
  toConfig,
  type OutputSink,
} from "@agentpod/core";
import type {
  ContainerDetails,
  ContainerRuntime,
  DockerError,
  EnsureProxyOptions,
  ManagedContainer,
  RunAgentOptions,
  StopOptions,
} from "@agentpod/containers";
import type { RemoteStream } from "@agentpod/terminal";
import type { CommandContext } from "./context.js";

export interface CapturedOutput extends OutputSink {
  /** "<level>: <message>" per call */
  lines: string[];
  /** Text passed to print() */
  printed: string[];
}

export function captureOutput(): CapturedOutput {
  const lines: string[] = [];
  const printed: string[] = [];
  return {
    lines,
    printed,
    info: (message) => lines.push(`info: ${message}`),
    success: (message) => lines.push(`success: ${message}`),
    warning: (message) => lines.push(`warning: ${message}`),
    error: (message) => lines.push(`error: ${message}`),
    print: (text) => printed.push(text),
  };
}

/** In-memory ContainerRuntime recording every call */
export class FakeRuntime implements ContainerRuntime {
  readonly calls: string[] = [];
  readonly runOptions: RunAgentOptions[] = [];
  readonly proxyOptions: EnsureProxyOptions[] = [];
  containers: ManagedContainer[] = [];
  proxy: ManagedContainer | null = null;
  running = true;
  logs = "";
  ip: string | null = "172.18.0.3";
  remoteStream = new Duplex({
    read() {
      // never produces data
    },
    write(_chunk: Buffer, _encoding, callback) {
      callback();
    },
  });

  async version(): Promise<string> {
    this.calls.push("version");
    return "27.0.3";
  }

  async pullImage(image: string): Promise<void> {
    this.calls.push(`pull ${image}`);
  }

  async ensureNetwork(name: string): Promise<void> {
    this.calls.push(`network ${name}`);
  }

  async runAgent(options: RunAgentOptions): Promise<ContainerDetails> {
    this.calls.push(`run ${options.agent.kind}`);
    this.runOptions.push(options);
    return this.details(options.name ?? `agentpod-${options.agent.kind}-00000000`, options.network);
  }

  private details(name: string, network: string): ContainerDetails {
    return {
      id: "c0ffee000000",
      name,
      status: this.running ? "running" : "exited",
      running: this.running,
      networks: { [network]: this.ip },
    };
  }

  async inspect(id: string): Promise<ContainerDetails> {
    this.calls.push(`inspect ${id}`);
    return this.details("agentpod-test", "agentpod-network");
  }

  async containerLogs(id: string, tail: number): Promise<string> {
    this.calls.push(`logs ${id} ${tail}`);
    return this.logs;
  }

  async stopContainer(id: string, options: StopOptions = {}): Promise<void> {
    this.calls.push(`stop ${id}${options.force ? " force" : ""}`);
  }

  async listManaged(): Promise<ManagedContainer[]> {
    this.calls.push("list");
    return this.containers;
  }

  async stopAgent(agent: string, options: StopOptions = {}): Promise<number> {
    this.calls.push(`stop-agent ${agent}${options.force ? " force" : ""}`);
    return this.containers.filter((c) => c.agent === agent).length;
  }

  async stopAll(options: StopOptions = {}): Promise<number> {
    this.calls.push(`stop-all${options.force ? " force" : ""}`);
    return this.containers.length;
  }

  async ensureProxy(options: EnsureProxyOptions): Promise<ManagedContainer> {
    this.calls.push("ensure-proxy");
    this.proxyOptions.push(options);
    return {
      id: "proxy0000000",
      name: "agentpod-proxy",
      image: options.image,
      status: "running",
      agent: null,
      workspace: null,
      role: "proxy",
    };
  }

  async findProxy(): Promise<ManagedContainer | null> {
    this.calls.push("find-proxy");
    return this.proxy;
  }

  async attach(id: string): Promise<RemoteStream> {
    this.calls.push(`attach ${id}`);
    return {
      stream: this.remoteStream,
      resize: async () => {
        this.calls.push("resize");
      },
      close: () => {
        this.calls.push("detach");
      },
    };
  }
}

export interface TestContextOptions {
  /** Config root, used as AP_CONFIG_DIR */
  configDir: string;
  cwd: string;
  runtime?: ContainerRuntime | DockerError | undefined;
  env?: NodeJS.ProcessEnv | undefined;
}

export function createTestContext(
  options: TestContextOptions
): CommandContext & { output: CapturedOutput } {
  const env: NodeJS.ProcessEnv = {
    AP_CONFIG_DIR: options.configDir,
    AP_IMAGE_NAMESPACE: "example",
    ...options.env,
  };
  const rawConfig = loadRawConfig({ env, cwd: options.cwd });
  const runtime = options.runtime ?? new FakeRuntime();

  return {
    config: toConfig(rawConfig, env),
    rawConfig,
    env,
    cwd: options.cwd,
    output: captureOutput(),
    connectRuntime: async () =>
      "kind" in runtime
        ? { ok: false, error: runtime }
        : { ok: true, value: runtime },
  };
}
