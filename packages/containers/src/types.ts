/**
 * Container runtime contract used by the command layer
 */

import type { AgentSpec } from "@agentpod/core";
import type { RemoteStream } from "@agentpod/terminal";

export interface VolumeMount {
  host: string;
  container: string;
  mode: "ro" | "rw";
}

/** A container carrying the agentpod.managed label */
export interface ManagedContainer {
  id: string;
  name: string;
  image: string;
  /** Docker state: created, running, exited, ... */
  status: string;
  /** Agent kind label, null for the proxy */
  agent: string | null;
  workspace: string | null;
  role: string | null;
}

export interface ContainerDetails {
  id: string;
  name: string;
  status: string;
  running: boolean;
  /** IP address per attached network */
  networks: Record<string, string | null>;
}

export interface RunAgentOptions {
  agent: AgentSpec;
  image: string;
  /** Host directory bound at /workspace */
  workspace: string;
  /** Host directory bound at the agent's config mount path */
  configDir: string;
  env: Record<string, string>;
  autoRemove: boolean;
  /** Container name; generated when absent */
  name?: string | null | undefined;
  network: string;
  extraVolumes?: readonly VolumeMount[] | undefined;
  version: string;
}

export interface EnsureProxyOptions {
  image: string;
  dbPath: string;
  caDir: string;
  port: number;
  network: string;
}

export interface StopOptions {
  /** Stop without the 10 s grace period */
  force?: boolean | undefined;
}

export interface ContainerRuntime {
  /** Docker Engine version */
  version(): Promise<string>;
  pullImage(image: string): Promise<void>;
  ensureNetwork(name: string): Promise<void>;
  /** Create and start an agent container */
  runAgent(options: RunAgentOptions): Promise<ContainerDetails>;
  inspect(id: string): Promise<ContainerDetails>;
  containerLogs(id: string, tail: number): Promise<string>;
  stopContainer(id: string, options?: StopOptions): Promise<void>;
  listManaged(options?: { all?: boolean }): Promise<ManagedContainer[]>;
  stopAgent(agent: string, options?: StopOptions): Promise<number>;
  stopAll(options?: StopOptions): Promise<number>;
  /** Start the proxy, reusing an existing container */
  ensureProxy(options: EnsureProxyOptions): Promise<ManagedContainer>;
  findProxy(): Promise<ManagedContainer | null>;
  /** Attach to a running container's TTY */
  attach(id: string): Promise<RemoteStream>;
}

export type DockerErrorKind = "unavailable" | "failed";

export interface DockerError {
  /** unavailable: daemon not reachable; failed: the operation itself failed */
  kind: DockerErrorKind;
  message: string;
}

export type DockerResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: DockerError };
