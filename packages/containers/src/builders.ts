/**
 * Pure builders for container names, labels and create options.
 */

import { randomUUID } from "node:crypto";
import * as path from "node:path";
import { resolveUserPath } from "@agentpod/core";
import type Docker from "dockerode";
import type {
  ContainerDetails,
  EnsureProxyOptions,
  ManagedContainer,
  RunAgentOptions,
  VolumeMount,
} from "./types.js";

export const LABEL_MANAGED = "agentpod.managed";
export const LABEL_AGENT = "agentpod.agent";
export const LABEL_WORKSPACE = "agentpod.workspace";
export const LABEL_VERSION = "agentpod.version";
export const LABEL_ROLE = "agentpod.role";

export const PROXY_CONTAINER_NAME = "agentpod-proxy";
export const PROXY_CA_MOUNT = "/etc/agentpod-proxy-ca";
export const PROXY_CA_CERT = `${PROXY_CA_MOUNT}/mitmproxy-ca-cert.pem`;
export const WORKSPACE_MOUNT = "/workspace";

/** agentpod-<kind>-<8 hex> */
export function generateContainerName(
  agent: string,
  random: () => string = () => randomUUID().replace(/-/g, "")
): string {
  return `agentpod-${agent}-${random().slice(0, 8)}`;
}

/** Host UID:GID, or null where the platform has none */
export function hostUser(): string | null {
  const uid = process.getuid?.();
  const gid = process.getgid?.();
  if (uid === undefined || gid === undefined) {
    return null;
  }
  return `${uid}:${gid}`;
}

/**
 * Parse "host:container[:ro|rw]".
 * The host side may start with ~ and is made absolute.
 */
export function parseVolumeSpec(spec: string): VolumeMount {
  const parts = spec.split(":");
  const [host, container, mode = "rw"] = parts;
  if (parts.length > 3 || !host || !container) {
    throw new Error(`Invalid volume "${spec}", expected host:container[:ro|rw]`);
  }
  if (mode !== "ro" && mode !== "rw") {
    throw new Error(`Invalid volume mode "${mode}" in "${spec}"`);
  }
  if (!container.startsWith("/")) {
    throw new Error(`Container path must be absolute in "${spec}"`);
  }
  return { host: resolveUserPath(host), container, mode };
}

export function formatBind(mount: VolumeMount): string {
  return `${mount.host}:${mount.container}:${mount.mode}`;
}

export function formatEnv(env: Record<string, string>): string[] {
  return Object.entries(env).map(([key, value]) => `${key}=${value}`);
}

export function agentLabels(
  options: Pick<RunAgentOptions, "agent" | "workspace" | "version">
): Record<string, string> {
  return {
    [LABEL_MANAGED]: "true",
    [LABEL_AGENT]: options.agent.kind,
    [LABEL_WORKSPACE]: options.workspace,
    [LABEL_VERSION]: options.version,
  };
}

export function buildAgentCreateOptions(
  options: RunAgentOptions,
  name: string,
  user: string | null = hostUser()
): Docker.ContainerCreateOptions {
  const { agent } = options;
  const binds = [
    formatBind({ host: options.workspace, container: WORKSPACE_MOUNT, mode: "rw" }),
    formatBind({ host: options.configDir, container: agent.configMountPath, mode: "rw" }),
    ...(options.extraVolumes ?? []).map(formatBind),
  ];

  return {
    name,
    Image: options.image,
    ...(agent.command ? { Cmd: [...agent.command] } : {}),
    ...(agent.runAsHostUser && user ? { User: user } : {}),
    ...(agent.platform ? { platform: agent.platform } : {}),
    Env: formatEnv(options.env),
    Labels: agentLabels(options),
    WorkingDir: WORKSPACE_MOUNT,
    Tty: true,
    OpenStdin: true,
    StdinOnce: false,
    AttachStdin: true,
    AttachStdout: true,
    AttachStderr: true,
    HostConfig: {
      AutoRemove: options.autoRemove,
      Binds: binds,
      NetworkMode: options.network,
    },
  };
}

export function buildProxyCreateOptions(
  options: EnsureProxyOptions,
  user: string | null = hostUser()
): Docker.ContainerCreateOptions {
  const dataDir = path.dirname(resolveUserPath(options.dbPath));
  return {
    name: PROXY_CONTAINER_NAME,
    Image: options.image,
    ...(user ? { User: user } : {}),
    Env: formatEnv({
      PROXY_PORT: String(options.port),
      PROXY_DB_PATH: "/data/proxy.db",
      MITMPROXY_CONFDIR: "/ca",
    }),
    Labels: { [LABEL_MANAGED]: "true", [LABEL_ROLE]: "proxy" },
    HostConfig: {
      Binds: [
        formatBind({ host: dataDir, container: "/data", mode: "rw" }),
        formatBind({ host: resolveUserPath(options.caDir), container: "/ca", mode: "rw" }),
      ],
      NetworkMode: options.network,
      RestartPolicy: { Name: "unless-stopped" },
    },
  };
}

/** Environment an agent needs to route traffic through the proxy */
export function proxyEnvironment(port: number): Record<string, string> {
  const url = `http://${PROXY_CONTAINER_NAME}:${port}`;
  return {
    HTTP_PROXY: url,
    HTTPS_PROXY: url,
    NO_PROXY: "localhost,127.0.0.1,::1",
    NODE_EXTRA_CA_CERTS: PROXY_CA_CERT,
    REQUESTS_CA_BUNDLE: PROXY_CA_CERT,
    SSL_CERT_FILE: PROXY_CA_CERT,
    CURL_CA_BUNDLE: PROXY_CA_CERT,
  };
}

/** Fields read from a container list entry */
export type ListedContainer = Pick<
  Docker.ContainerInfo,
  "Id" | "Names" | "Image" | "State" | "Labels"
>;

/** Fields read from a container inspect response */
export interface InspectedContainer {
  Id: string;
  Name: string;
  State: { Status: string; Running: boolean };
  NetworkSettings: { Networks: Record<string, { IPAddress: string }> };
}

export function toManagedContainer(info: ListedContainer): ManagedContainer {
  const labels = info.Labels;
  return {
    id: info.Id,
    name: info.Names[0]?.replace(/^\//, "") ?? info.Id.slice(0, 12),
    image: info.Image,
    status: info.State,
    agent: labels[LABEL_AGENT] ?? null,
    workspace: labels[LABEL_WORKSPACE] ?? null,
    role: labels[LABEL_ROLE] ?? null,
  };
}

export function toContainerDetails(info: InspectedContainer): ContainerDetails {
  const networks: Record<string, string | null> = {};
  for (const [name, network] of Object.entries(info.NetworkSettings.Networks)) {
    networks[name] = network.IPAddress || null;
  }
  return {
    id: info.Id,
    name: info.Name.replace(/^\//, ""),
    status: info.State.Status,
    running: info.State.Running,
    networks,
  };
}
