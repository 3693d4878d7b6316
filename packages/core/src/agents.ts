/**
 * Agent registry.
 *
 * A closed set of agent kinds, each resolved through one lookup table
 * to the data needed to start its container.
 */

import * as path from "node:path";
import { getAppPaths } from "./paths.js";

export const AGENT_KINDS = [
  "claude",
  "gemini",
  "opencode",
  "devstral",
  "auggie",
  "copilot",
  "codex",
] as const;

export type AgentKind = (typeof AGENT_KINDS)[number];

export interface AgentSpec {
  kind: AgentKind;
  /** Model vendor, informational */
  provider: string;
  /** Default image reference */
  image: string;
  /** Directory below <config-root>/agents holding the agent's own state */
  configSubdir: string;
  /** Command line, or null to use the image entrypoint */
  command: readonly string[] | null;
  /** Where the agent config directory is mounted in the container */
  configMountPath: string;
  /** Environment defaults, overridable from config and --env */
  env: Readonly<Record<string, string>>;
  /** Image platform, when it must be forced */
  platform: string | null;
  /** Run as the host UID:GID so files in the workspace stay owned by the user */
  runAsHostUser: boolean;
}

type AgentEntry = Omit<AgentSpec, "kind" | "image"> & { repository: string };

const AGENTS: Readonly<Record<AgentKind, AgentEntry>> = {
  claude: {
    provider: "anthropic",
    repository: "claude-container",
    configSubdir: "claude",
    command: ["claude"],
    configMountPath: "/claude",
    env: { CLAUDE_CONFIG_DIR: "/claude" },
    platform: null,
    runAsHostUser: false,
  },
  gemini: {
    provider: "google",
    repository: "gemini-container",
    configSubdir: "gemini",
    command: ["gemini"],
    configMountPath: "/config",
    env: { HOME: "/config" },
    platform: null,
    runAsHostUser: false,
  },
  opencode: {
    provider: "openai",
    repository: "opencode-cli",
    configSubdir: "opencode",
    command: ["opencode"],
    configMountPath: "/config",
    env: { HOME: "/config", OPENCODE_CONFIG_DIR: "/config" },
    platform: null,
    runAsHostUser: false,
  },
  devstral: {
    provider: "mistral",
    repository: "devstral-cli",
    configSubdir: "devstral",
    command: null,
    configMountPath: "/config",
    env: { HOME: "/config", WORKSPACE_PATH: "/workspace" },
    platform: "linux/amd64",
    runAsHostUser: true,
  },
  auggie: {
    provider: "augment",
    repository: "auggie-cli",
    configSubdir: "auggie",
    command: ["auggie"],
    configMountPath: "/config",
    env: { HOME: "/config" },
    platform: null,
    runAsHostUser: false,
  },
  copilot: {
    provider: "github",
    repository: "copilot-cli",
    configSubdir: "copilot",
    command: ["copilot"],
    configMountPath: "/config",
    env: { HOME: "/config" },
    platform: null,
    runAsHostUser: false,
  },
  codex: {
    provider: "openai",
    repository: "codex-cli",
    configSubdir: "codex",
    command: ["codex"],
    configMountPath: "/config",
    env: { HOME: "/config" },
    platform: null,
    runAsHostUser: false,
  },
};

const DEFAULT_AGENT_NAMESPACE = "agentpod";

export function isAgentKind(value: string): value is AgentKind {
  return (AGENT_KINDS as readonly string[]).includes(value);
}

/**
 * Default image for an agent.
 * AP_IMAGE_<KIND> overrides the whole reference, AP_IMAGE_NAMESPACE the
 * registry namespace.
 */
export function defaultAgentImage(
  kind: AgentKind,
  env: NodeJS.ProcessEnv = process.env
): string {
  const override = env[`AP_IMAGE_${kind.toUpperCase()}`];
  if (override) {
    return override;
  }
  const namespace = env["AP_IMAGE_NAMESPACE"] ?? DEFAULT_AGENT_NAMESPACE;
  return `${namespace}/${AGENTS[kind].repository}:latest`;
}

/** Build a record with one value per agent kind */
export function mapAgentKinds<T>(fn: (kind: AgentKind) => T): Record<AgentKind, T> {
  return {
    claude: fn("claude"),
    gemini: fn("gemini"),
    opencode: fn("opencode"),
    devstral: fn("devstral"),
    auggie: fn("auggie"),
    copilot: fn("copilot"),
    codex: fn("codex"),
  };
}

/** Look up an agent. Throws for kinds outside the registry. */
export function getAgentSpec(
  kind: string,
  env: NodeJS.ProcessEnv = process.env
): AgentSpec {
  if (!isAgentKind(kind)) {
    throw new Error(`Unsupported agent: ${kind}`);
  }
  const { repository: _repository, ...entry } = AGENTS[kind];
  return { kind, image: defaultAgentImage(kind, env), ...entry };
}

/** Host directory mounted as the agent's config directory */
export function agentConfigDir(
  kind: AgentKind,
  env: NodeJS.ProcessEnv = process.env
): string {
  return path.join(getAppPaths(env).agentsDir, AGENTS[kind].configSubdir);
}
