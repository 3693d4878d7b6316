/**
 * Standard locations for configuration, agent state and the transcript store.
 */

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

export const APP_NAME = "agentpod";

export interface AppPaths {
  /** Root of all agentpod state */
  configRoot: string;
  /** Global config.yaml */
  globalConfig: string;
  /** Per-agent config directories live below this */
  agentsDir: string;
  /** Default transcript store */
  logsDb: string;
  /** Default proxy state directory */
  proxyDir: string;
}

/**
 * Resolve the config root.
 * AP_CONFIG_DIR wins, then $XDG_CONFIG_HOME/agentpod, then ~/.config/agentpod.
 */
export function getConfigRoot(env: NodeJS.ProcessEnv = process.env): string {
  const custom = env["AP_CONFIG_DIR"];
  if (custom) {
    return path.resolve(expandHome(custom));
  }

  const xdg = env["XDG_CONFIG_HOME"];
  const base = xdg ? path.resolve(xdg) : path.join(os.homedir(), ".config");
  return path.join(base, APP_NAME);
}

export function getAppPaths(env: NodeJS.ProcessEnv = process.env): AppPaths {
  const configRoot = getConfigRoot(env);
  return {
    configRoot,
    globalConfig: path.join(configRoot, "config.yaml"),
    agentsDir: path.join(configRoot, "agents"),
    logsDb: path.join(configRoot, "logs.db"),
    proxyDir: path.join(configRoot, "proxy"),
  };
}

/** Project config: ./.agentpod/config.yaml below the given directory */
export function getProjectConfigPath(cwd: string = process.cwd()): string {
  return path.join(cwd, `.${APP_NAME}`, "config.yaml");
}

/** Create the config root and agents directory if missing */
export function ensureConfigDirs(env: NodeJS.ProcessEnv = process.env): void {
  const { agentsDir } = getAppPaths(env);
  fs.mkdirSync(agentsDir, { recursive: true });
}

/** Expand a leading ~ to the user's home directory */
export function expandHome(value: string): string {
  if (value === "~") {
    return os.homedir();
  }
  if (value.startsWith("~/")) {
    return path.join(os.homedir(), value.slice(2));
  }
  return value;
}

/** Expand ~ and make absolute */
export function resolveUserPath(value: string): string {
  return path.resolve(expandHome(value));
}
