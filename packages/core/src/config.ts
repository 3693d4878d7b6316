/**
 * Configuration management.
 *
 * Effective config = defaults, deep-merged with the global config.yaml,
 * deep-merged with the project .agentpod/config.yaml, then environment
 * overrides. Files use snake_case keys; code reads the camelCase Config.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { z } from "zod";
import {
  AGENT_KINDS,
  defaultAgentImage,
  mapAgentKinds,
  type AgentKind,
} from "./agents.js";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logger.js";
import {
  ensureConfigDirs,
  getAppPaths,
  getProjectConfigPath,
  resolveUserPath,
} from "./paths.js";

/** Plain JSON-like object as read from YAML */
export type ConfigObject = { [key: string]: unknown };

const DEFAULT_PROXY_NAMESPACE = "agentpod";

const agentSchema = z
  .object({
    enabled: z.boolean(),
    image: z.string().min(1),
    env: z.record(z.union([z.string(), z.number(), z.boolean()])),
    volumes: z.array(z.string()),
  })
  .partial()
  .passthrough();

const rawConfigSchema = z
  .object({
    version: z.number().int(),
    default_agent: z.string().min(1),
    auto_pull: z.boolean(),
    auto_remove: z.boolean(),
    network: z.string().min(1),
    log_level: z.enum(["debug", "info", "warn", "error"]),
    no_color: z.boolean(),
    agents: z.record(agentSchema),
    logging: z
      .object({
        enabled: z.boolean(),
        db_path: z.string().min(1),
      })
      .passthrough(),
    proxy: z
      .object({
        enabled: z.boolean(),
        image: z.string().min(1),
        port: z.number().int().min(1).max(65535),
        db_path: z.string().min(1),
        ca_dir: z.string(),
        ca_path: z.string(),
      })
      .passthrough(),
  })
  .passthrough();

/** Merged, validated config in its on-disk shape */
export type RawConfig = z.infer<typeof rawConfigSchema>;

export interface AgentConfig {
  enabled: boolean;
  image: string;
  env: Record<string, string>;
  /** Extra bind mounts, "host:container[:ro|rw]" */
  volumes: string[];
}

export interface Config {
  version: number;
  defaultAgent: string;
  autoPull: boolean;
  autoRemove: boolean;
  /** Docker network agent containers and the proxy share */
  network: string;
  logLevel: LogLevel;
  noColor: boolean;
  agents: Record<AgentKind, AgentConfig>;
  logging: {
    /** Record interactive sessions to the transcript store */
    enabled: boolean;
    dbPath: string;
  };
  proxy: {
    enabled: boolean;
    image: string;
    port: number;
    dbPath: string;
    /** Directory mounted read-only into agents for the proxy CA */
    caDir: string | null;
    /** CA certificate to wait for before starting an agent */
    caPath: string | null;
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv | undefined;
  /** Directory searched for .agentpod/config.yaml */
  cwd?: string | undefined;
}

export function isConfigObject(value: unknown): value is ConfigObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Built-in defaults in on-disk shape */
export function defaultRawConfig(
  env: NodeJS.ProcessEnv = process.env
): ConfigObject {
  const paths = getAppPaths(env);
  const caDir = path.join(paths.proxyDir, "mitmproxy");
  const namespace = env["AP_IMAGE_NAMESPACE"] ?? DEFAULT_PROXY_NAMESPACE;

  const agents: ConfigObject = {};
  for (const kind of AGENT_KINDS) {
    agents[kind] = {
      enabled: true,
      image: defaultAgentImage(kind, env),
      env: {},
      volumes: [],
    };
  }

  return {
    version: 1,
    default_agent: "claude",
    auto_pull: false,
    auto_remove: true,
    network: "agentpod-network",
    log_level: "info",
    no_color: false,
    agents,
    logging: {
      enabled: true,
      db_path: paths.logsDb,
    },
    proxy: {
      enabled: true,
      image: env["AP_PROXY_IMAGE"] ?? `${namespace}/proxy:latest`,
      port: 8080,
      db_path: path.join(paths.proxyDir, "proxy.db"),
      ca_dir: caDir,
      ca_path: path.join(caDir, "mitmproxy-ca-cert.pem"),
    },
  };
}

/**
 * Deep merge into a new object. Nested objects merge key by key;
 * arrays and scalars from the override replace the base value.
 */
export function deepMerge(
  base: ConfigObject,
  override: ConfigObject
): ConfigObject {
  const merged: ConfigObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const existing = merged[key];
    if (isConfigObject(value) && isConfigObject(existing)) {
      merged[key] = deepMerge(existing, value);
    } else {
      merged[key] = value;
    }
  }
  return merged;
}

/**
 * Read a YAML config file.
 * Missing or empty files, and documents that are not a mapping, yield {}.
 */
export function readConfigFile(filePath: string): ConfigObject {
  if (!fs.existsSync(filePath)) {
    return {};
  }

  const content = fs.readFileSync(filePath, "utf-8");
  if (!content.trim()) {
    return {};
  }

  let loaded: unknown;
  try {
    loaded = parseYaml(content);
  } catch (error) {
    if (error instanceof YAMLParseError) {
      throw new ConfigError(filePath, error.message);
    }
    throw error;
  }

  return isConfigObject(loaded) ? loaded : {};
}

const truthy = (raw: string): boolean => raw.toLowerCase() === "true";

const ENV_OVERRIDES: ReadonlyArray<
  readonly [string, readonly string[], (raw: string) => unknown]
> = [
  ["AP_DEFAULT_AGENT", ["default_agent"], (raw) => raw],
  ["AP_AUTO_PULL", ["auto_pull"], truthy],
  ["AP_LOG_LEVEL", ["log_level"], (raw) => raw],
  ["AP_NO_COLOR", ["no_color"], truthy],
  ["AP_LOGGING_ENABLED", ["logging", "enabled"], truthy],
  ["AP_LOG_DB_PATH", ["logging", "db_path"], (raw) => raw],
  ["AP_PROXY_ENABLED", ["proxy", "enabled"], truthy],
  ["AP_PROXY_PORT", ["proxy", "port"], (raw) => Number(raw)],
];

/** Apply AP_* environment overrides to a config object (new object) */
export function applyEnvOverrides(
  config: ConfigObject,
  env: NodeJS.ProcessEnv = process.env
): ConfigObject {
  let result = config;
  for (const [name, keys, convert] of ENV_OVERRIDES) {
    const raw = env[name];
    if (raw === undefined) {
      continue;
    }

    let patch: unknown = convert(raw);
    for (const key of [...keys].reverse()) {
      patch = { [key]: patch };
    }
    if (isConfigObject(patch)) {
      result = deepMerge(result, patch);
    }
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load the effective config in on-disk shape.
 * Creates the config directories on first use.
 */
export function loadRawConfig(options: LoadConfigOptions = {}): RawConfig {
  const env = options.env ?? process.env;
  ensureConfigDirs(env);

  const globalPath = getAppPaths(env).globalConfig;
  const projectPath = getProjectConfigPath(options.cwd);

  let merged = defaultRawConfig(env);
  merged = deepMerge(merged, readConfigFile(globalPath));
  merged = deepMerge(merged, readConfigFile(projectPath));
  merged = applyEnvOverrides(merged, env);

  const parsed = rawConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const sources = [globalPath, projectPath].filter((p) => fs.existsSync(p));
    throw new ConfigError(
      sources.length > 0 ? sources.join(", ") : "environment",
      formatIssues(parsed.error)
    );
  }
  return parsed.data;
}

function optionalPath(value: string): string | null {
  const trimmed = value.trim();
  return trimmed ? resolveUserPath(trimmed) : null;
}

/** Convert on-disk config to the typed Config */
export function toConfig(
  raw: RawConfig,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const agents = mapAgentKinds((kind): AgentConfig => {
    const entry = raw.agents[kind] ?? {};
    return {
      enabled: entry.enabled ?? true,
      image: entry.image ?? defaultAgentImage(kind, env),
      env: Object.fromEntries(
        Object.entries(entry.env ?? {}).map(([k, v]) => [k, String(v)])
      ),
      volumes: entry.volumes ?? [],
    };
  });

  return {
    version: raw.version,
    defaultAgent: raw.default_agent,
    autoPull: raw.auto_pull,
    autoRemove: raw.auto_remove,
    network: raw.network,
    logLevel: raw.log_level,
    noColor: raw.no_color,
    agents,
    logging: {
      enabled: raw.logging.enabled,
      dbPath: resolveUserPath(raw.logging.db_path),
    },
    proxy: {
      enabled: raw.proxy.enabled,
      image: raw.proxy.image,
      port: raw.proxy.port,
      dbPath: resolveUserPath(raw.proxy.db_path),
      caDir: optionalPath(raw.proxy.ca_dir),
      caPath: optionalPath(raw.proxy.ca_path),
    },
  };
}

/** Load the effective typed config */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  return toConfig(loadRawConfig(options), options.env ?? process.env);
}

/** Image an agent runs with: config override, else the registry default */
export function effectiveAgentImage(kind: AgentKind, config: Config): string {
  return config.agents[kind].image;
}

/** Read a value by dot notation, e.g. "proxy.port" */
export function getConfigValue(config: ConfigObject, key: string): unknown {
  let value: unknown = config;
  for (const part of key.split(".")) {
    if (!isConfigObject(value) || !(part in value)) {
      return undefined;
    }
    value = value[part];
  }
  return value;
}
