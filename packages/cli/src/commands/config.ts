/**
 * Config commands - show the effective config and where it lives.
 */

import { getAppPaths, getProjectConfigPath } from "@agentpod/core";
import { stringify as stringifyYaml } from "yaml";
import type { CommandContext } from "../context.js";
import { toJson } from "../format.js";

export async function configShowCommand(
  context: CommandContext,
  options: { json?: boolean | undefined } = {}
): Promise<void> {
  const text = options.json
    ? toJson(context.rawConfig)
    : stringifyYaml(context.rawConfig);
  context.output.print(text);
}

export interface ConfigPathOptions {
  global?: boolean | undefined;
  project?: boolean | undefined;
}

export async function configPathCommand(
  context: CommandContext,
  options: ConfigPathOptions = {}
): Promise<void> {
  const globalPath = getAppPaths(context.env).globalConfig;
  const projectPath = getProjectConfigPath(context.cwd);

  if (options.global) {
    context.output.print(globalPath);
  } else if (options.project) {
    context.output.print(projectPath);
  } else {
    context.output.print(`global:  ${globalPath}\nproject: ${projectPath}`);
  }
}
