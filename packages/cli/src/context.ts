/**
 * Shared state handed to every command, and the mapping from failures to
 * exit codes.
 */

import {
  ConfigError,
  EXIT,
  createConsoleOutput,
  describeError,
  loadRawConfig,
  setLogLevel,
  toConfig,
  type Config,
  type ExitCode,
  type OutputSink,
  type RawConfig,
} from "@agentpod/core";
import {
  ContainerOperationError,
  connectDocker,
  type ContainerRuntime,
  type DockerResult,
} from "@agentpod/containers";

export interface CommandContext {
  config: Config;
  /** Effective config in its on-disk shape */
  rawConfig: RawConfig;
  output: OutputSink;
  env: NodeJS.ProcessEnv;
  cwd: string;
  connectRuntime(): Promise<DockerResult<ContainerRuntime>>;
}

/** A failure already phrased for the user, with its exit code */
export class CommandError extends Error {
  readonly exitCode: ExitCode;

  constructor(message: string, exitCode: ExitCode = EXIT.ERROR) {
    super(message);
    this.name = "CommandError";
    this.exitCode = exitCode;
  }
}

/** Bad command-line input */
export class UsageError extends CommandError {
  constructor(message: string) {
    super(message, EXIT.INVALID_ARGS);
    this.name = "UsageError";
  }
}

export interface CreateContextOptions {
  noColor?: boolean | undefined;
  env?: NodeJS.ProcessEnv | undefined;
  cwd?: string | undefined;
}

/** Load config and build the context. Throws ConfigError. */
export function createContext(options: CreateContextOptions = {}): CommandContext {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const rawConfig = loadRawConfig({ env, cwd });
  const config = toConfig(rawConfig, env);
  setLogLevel(config.logLevel);

  return {
    config,
    rawConfig,
    env,
    cwd,
    output: createConsoleOutput({ noColor: options.noColor || config.noColor }),
    connectRuntime: () => connectDocker(),
  };
}

/**
 * Connect to Docker or fail the command: exit 3 when the daemon is not
 * reachable.
 */
export async function requireRuntime(
  context: CommandContext
): Promise<ContainerRuntime> {
  const result = await context.connectRuntime();
  if (!result.ok) {
    throw new CommandError(
      result.error.message,
      result.error.kind === "unavailable" ? EXIT.DOCKER_NOT_RUNNING : EXIT.ERROR
    );
  }
  return result.value;
}

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommandError) {
    return error.exitCode;
  }
  if (error instanceof ConfigError) {
    return EXIT.CONFIG_ERROR;
  }
  if (error instanceof ContainerOperationError) {
    return error.operation === "pull" && error.statusCode === 404
      ? EXIT.IMAGE_NOT_FOUND
      : EXIT.CONTAINER_ERROR;
  }
  return EXIT.ERROR;
}

/** Run a command, reporting any failure through the context's output */
export async function runAction(
  context: CommandContext,
  action: (context: CommandContext) => Promise<void>
): Promise<ExitCode> {
  try {
    await action(context);
    return EXIT.SUCCESS;
  } catch (error) {
    context.output.error(describeError(error));
    return exitCodeFor(error);
  }
}
