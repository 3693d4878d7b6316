/**
 * Process exit codes and shared error types.
 */

export const EXIT = {
  SUCCESS: 0,
  ERROR: 1,
  INVALID_ARGS: 2,
  DOCKER_NOT_RUNNING: 3,
  IMAGE_NOT_FOUND: 4,
  CONTAINER_ERROR: 7,
  CONFIG_ERROR: 8,
} as const;

export type ExitCode = (typeof EXIT)[keyof typeof EXIT];

/** A configuration file exists but cannot be used */
export class ConfigError extends Error {
  readonly path: string;

  constructor(path: string, message: string) {
    super(`Invalid config ${path}: ${message}`);
    this.name = "ConfigError";
    this.path = path;
  }
}
