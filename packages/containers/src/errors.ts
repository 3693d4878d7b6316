import { describeError } from "@agentpod/core";

/** Extract the HTTP status code the Docker API answered with, if any */
export function dockerStatusCode(error: unknown): number | undefined {
  if (
    typeof error === "object" &&
    error !== null &&
    "statusCode" in error &&
    typeof error.statusCode === "number"
  ) {
    return error.statusCode;
  }
  return undefined;
}

/** A Docker API call failed */
export class ContainerOperationError extends Error {
  readonly operation: string;
  readonly statusCode: number | undefined;

  constructor(operation: string, cause: unknown) {
    super(`Docker ${operation} failed: ${describeError(cause)}`, { cause });
    this.name = "ContainerOperationError";
    this.operation = operation;
    this.statusCode =
      cause instanceof ContainerOperationError
        ? cause.statusCode
        : dockerStatusCode(cause);
  }
}
