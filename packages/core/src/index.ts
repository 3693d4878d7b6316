/**
 * @agentpod/core
 *
 * Shared configuration, agent registry, logging and the SQLite
 * transcript store for agentpod.
 */

export * from "./types/index.js";
export * from "./db/index.js";
export * from "./transcript/index.js";
export * from "./agents.js";
export * from "./config.js";
export * from "./container-mapping.js";
export * from "./errors.js";
export * from "./logger.js";
export * from "./output.js";
export * from "./paths.js";
export { AGENTPOD_VERSION } from "./version.js";
