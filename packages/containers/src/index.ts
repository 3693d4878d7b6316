/**
 * @agentpod/containers
 *
 * Docker Engine integration: agent and proxy containers, networks and
 * TTY attach.
 */

export { connectDocker, DockerManager, type ConnectDockerOptions } from "./docker-manager.js";
export { ContainerOperationError, dockerStatusCode } from "./errors.js";
export {
  LABEL_AGENT,
  LABEL_MANAGED,
  LABEL_ROLE,
  LABEL_VERSION,
  LABEL_WORKSPACE,
  PROXY_CA_MOUNT,
  PROXY_CONTAINER_NAME,
  WORKSPACE_MOUNT,
  agentLabels,
  buildAgentCreateOptions,
  buildProxyCreateOptions,
  formatBind,
  generateContainerName,
  hostUser,
  parseVolumeSpec,
  proxyEnvironment,
} from "./builders.js";
export type {
  ContainerDetails,
  ContainerRuntime,
  DockerError,
  DockerErrorKind,
  DockerResult,
  EnsureProxyOptions,
  ManagedContainer,
  RunAgentOptions,
  StopOptions,
  VolumeMount,
} from "./types.js";
