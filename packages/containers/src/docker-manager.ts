/**
 * Docker Engine access through dockerode.
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { Duplex } from "node:stream";
import Docker from "dockerode";
import { createLogger, describeError } from "@agentpod/core";
import type { RemoteStream } from "@agentpod/terminal";
import {
  LABEL_AGENT,
  LABEL_MANAGED,
  LABEL_ROLE,
  PROXY_CONTAINER_NAME,
  buildAgentCreateOptions,
  buildProxyCreateOptions,
  generateContainerName,
  toContainerDetails,
  toManagedContainer,
} from "./builders.js";
import { ContainerOperationError, dockerStatusCode } from "./errors.js";
import type {
  ContainerDetails,
  ContainerRuntime,
  DockerResult,
  EnsureProxyOptions,
  ManagedContainer,
  RunAgentOptions,
  StopOptions,
} from "./types.js";

const logger = createLogger("docker");

const STOP_TIMEOUT_SECONDS = 10;

export interface ConnectDockerOptions {
  /** Client to use instead of one configured from DOCKER_HOST */
  docker?: Docker | undefined;
}

/**
 * Connect to the Docker daemon and check that it answers.
 */
export async function connectDocker(
  options: ConnectDockerOptions = {}
): Promise<DockerResult<DockerManager>> {
  let docker: Docker;
  try {
    docker = options.docker ?? new Docker();
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: "failed",
        message: `Invalid Docker client settings: ${describeError(error)}`,
      },
    };
  }

  try {
    await docker.ping();
  } catch (error) {
    return {
      ok: false,
      error: {
        kind: "unavailable",
        message: `Docker is not available: ${describeError(error)}`,
      },
    };
  }

  return { ok: true, value: new DockerManager(docker) };
}

export class DockerManager implements ContainerRuntime {
  private readonly docker: Docker;

  constructor(docker: Docker) {
    this.docker = docker;
  }

  private async call<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      throw new ContainerOperationError(operation, error);
    }
  }

  async version(): Promise<string> {
    const info = await this.call("version", () => this.docker.version());
    return info.Version;
  }

  async pullImage(image: string): Promise<void> {
    logger.info(`Pulling ${image}`);
    await this.call("pull", async () => {
      const stream: NodeJS.ReadableStream = await this.docker.pull(image);
      await new Promise<void>((resolve, reject) => {
        this.docker.modem.followProgress(stream, (error: Error | null) =>
          error ? reject(error) : resolve()
        );
      });
    });
  }

  async ensureNetwork(name: string): Promise<void> {
    await this.call("network", async () => {
      const networks = await this.docker.listNetworks({
        filters: { name: [name] },
      });
      // the name filter matches substrings
      if (networks.some((network) => network.Name === name)) {
        return;
      }
      logger.debug(`Creating network ${name}`);
      await this.docker.createNetwork({
        Name: name,
        Driver: "bridge",
        Labels: { [LABEL_MANAGED]: "true" },
      });
    });
  }

  async runAgent(options: RunAgentOptions): Promise<ContainerDetails> {
    const name = options.name ?? generateContainerName(options.agent.kind);
    const createOptions = buildAgentCreateOptions(options, name);

    const container = await this.call("create", () =>
      this.docker.createContainer(createOptions)
    );
    await this.call("start", () => container.start());
    logger.debug(`Started ${name} (${container.id})`);
    return this.inspect(container.id);
  }

  async inspect(id: string): Promise<ContainerDetails> {
    const info = await this.call("inspect", () =>
      this.docker.getContainer(id).inspect()
    );
    return toContainerDetails(info);
  }

  async containerLogs(id: string, tail: number): Promise<string> {
    const output = await this.call("logs", () =>
      this.docker
        .getContainer(id)
        .logs({ stdout: true, stderr: true, tail, follow: false })
    );
    return output.toString("utf8");
  }

  async stopContainer(id: string, options: StopOptions = {}): Promise<void> {
    try {
      await this.docker
        .getContainer(id)
        .stop({ t: options.force ? 0 : STOP_TIMEOUT_SECONDS });
    } catch (error) {
      // 304: already stopped, 404: auto-removed on exit
      const status = dockerStatusCode(error);
      if (status === 304 || status === 404) {
        logger.debug(`Container ${id} already stopped (${status})`);
        return;
      }
      throw new ContainerOperationError("stop", error);
    }
  }

  async listManaged(
    options: { all?: boolean } = {}
  ): Promise<ManagedContainer[]> {
    const containers = await this.call("list", () =>
      this.docker.listContainers({
        all: options.all ?? false,
        filters: { label: [`${LABEL_MANAGED}=true`] },
      })
    );
    return containers.map(toManagedContainer);
  }

  async stopAgent(agent: string, options: StopOptions = {}): Promise<number> {
    const containers = await this.call("list", () =>
      this.docker.listContainers({
        all: true,
        filters: { label: [`${LABEL_MANAGED}=true`, `${LABEL_AGENT}=${agent}`] },
      })
    );
    return this.stopEach(containers.map(toManagedContainer), options);
  }

  async stopAll(options: StopOptions = {}): Promise<number> {
    return this.stopEach(await this.listManaged({ all: true }), options);
  }

  private async stopEach(
    containers: ManagedContainer[],
    options: StopOptions
  ): Promise<number> {
    let stopped = 0;
    for (const container of containers) {
      await this.stopContainer(container.id, options);
      stopped++;
    }
    return stopped;
  }

  async findProxy(): Promise<ManagedContainer | null> {
    const containers = await this.call("list", () =>
      this.docker.listContainers({
        all: true,
        filters: { label: [`${LABEL_MANAGED}=true`, `${LABEL_ROLE}=proxy`] },
      })
    );
    const [first] = containers;
    return first ? toManagedContainer(first) : null;
  }

  async ensureProxy(options: EnsureProxyOptions): Promise<ManagedContainer> {
    const existing = await this.findProxy();
    if (existing) {
      if (existing.status !== "running") {
        await this.call("start", () =>
          this.docker.getContainer(existing.id).start()
        );
      }
      return { ...existing, status: "running" };
    }

    fs.mkdirSync(path.dirname(options.dbPath), { recursive: true });
    fs.mkdirSync(options.caDir, { recursive: true });

    const createOptions = buildProxyCreateOptions(options);
    const container = await this.call("create", () =>
      this.docker.createContainer(createOptions)
    );
    await this.call("start", () => container.start());

    return {
      id: container.id,
      name: PROXY_CONTAINER_NAME,
      image: options.image,
      status: "running",
      agent: null,
      workspace: null,
      role: "proxy",
    };
  }

  async attach(id: string): Promise<RemoteStream> {
    const container = this.docker.getContainer(id);
    const stream = await this.call("attach", () =>
      container.attach({
        stream: true,
        stdin: true,
        stdout: true,
        stderr: true,
        logs: true,
        hijack: true,
      })
    );
    if (!(stream instanceof Duplex)) {
      throw new ContainerOperationError(
        "attach",
        new Error("daemon did not return a hijacked connection")
      );
    }

    return {
      stream,
      resize: async ({ columns, rows }) => {
        await container.resize({ h: rows, w: columns });
      },
      close: () => {
        stream.destroy();
      },
    };
  }
}
