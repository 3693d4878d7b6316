import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import Docker from "dockerode";
import { connectDocker, DockerManager } from "./docker-manager.js";
import { ContainerOperationError, dockerStatusCode } from "./errors.js";

describe("without a reachable daemon", () => {
  let tempDir: string;
  let docker: Docker;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "ap-docker-test-"));
    docker = new Docker({ socketPath: path.join(tempDir, "missing.sock") });
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("connectDocker reports the daemon as unavailable", async () => {
    const result = await connectDocker({ docker });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe("unavailable");
      expect(result.error.message).toMatch(/^Docker is not available: /);
    }
  });

  it("wraps API failures with the operation name", async () => {
    const manager = new DockerManager(docker);

    const failure = manager.listManaged();
    await expect(failure).rejects.toBeInstanceOf(ContainerOperationError);
    await expect(failure).rejects.toMatchObject({
      name: "ContainerOperationError",
      operation: "list",
    });
  });
});

describe("ContainerOperationError", () => {
  it("keeps the API status code", () => {
    const cause = Object.assign(new Error("No such image"), { statusCode: 404 });
    const error = new ContainerOperationError("pull", cause);

    expect(error.message).toBe("Docker pull failed: No such image");
    expect(error.statusCode).toBe(404);
    expect(error.cause).toBe(cause);
  });

  it("has no status code for transport errors", () => {
    expect(dockerStatusCode(new Error("connect ENOENT"))).toBeUndefined();
    expect(dockerStatusCode({ statusCode: "500" })).toBeUndefined();
  });
});
