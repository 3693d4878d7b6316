import { describe, it, expect } from "vitest";
import { createConsoleOutput } from "./output.js";

describe("createConsoleOutput", () => {
  it("writes plain lines when colour is off", () => {
    const stdout: string[] = [];
    const stderr: string[] = [];
    const output = createConsoleOutput({
      noColor: true,
      stdout: (text) => stdout.push(text),
      stderr: (text) => stderr.push(text),
    });

    output.info("Pulling image");
    output.success("Started");
    output.warning("Proxy CA not found");
    output.error("Docker is not available");
    output.print("table\n");
    output.print("row");

    expect(stdout).toEqual([
      "Pulling image\n",
      "Started\n",
      "Proxy CA not found\n",
      "table\n",
      "row\n",
    ]);
    expect(stderr).toEqual(["Docker is not available\n"]);
  });
});
