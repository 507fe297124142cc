/**
 * Command dispatch: which commands need a runtime, how the runtime is
 * chosen, and what reaches the runner.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { ProgramLookup } from "@synapse-env/lib/runtime.ts";
import { createTestPrompter, createTestRunner, makeWorkDir } from "@synapse-env/lib/test-utils.ts";
import { readVersion, runLifecycleCommand } from "../src/run.ts";

let workDir: string;
let cleanup: () => void;
let output: ReturnType<typeof silenceOutput>;

function silenceOutput() {
  return vi.spyOn(console, "log").mockImplementation(() => undefined);
}

beforeEach(() => {
  ({ workDir, cleanup } = makeWorkDir());
  mkdirSync(workDir, { recursive: true });
  output = silenceOutput();
});

afterEach(() => cleanup());

function lookupOf(...installed: string[]): ProgramLookup {
  return (program) => (installed.includes(program) ? `/usr/bin/${program}` : null);
}

function writeConfigEnv(content: string): void {
  writeFileSync(join(workDir, "config.env"), content);
}

describe("commands without a runtime", () => {
  it("prints links from config.env", async () => {
    writeConfigEnv("enableMas=false\nenableElementWeb=false\nenableSynapseAdmin=false\ningressPort=9000\n");
    const runner = createTestRunner();

    await runLifecycleCommand({ kind: "links" }, { workDir, runner, lookup: lookupOf() });

    expect(output).toHaveBeenCalledWith(
      ["Links:", "", "- Synapse server name: 127.0.0.1", "- Synapse endpoint:    http://127.0.0.10:9000"].join("\n")
    );
    expect(runner.calls).toHaveLength(0);
  });

  it("prints the package version", async () => {
    await runLifecycleCommand({ kind: "version" }, { workDir });
    expect(output).toHaveBeenCalledWith("synapse-env v0.1.0");
  });

  it("warns about an unknown command before the help text", async () => {
    await runLifecycleCommand({ kind: "help", unknown: "frobnicate" }, { workDir });
    expect(String(output.mock.calls[0]?.[0])).toContain("Unknown command: frobnicate");
    expect(output.mock.calls.length).toBeGreaterThan(10);
  });
});

describe("runtime selection", () => {
  it("fails without podman or docker", async () => {
    const runner = createTestRunner();
    await expect(runLifecycleCommand({ kind: "stop" }, { workDir, runner, lookup: lookupOf() })).rejects.toMatchObject({
      code: "no_runtime",
    });
    expect(runner.calls).toHaveLength(0);
  });

  it("lists the configured runtime when it is missing", async () => {
    writeConfigEnv("containerRuntime=docker\n");
    const runner = createTestRunner();
    const run = runLifecycleCommand({ kind: "stop" }, { workDir, runner, lookup: lookupOf("podman") });

    await expect(run).rejects.toMatchObject({ code: "missing_programs" });
    await expect(run).rejects.toThrow("Please install:\n- docker");
    expect(runner.calls).toHaveLength(0);
  });

  it("prefers podman-compose when it is installed", async () => {
    const runner = createTestRunner();
    await runLifecycleCommand({ kind: "stop" }, { workDir, runner, lookup: lookupOf("podman", "podman-compose", "docker") });
    expect(runner.calls.map((call) => call.argv)).toEqual([["podman-compose", "-f", join(workDir, "compose.yml"), "stop"]]);
  });

  it("uses docker when config.env asks for it", async () => {
    writeConfigEnv("containerRuntime=docker\n");
    const runner = createTestRunner();
    await runLifecycleCommand({ kind: "restart", target: "synapse" }, { workDir, runner, lookup: lookupOf("podman", "docker") });
    expect(runner.calls.map((call) => call.argv)).toEqual([
      ["docker", "restart", "testbed-synapse"],
      ["docker", "restart", "testbed-nginx"],
    ]);
  });
});

describe("delete", () => {
  it("asks through the injected prompt and aborts on anything else", async () => {
    const runner = createTestRunner();
    const prompt = createTestPrompter(["no"]);
    await runLifecycleCommand({ kind: "delete" }, { workDir, runner, prompt, lookup: lookupOf("docker") });
    expect(prompt.questions).toHaveLength(1);
    expect(runner.calls).toHaveLength(0);
    expect(output).toHaveBeenCalledWith("Aborted.");
  });
});

describe("readVersion", () => {
  it("reads the cli package version", () => {
    expect(readVersion()).toBe("0.1.0");
  });
});
