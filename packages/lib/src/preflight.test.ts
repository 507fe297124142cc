import { describe, expect, it } from "vitest";
import { checkRequiredPrograms, ensurePrerequisites, runPreflightChecks } from "./preflight.ts";
import { buildEnvironmentConfig } from "./config.ts";
import { SynapseEnvError } from "./errors.ts";
import type { ProgramLookup } from "./runtime.ts";

function installed(...programs: string[]): ProgramLookup {
  return (program) => (programs.includes(program) ? `/usr/bin/${program}` : null);
}

describe("checkRequiredPrograms", () => {
  it("returns null when everything is installed", () => {
    expect(checkRequiredPrograms(["podman"], installed("podman"))).toBeNull();
  });

  it("lists every missing program in one issue", () => {
    const issue = checkRequiredPrograms(["podman", "bash", "git"], installed("bash"));
    expect(issue).toEqual({
      code: "missing_programs",
      message: "Required programs are missing on this system.",
      detail: "Please install:\n- podman\n- git",
      meta: { missing: ["podman", "git"] },
    });
  });
});

describe("runPreflightChecks", () => {
  it("detects the runtime when config.env names none", () => {
    const result = runPreflightChecks(buildEnvironmentConfig({}, "/w"), installed("docker"));
    expect(result).toEqual({ ok: true, platform: "docker", issues: [] });
  });

  it("reports no_runtime when nothing is installed", () => {
    const result = runPreflightChecks(buildEnvironmentConfig({}, "/w"), installed());
    expect(result.ok).toBe(false);
    expect(result.platform).toBeNull();
    expect(result.issues[0].code).toBe("no_runtime");
  });

  it("checks the runtime named in config.env instead of detecting", () => {
    const result = runPreflightChecks(buildEnvironmentConfig({ containerRuntime: "podman" }, "/w"), installed("docker"));
    expect(result.ok).toBe(false);
    expect(result.platform).toBe("podman");
    expect(result.issues[0].meta?.missing).toEqual(["podman"]);
  });
});

describe("ensurePrerequisites", () => {
  it("returns the platform when checks pass", () => {
    expect(ensurePrerequisites(buildEnvironmentConfig({}, "/w"), installed("podman"))).toBe("podman");
  });

  it("throws a missing_programs error with the full list", () => {
    const config = buildEnvironmentConfig({ containerRuntime: "docker" }, "/w");
    let thrown: unknown;
    try {
      ensurePrerequisites(config, installed());
    } catch (err) {
      thrown = err;
    }
    expect(thrown).toBeInstanceOf(SynapseEnvError);
    expect(thrown).toMatchObject({
      code: "missing_programs",
      message: "Required programs are missing on this system.\nPlease install:\n- docker",
      exitStatus: 1,
    });
  });
});
