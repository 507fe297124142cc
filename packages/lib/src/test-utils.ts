/**
 * Shared fakes for tests. Nothing here spawns a process or reads the
 * terminal.
 */
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CommandRunner, ContainerPlatform, Prompter, RunOptions, RunResult, RuntimeContext } from "./types.ts";
import type { GeneratorContext } from "./generators/common.ts";
import { buildEnvironmentConfig } from "./config.ts";

export type RecordedCall = { argv: string[]; options: RunOptions };

export type TestRunner = CommandRunner & { calls: RecordedCall[] };

/**
 * A CommandRunner that records every call. `respond` may perform side
 * effects (such as writing the files a generate container would) and
 * override the result; the default is a silent success.
 */
export function createTestRunner(
  respond: (argv: string[], options: RunOptions) => Partial<RunResult> | void = () => undefined
): TestRunner {
  const calls: RecordedCall[] = [];
  const runner: CommandRunner = async (argv, options = {}) => {
    calls.push({ argv, options });
    const override = respond(argv, options) ?? {};
    return { exitCode: 0, stdout: "", stderr: "", ...override };
  };
  return Object.assign(runner, { calls });
}

export type TestPrompter = Prompter & { questions: string[] };

/** Answers prompts in order; extra prompts get an empty answer. */
export function createTestPrompter(answers: string[] = []): TestPrompter {
  const queue = [...answers];
  const questions: string[] = [];
  const prompter: Prompter = async (question) => {
    questions.push(question);
    return queue.shift() ?? "";
  };
  return Object.assign(prompter, { questions });
}

/** Creates a fresh work directory; the returned function removes it. */
export function makeWorkDir(name: string = "testbed"): { workDir: string; cleanup: () => void } {
  const root = mkdtempSync(join(tmpdir(), "synapse-env-"));
  const workDir = join(root, name);
  return {
    workDir,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

/** Runtime context backed by a recording runner. */
export function createTestRuntime(
  workDir: string,
  runner: TestRunner = createTestRunner(),
  platform: ContainerPlatform = "podman"
): RuntimeContext & { runner: TestRunner } {
  return {
    platform,
    compose: { bin: platform, subcommand: "compose", composeFile: join(workDir, "compose.yml"), cwd: workDir },
    runner,
  };
}

export type TestGeneratorContext = GeneratorContext & {
  runtime: RuntimeContext & { runner: TestRunner };
  prompt: TestPrompter;
};

/** Generator context for `env` (config.env entries) rooted at `workDir`. */
export function createGeneratorContext(
  workDir: string,
  env: Record<string, string> = {},
  options: { runner?: TestRunner; answers?: string[]; platform?: ContainerPlatform } = {}
): TestGeneratorContext {
  return {
    config: buildEnvironmentConfig(env, workDir),
    runtime: createTestRuntime(workDir, options.runner, options.platform),
    prompt: createTestPrompter(options.answers),
  };
}
