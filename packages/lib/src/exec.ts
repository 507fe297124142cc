import { spawn } from "node:child_process";
import { accessSync, constants } from "node:fs";
import { delimiter, join } from "node:path";
import type { CommandRunner, RunOptions, RunResult } from "./types.ts";
import { createLogger } from "./logger.ts";

const logger = createLogger("exec");

/**
 * Default CommandRunner on top of child_process.spawn. Output is captured
 * unless `stream` is set. A streamed child writes stdout to the terminal;
 * its stderr is echoed there too and also returned, so failures can still be
 * classified.
 */
export const runCommand: CommandRunner = (argv: string[], options: RunOptions = {}): Promise<RunResult> => {
  const [bin, ...args] = argv;
  if (!bin) return Promise.reject(new Error("empty command"));

  const stream = options.stream ?? false;
  const timeoutMs = options.timeoutMs ?? 0;
  logger.debug("running command", { argv, cwd: options.cwd, stream });

  return new Promise((resolve) => {
    const child = spawn(bin, args, {
      cwd: options.cwd,
      env: options.env ? { ...process.env, ...options.env } : process.env,
      stdio: stream ? ["inherit", "inherit", "pipe"] : ["inherit", "pipe", "pipe"],
      timeout: timeoutMs > 0 ? timeoutMs : undefined,
    });

    let stdout = "";
    let stderr = "";
    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (chunk: string) => { stdout += chunk; });
    child.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
      if (stream) process.stderr.write(chunk);
    });

    // spawn failures (ENOENT, EACCES) surface as a 127 like a shell would
    child.on("error", (err) => {
      logger.debug("command failed to start", { argv, error: err.message });
      resolve({ exitCode: 127, stdout, stderr: stderr || err.message });
    });
    child.on("close", (code, signal) => {
      const exitCode = code ?? (signal ? 128 : 1);
      logger.debug("command finished", { argv, exitCode, signal });
      resolve({ exitCode, stdout, stderr });
    });
  });
};

/** Resolve a program on PATH, like `command -v`. */
export function which(program: string, pathEnv: string = process.env.PATH ?? ""): string | null {
  for (const dir of pathEnv.split(delimiter)) {
    if (!dir) continue;
    const candidate = join(dir, program);
    try {
      accessSync(candidate, constants.X_OK);
      return candidate;
    } catch {
      // not in this directory
    }
  }
  return null;
}
