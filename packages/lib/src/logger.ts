/**
 * Diagnostics for synapse-env: one JSON object per line on stderr, kept
 * apart from the ui helpers that talk to the operator. External commands,
 * generator steps and skipped work are logged here.
 *
 *   const logger = createLogger("exec");
 *   logger.debug("running command", { argv: ["podman", "compose", "pull"] });
 *   // {"ts":"...","level":"debug","scope":"exec","msg":"running command","extra":{...}}
 *
 * LOG_LEVEL sets the threshold (debug, info, warn, error; info when unset or
 * unknown) and DEBUG=1 forces debug. With LOG_DIR set every entry is also
 * appended to LOG_DIR/synapse-env.log, which moves to synapse-env.log.1
 * once it reaches 50 MB.
 */

import { appendFileSync, mkdirSync, renameSync, statSync } from "node:fs";
import { join } from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(msg: string, extra?: Record<string, unknown>): void;
  info(msg: string, extra?: Record<string, unknown>): void;
  warn(msg: string, extra?: Record<string, unknown>): void;
  error(msg: string, extra?: Record<string, unknown>): void;
}

type LogEntry = {
  ts: string;
  level: LogLevel;
  scope: string;
  msg: string;
  extra?: Record<string, unknown>;
};

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

export const LOG_FILE_NAME = "synapse-env.log";
const ROTATE_AT_BYTES = 50 * 1024 * 1024;

function isLogLevel(raw: string): raw is LogLevel {
  return raw in LEVEL_RANK;
}

function threshold(): LogLevel {
  if (process.env.DEBUG === "1") return "debug";
  const raw = process.env.LOG_LEVEL;
  return raw !== undefined && isLogLevel(raw) ? raw : "info";
}

let preparedDir: string | null = null;

function appendToLogFile(dir: string, line: string): void {
  const file = join(dir, LOG_FILE_NAME);
  try {
    if (preparedDir !== dir) {
      mkdirSync(dir, { recursive: true });
      preparedDir = dir;
    }
    const size = statSync(file, { throwIfNoEntry: false })?.size ?? 0;
    if (size >= ROTATE_AT_BYTES) {
      renameSync(file, `${file}.1`);
    }
    appendFileSync(file, `${line}\n`, "utf8");
  } catch (err) {
    // reported directly: the file sink is what failed
    console.error(`could not write ${file}: ${err instanceof Error ? err.message : String(err)}`);
  }
}

function emit(entry: LogEntry): void {
  const line = JSON.stringify(entry);
  console.error(line);
  const dir = process.env.LOG_DIR;
  if (dir) appendToLogFile(dir, line);
}

export function createLogger(scope: string): Logger {
  const at =
    (level: LogLevel) =>
    (msg: string, extra?: Record<string, unknown>): void => {
      if (LEVEL_RANK[level] < LEVEL_RANK[threshold()]) return;
      const entry: LogEntry = { ts: new Date().toISOString(), level, scope, msg };
      if (extra !== undefined && Object.keys(extra).length > 0) entry.extra = extra;
      emit(entry);
    };
  return { debug: at("debug"), info: at("info"), warn: at("warn"), error: at("error") };
}

/** Forget which log directory was created. Tests only. */
export function _resetLogSink(): void {
  preparedDir = null;
}
