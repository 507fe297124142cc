import { createInterface } from "node:readline/promises";
import type { Prompter } from "./types.ts";

const NO_COLOR = process.env.NO_COLOR !== undefined;
const IS_TTY = process.stdout.isTTY === true;
const COLORS_ENABLED = !NO_COLOR && IS_TTY;

const ANSI = {
  RESET: "\x1b[0m",
  BOLD: "\x1b[1m",
  DIM: "\x1b[2m",
  GREEN: "\x1b[32m",
  RED: "\x1b[31m",
  YELLOW: "\x1b[33m",
  CYAN: "\x1b[36m",
};

export function bold(text: string): string { return COLORS_ENABLED ? `${ANSI.BOLD}${text}${ANSI.RESET}` : text; }
export function green(text: string): string { return COLORS_ENABLED ? `${ANSI.GREEN}${text}${ANSI.RESET}` : text; }
export function red(text: string): string { return COLORS_ENABLED ? `${ANSI.RED}${text}${ANSI.RESET}` : text; }
export function yellow(text: string): string { return COLORS_ENABLED ? `${ANSI.YELLOW}${text}${ANSI.RESET}` : text; }
export function cyan(text: string): string { return COLORS_ENABLED ? `${ANSI.CYAN}${text}${ANSI.RESET}` : text; }
export function dim(text: string): string { return COLORS_ENABLED ? `${ANSI.DIM}${text}${ANSI.RESET}` : text; }
export function log(msg: string): void { console.log(msg); }
export function info(msg: string): void { console.log(`${cyan("ℹ")} ${msg}`); }
export function warn(msg: string): void { console.log(`${yellow("⚠")} ${msg}`); }
export function error(msg: string): void { console.error(`${red("✖")} ${msg}`); }

/** Reads one line from the terminal. The default Prompter. */
export async function ask(question: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
  });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

/** Returns true only for a lowercase "y"; surrounding whitespace is ignored. */
export async function confirm(prompt: string, prompter: Prompter = ask): Promise<boolean> {
  const input = await prompter(`${prompt} ${dim("[y/N]")}: `);
  return input.trim() === "y";
}
