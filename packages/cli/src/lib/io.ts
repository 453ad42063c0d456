/**
 * I/O helpers for CLI
 */

import { realpath, stat } from "node:fs/promises";
import { resolve } from "node:path";
import { setTimeout as delay } from "node:timers/promises";

/**
 * Where a command writes; stdout carries quotations, stderr everything else
 */
export interface CliOutput {
  out(text: string): void;
  err(text: string): void;
  /** Whether stderr is a terminal (enables color) */
  errIsTTY: boolean;
}

/**
 * Everything a command reads from its process
 */
export interface CliContext {
  output: CliOutput;
  env: NodeJS.ProcessEnv;
  cwd: string;
  sleep(ms: number): Promise<void>;
}

/**
 * Write to stdout
 */
export function writeStdout(content: string): void {
  process.stdout.write(content);
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

export function processContext(): CliContext {
  return {
    output: {
      out: writeStdout,
      err: writeStderr,
      errIsTTY: process.stderr.isTTY ?? false,
    },
    env: process.env,
    cwd: process.cwd(),
    sleep: (ms) => delay(ms),
  };
}

/**
 * Canonical absolute path for display, falling back to a lexical resolve
 */
export async function displayPath(path: string, cwd: string): Promise<string> {
  try {
    return await realpath(resolve(cwd, path));
  } catch {
    return resolve(cwd, path);
  }
}

export async function isDirectory(path: string, cwd: string): Promise<boolean> {
  try {
    return (await stat(resolve(cwd, path))).isDirectory();
  } catch {
    return false;
  }
}
