/**
 * CLI testing utilities
 */

import { createRequire } from "node:module";
import { pathToFileURL } from "node:url";
import { execa } from "execa";

const require = createRequire(import.meta.url);

/**
 * Loader URL for tsx, resolved from this package so any cwd works
 */
const TSX_LOADER = pathToFileURL(require.resolve("tsx")).href;

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Current working directory */
  cwd?: string;
  /** Environment variables */
  env?: Record<string, string>;
  /** Milliseconds before the process is killed (default 15000) */
  timeout?: number;
  /** Preload tsx so a `.ts` entry runs (default true); off for launchers that register it themselves */
  loader?: boolean;
}

/**
 * Run a CLI entry point with node, by default through the tsx loader
 * @param entry - Path to the CLI entry file
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode; never rejects on a non-zero exit
 */
export async function runCli(entry: string, args: string[], options: CliExecOptions = {}): Promise<CliResult> {
  const { cwd, env, timeout = 15_000, loader = true } = options;
  const nodeArgs = loader ? ["--import", TSX_LOADER, entry] : [entry];

  const result = await execa(process.execPath, [...nodeArgs, ...args], {
    cwd,
    env: { ...process.env, ...env },
    extendEnv: false,
    reject: false,
    stripFinalNewline: false,
    timeout,
  });

  return {
    stdout: String(result.stdout),
    stderr: String(result.stderr),
    exitCode: result.exitCode ?? null,
  };
}
