/**
 * Top-level error handler shared by the executables
 */

import { CommanderError } from "commander";
import type { Command } from "commander";
import { formatCliError, mapErrorToExitCode } from "./errors.js";
import { colorize } from "./render.js";
import type { CliContext } from "./io.js";

/**
 * Parse and run a program
 * @param argv - Arguments after the executable name
 * @returns The process exit code
 */
export async function runProgram(program: Command, argv: readonly string[], context: CliContext): Promise<number> {
  try {
    await program.parseAsync([...argv], { from: "user" });
    return 0;
  } catch (err) {
    // Commander has already printed usage errors, help and version
    if (err instanceof CommanderError) {
      return err.exitCode;
    }

    const verbose = program.opts<{ verbose?: boolean }>().verbose ?? false;
    const message = `${program.name()}: ${formatCliError(err, verbose)}\n`;
    context.output.err(colorize(message, "red", context.output.errIsTTY));

    return mapErrorToExitCode(err);
  }
}
