/**
 * strfile command: build a `.dat` index for a corpus file
 */

import { resolve } from "node:path";
import { Command } from "commander";
import {
  atomicWrite,
  buildIndex,
  createRandomSource,
  encodeIndex,
  indexPathFor,
  logger,
  readSource,
  resolveLogLevel,
  resolveRngConfig,
} from "@fortunate/sdk";
import { parseDelimiter } from "../lib/arg.js";
import { readPackageVersion } from "../lib/env.js";
import { processContext } from "../lib/io.js";
import type { CliContext } from "../lib/io.js";
import { colorize, formatBuildSummary } from "../lib/render.js";
import { withTiming } from "../lib/telemetry.js";

export interface StrfileOptions {
  delimiter: number;
  randomize?: boolean;
  rotated?: boolean;
  silent?: boolean;
  allowEmpty?: boolean;
  verbose?: boolean;
}

/**
 * Index `input`, writing to `output` (default `<input>.dat`)
 */
export async function runStrfile(
  input: string,
  output: string | undefined,
  options: StrfileOptions,
  context: CliContext
): Promise<void> {
  logger.setLevel(options.verbose ? "debug" : resolveLogLevel(context.env));

  const inputPath = resolve(context.cwd, input);
  const outputPath = output === undefined ? indexPathFor(inputPath) : resolve(context.cwd, output);

  const text = await readSource(inputPath);
  const built = buildIndex(text, {
    delimiter: options.delimiter,
    randomize: options.randomize ?? false,
    ...(options.randomize ? { random: createRandomSource(resolveRngConfig(context.env)) } : {}),
    rotated: options.rotated ?? false,
    allowEmpty: options.allowEmpty ?? false,
  });
  await atomicWrite(outputPath, encodeIndex(built.header, built.offsets));

  logger.debug("strfile.written", { path: outputPath, details: { strings: built.stats.count } });

  if (!options.silent) {
    context.output.out(formatBuildSummary(output ?? indexPathFor(input), built.stats));
  }
}

/**
 * Build the strfile program
 */
export function createStrfileProgram(context: CliContext = processContext()): Command {
  const program = new Command();

  program
    .name("strfile")
    .description("Build a random access index for a fortune file")
    .version(readPackageVersion(), "-v, --version")
    .configureOutput({
      writeOut: (str) => context.output.out(str),
      writeErr: (str) => context.output.err(colorize(str, "red", context.output.errIsTTY)),
    })
    .exitOverride()
    .argument("<input>", "corpus text file")
    .argument("[output]", "index file to write (default <input>.dat)")
    .option("-c, --delimiter <char>", "delimiting character", parseDelimiter, 0x25)
    .option("-r, --randomize", "randomize the order of the offset table")
    .option("-x, --rotated", "mark the text as ROT13-encoded")
    .option("-s, --silent", "run silently; don't print a summary")
    .option("--allow-empty", "keep empty entries between consecutive delimiters")
    .option("--verbose", "verbose diagnostics")
    .action(async (input: string, output: string | undefined, options: StrfileOptions) => {
      await withTiming(context, "cli.strfile", () => runStrfile(input, output, options, context));
    });

  return program;
}
