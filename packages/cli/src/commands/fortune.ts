/**
 * fortune command: print a random quotation, list sources or print matches
 */

import { basename, resolve } from "node:path";
import { Command, Option } from "commander";
import {
  ALL_SOURCES,
  DEFAULT_SHORT_MAX,
  NoMatchingQuotationError,
  createRandomSource,
  discover,
  enumerateMatches,
  listProbabilities,
  logger,
  parseSourceSpecs,
  resolveLocales,
  resolveLogLevel,
  resolveRngConfig,
  resolveSearchPath,
  selectOne,
  validateRequest,
} from "@fortunate/sdk";
import type { Catalog, OffensiveMode, SelectionRequest, SourceSpec } from "@fortunate/sdk";
import { parseNonNegativeInt } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { readPackageVersion } from "../lib/env.js";
import { displayPath, isDirectory, processContext } from "../lib/io.js";
import type { CliContext } from "../lib/io.js";
import {
  colorize,
  formatProbabilityLine,
  formatQuotation,
  formatSourceHeader,
  waitSeconds,
} from "../lib/render.js";
import { emitIndexMetrics, withTiming } from "../lib/telemetry.js";

export interface FortuneOptions {
  all?: boolean;
  offensive?: boolean;
  equal?: boolean;
  files?: boolean;
  long?: boolean;
  short?: boolean;
  length: number;
  match?: string;
  ignoreCase?: boolean;
  showSource?: boolean;
  wait?: boolean;
  rebuild?: boolean;
  verbose?: boolean;
}

function offensiveMode(options: FortuneOptions): OffensiveMode {
  if (options.offensive) return "only";
  if (options.all) return "include";
  return "exclude";
}

/**
 * Translate flags into a validated selection request
 */
export function requestFromOptions(options: FortuneOptions): SelectionRequest {
  if (options.ignoreCase && options.match === undefined) {
    throw new CliError("-i requires -m <pattern>");
  }

  return validateRequest({
    filter: options.long ? "long" : options.short ? "short" : "all",
    longThreshold: options.length + 1,
    offensive: offensiveMode(options),
    equalProbability: options.equal ?? false,
    ...(options.match === undefined ? {} : { pattern: options.match }),
    ignoreCase: options.ignoreCase ?? false,
    listSources: options.files ?? false,
  });
}

/**
 * -f: sources and their chances, on stderr
 *
 * A lone directory argument prints its total followed by each file's share of it.
 */
async function printProbabilities(catalog: Catalog, specs: readonly SourceSpec[], context: CliContext): Promise<void> {
  const rows = listProbabilities(catalog);
  const [only] = specs;

  if (specs.length === 1 && only && (await isDirectory(only.path, context.cwd))) {
    const total = rows.reduce((sum, row) => sum + row.probability, 0);
    context.output.err(formatProbabilityLine(total * 100, await displayPath(only.path, context.cwd)));
    for (const row of rows) {
      const share = total > 0 ? (row.probability / total) * 100 : 0;
      context.output.err(formatProbabilityLine(share, basename(row.path), 4));
    }
    return;
  }

  for (const row of rows) {
    context.output.err(formatProbabilityLine(row.percentage, await displayPath(row.path, context.cwd)));
  }
}

/**
 * -m: every match on stdout followed by a "%" line; each source path announced once on stderr
 */
async function printMatches(catalog: Catalog, request: SelectionRequest, context: CliContext): Promise<void> {
  const announced = new Set<string>();

  for (const quotation of enumerateMatches(catalog, request)) {
    if (!announced.has(quotation.sourcePath)) {
      announced.add(quotation.sourcePath);
      context.output.err(`${await displayPath(quotation.sourcePath, context.cwd)}\n`);
    }
    context.output.out(formatQuotation(quotation.text));
    context.output.out("%\n");
  }

  if (announced.size === 0) {
    const flags = request.ignoreCase ? "i" : "";
    throw new NoMatchingQuotationError(`pattern /${request.pattern ?? ""}/${flags}`);
  }
}

/**
 * Run fortune with parsed arguments
 */
export async function runFortune(tokens: readonly string[], options: FortuneOptions, context: CliContext): Promise<void> {
  logger.setLevel(options.verbose ? "debug" : resolveLogLevel(context.env));

  const request = requestFromOptions(options);
  const specs = parseSourceSpecs(tokens).map((spec) =>
    spec.path === ALL_SOURCES ? spec : { ...spec, path: resolve(context.cwd, spec.path) }
  );

  const catalog = await discover(specs, {
    offensive: request.offensive,
    weightMode: request.equalProbability ? "equal" : "count",
    rebuild: options.rebuild ?? false,
    searchPath: resolveSearchPath(context.env),
    locales: resolveLocales(context.env),
  });
  emitIndexMetrics(context);

  if (request.listSources) {
    await printProbabilities(catalog, specs, context);
    return;
  }

  if (request.pattern !== undefined) {
    await printMatches(catalog, request, context);
    return;
  }

  const random = createRandomSource(resolveRngConfig(context.env));
  const quotation = selectOne(catalog, request, random);

  if (options.showSource) {
    context.output.out(formatSourceHeader(await displayPath(quotation.sourcePath, context.cwd)));
  }
  context.output.out(formatQuotation(quotation.text));
  logger.info("fortune.emitted", { path: quotation.sourcePath, details: { index: quotation.index } });

  if (options.wait) {
    const seconds = waitSeconds(quotation.text);
    logger.debug("fortune.wait", { details: { seconds } });
    await context.sleep(seconds * 1000);
  }
}

/**
 * Build the fortune program
 */
export function createFortuneProgram(context: CliContext = processContext()): Command {
  const program = new Command();

  program
    .name("fortune")
    .description("Print a random, hopefully interesting, adage")
    .version(readPackageVersion(), "-v, --version")
    .configureOutput({
      writeOut: (str) => context.output.out(str),
      writeErr: (str) => context.output.err(colorize(str, "red", context.output.errIsTTY)),
    })
    .exitOverride()
    .argument("[sources...]", "corpus files or directories, each optionally preceded by N%")
    .option("-a, --all", "choose from all lists of maxims, offensive ones included")
    .option("-o, --offensive", "choose only from potentially offensive aphorisms")
    .option("-e, --equal", "consider all fortune files to be of equal size")
    .option("-f, --files", "print out the list of files which would be searched, then exit")
    .addOption(new Option("-l, --long", "long dictums only").conflicts("short"))
    .addOption(new Option("-s, --short", "short apothegms only").conflicts("long"))
    .option(
      "-n, --length <bytes>",
      "longest fortune length (in bytes) considered to be short",
      (value: string) => parseNonNegativeInt(value, "--length"),
      DEFAULT_SHORT_MAX
    )
    .option("-m, --match <pattern>", "print out all fortunes which match the regular expression")
    .option("-i, --ignore-case", "ignore case for -m patterns")
    .option("-c, --show-source", "show the cookie file from which the fortune came")
    .option("-w, --wait", "wait before termination for an amount of time based on the message length")
    .option("--rebuild", "regenerate every index before selecting")
    .option("--verbose", "verbose diagnostics")
    .action(async (sources: string[], options: FortuneOptions) => {
      await withTiming(context, "cli.fortune", () => runFortune(sources, options, context));
    });

  return program;
}
