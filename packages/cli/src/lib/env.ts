/**
 * Environment and configuration resolution
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

const packageJsonSchema = z.object({ version: z.string() });

/**
 * Version from this package's package.json
 */
export function readPackageVersion(): string {
  const raw: unknown = JSON.parse(readFileSync(new URL("../../package.json", import.meta.url), "utf-8"));
  return packageJsonSchema.parse(raw).version;
}

/**
 * Check if CLI timing metrics should be printed
 */
export function isMetricsEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return env.FORTUNE_CLI_METRICS === "1";
}
