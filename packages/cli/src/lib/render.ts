/**
 * Output rendering helpers
 */

import type { BuildStats } from "@fortunate/sdk";

type Color = "red" | "green" | "yellow";

const MIN_WAIT_SECONDS = 6;
const CHARS_PER_SECOND = 20;

/**
 * Quotation text as printed: always newline-terminated
 */
export function formatQuotation(text: string): string {
  return text.endsWith("\n") ? text : `${text}\n`;
}

/**
 * Header printed before a quotation by -c
 */
export function formatSourceHeader(path: string): string {
  return `(${path})\n%\n`;
}

/**
 * One -f line, e.g. "12.50% /usr/share/fortune/jokes"
 */
export function formatProbabilityLine(percentage: number, label: string, indent = 0): string {
  return `${" ".repeat(indent)}${percentage.toFixed(2)}% ${label}\n`;
}

/**
 * strfile summary
 */
export function formatBuildSummary(outputPath: string, stats: BuildStats): string {
  return [
    `"${outputPath}" created`,
    `${stats.count} strings`,
    `longest string: ${stats.longest} bytes`,
    `shortest string: ${stats.shortest} bytes`,
  ].join("\n") + "\n";
}

/**
 * Seconds -w pauses after a quotation: one per 20 characters, at least 6
 */
export function waitSeconds(text: string): number {
  const chars = [...text].length;
  return Math.max(MIN_WAIT_SECONDS, Math.ceil(chars / CHARS_PER_SECOND));
}

/**
 * Apply ANSI color only if the target is a TTY
 */
export function colorize(text: string, color: Color, isTTY: boolean): string {
  if (!isTTY) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}
