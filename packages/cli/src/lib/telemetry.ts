/**
 * Telemetry and observability helpers
 */

import { metrics } from "@fortunate/sdk";
import { isMetricsEnabled } from "./env.js";
import type { CliContext } from "./io.js";

const SANITIZE_NEWLINES = /[\r\n]+/g;

/**
 * Sanitize metric part by removing newlines
 */
function sanitizeMetricPart(part: unknown): string {
  return String(part).replace(SANITIZE_NEWLINES, " ").trim();
}

/**
 * Emit a metric to stderr if FORTUNE_CLI_METRICS=1
 */
export function emitMetric(context: CliContext, key: string, fields: Record<string, unknown>): void {
  if (!isMetricsEnabled(context.env)) {
    return;
  }

  const parts = [`metric ${sanitizeMetricPart(key)}`];
  for (const [k, v] of Object.entries(fields)) {
    parts.push(`${sanitizeMetricPart(k)}=${sanitizeMetricPart(v)}`);
  }

  context.output.err(parts.join(" ") + "\n");
}

/**
 * Emit the SDK's index counters
 */
export function emitIndexMetrics(context: CliContext): void {
  const snapshot = metrics.snapshot();
  emitMetric(context, "sdk.index", {
    hits: snapshot.indexHits,
    rebuilds: snapshot.indexRebuilds,
    write_failures: snapshot.indexWriteFailures,
    load_p95_ms: metrics.getP95(snapshot.loadTimeMs).toFixed(2),
  });
}

/**
 * Wrap an async function with timing metrics
 */
export async function withTiming<T>(context: CliContext, label: string, fn: () => Promise<T>): Promise<T> {
  const start = Date.now();
  let success = false;

  try {
    const result = await fn();
    success = true;
    return result;
  } finally {
    const duration = Date.now() - start;
    emitMetric(context, label, {
      duration_ms: duration,
      success,
    });
  }
}
