/**
 * Metrics tracking for index loading and selection
 */

export interface FortuneMetrics {
  /** Indexes read from disk and accepted */
  indexHits: number;
  /** Indexes regenerated (missing, stale, corrupt or forced) */
  indexRebuilds: number;
  /** Regenerated indexes that could not be written back */
  indexWriteFailures: number;
  /** Successful selections */
  draws: number;
  /** Stage-1 redraws after a source had no eligible entries */
  retries: number;
  loadTimeMs: number[];
}

const MAX_SAMPLES = 100;

function emptyMetrics(): FortuneMetrics {
  return {
    indexHits: 0,
    indexRebuilds: 0,
    indexWriteFailures: 0,
    draws: 0,
    retries: 0,
    loadTimeMs: [],
  };
}

class MetricsCollector {
  #metrics: FortuneMetrics = emptyMetrics();

  recordIndexHit(): void {
    this.#metrics.indexHits++;
  }

  recordIndexRebuild(): void {
    this.#metrics.indexRebuilds++;
  }

  recordIndexWriteFailure(): void {
    this.#metrics.indexWriteFailures++;
  }

  recordDraw(): void {
    this.#metrics.draws++;
  }

  recordRetry(): void {
    this.#metrics.retries++;
  }

  /**
   * Record the time spent loading one source
   */
  recordLoadTime(ms: number): void {
    this.#metrics.loadTimeMs.push(ms);

    // Keep only the last samples to avoid unbounded memory growth
    if (this.#metrics.loadTimeMs.length > MAX_SAMPLES) {
      this.#metrics.loadTimeMs.shift();
    }
  }

  /**
   * Calculate p95 for a metric
   */
  getP95(values: readonly number[]): number {
    if (values.length === 0) return 0;

    const sorted = [...values].sort((a, b) => a - b);
    const idx = Math.ceil(sorted.length * 0.95) - 1;
    return sorted[Math.max(0, idx)] ?? 0;
  }

  /**
   * Copy of the current counters
   */
  snapshot(): FortuneMetrics {
    return { ...this.#metrics, loadTimeMs: [...this.#metrics.loadTimeMs] };
  }

  reset(): void {
    this.#metrics = emptyMetrics();
  }
}

/**
 * Global metrics collector instance
 */
export const metrics = new MetricsCollector();
