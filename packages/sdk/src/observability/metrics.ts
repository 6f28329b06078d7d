/**
 * Metrics tracking for journal and snapshot operations
 */

export interface TrailMetrics {
  crumbsWritten: number;
  crumbsReplayed: number;
  crumbsDiscarded: number;
  crumbWriteFailures: number;
  saves: number;
  loads: number;
  saveTimeMs: number[];
  loadTimeMs: number[];
}

const MAX_SAMPLES = 100;

/**
 * 95th percentile of a list of samples (nearest rank), 0 when empty
 */
export function p95(samples: readonly number[]): number {
  if (samples.length === 0) {
    return 0;
  }

  const sorted = [...samples].sort((a, b) => a - b);
  return sorted[Math.max(0, Math.ceil(sorted.length * 0.95) - 1)] ?? 0;
}

/**
 * Per-trail counters. Timing arrays keep the last 100 samples.
 */
export class MetricsCollector {
  #metrics: TrailMetrics = MetricsCollector.#empty();

  static #empty(): TrailMetrics {
    return {
      crumbsWritten: 0,
      crumbsReplayed: 0,
      crumbsDiscarded: 0,
      crumbWriteFailures: 0,
      saves: 0,
      loads: 0,
      saveTimeMs: [],
      loadTimeMs: [],
    };
  }

  static #push(samples: number[], ms: number): void {
    samples.push(ms);
    if (samples.length > MAX_SAMPLES) {
      samples.shift();
    }
  }

  recordCrumbWritten(): void {
    this.#metrics.crumbsWritten++;
  }

  recordCrumbWriteFailure(): void {
    this.#metrics.crumbWriteFailures++;
  }

  recordReplay(applied: number, discarded: number): void {
    this.#metrics.crumbsReplayed += applied;
    this.#metrics.crumbsDiscarded += discarded;
  }

  recordSave(ms: number): void {
    this.#metrics.saves++;
    MetricsCollector.#push(this.#metrics.saveTimeMs, ms);
  }

  recordLoad(ms: number): void {
    this.#metrics.loads++;
    MetricsCollector.#push(this.#metrics.loadTimeMs, ms);
  }

  /**
   * Copy of the current counters
   */
  snapshot(): TrailMetrics {
    return {
      ...this.#metrics,
      saveTimeMs: [...this.#metrics.saveTimeMs],
      loadTimeMs: [...this.#metrics.loadTimeMs],
    };
  }
}
