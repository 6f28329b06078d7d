/**
 * Per-command timing, written to stderr in verbose mode as
 * `metric <key> field=value ...`
 */

import { isVerbose } from "./env.js";
import { writeStderr } from "./io.js";

function metricValue(value: unknown): string {
  return String(value).replace(/\s+/g, " ").trim();
}

export function emitMetric(
  key: string,
  fields: Record<string, unknown>,
  verbose = isVerbose()
): void {
  if (!verbose) {
    return;
  }

  const pairs = Object.entries(fields).map(([k, v]) => `${metricValue(k)}=${metricValue(v)}`);
  writeStderr(`metric ${[metricValue(key), ...pairs].join(" ")}\n`);
}

/**
 * Run fn and report its duration and outcome, whether it succeeds or throws
 */
export async function withTiming<T>(
  label: string,
  fn: () => Promise<T>,
  verbose?: boolean
): Promise<T> {
  const started = performance.now();
  let ok = false;

  try {
    const result = await fn();
    ok = true;
    return result;
  } finally {
    emitMetric(label, { duration_ms: Math.round(performance.now() - started), ok }, isVerbose(verbose));
  }
}
