/**
 * Crumb filename codec and stamp clock
 *
 * Format: cr-<seconds:12>-<micros:6>-<kind>.json, kind token in {new, update, del}
 *
 * Invariants:
 * - Both stamp fields are zero-padded to a fixed width, so lexicographic order of
 *   names equals numeric order of stamps
 * - A StampClock never issues the same stamp twice and never goes backwards,
 *   even when the underlying clock does not advance between calls
 */

import { performance } from "node:perf_hooks";
import type { CrumbKind, MicrosClock } from "../types.js";

export const CRUMB_PREFIX = "cr-";
export const CRUMB_EXTENSION = ".json";

const SECONDS_WIDTH = 12;
const MICROS_WIDTH = 6;
const MICROS_PER_SECOND = 1_000_000;
// The 12-digit seconds field can encode more than a double holds exactly
const MAX_STAMP = Math.min(10 ** SECONDS_WIDTH * MICROS_PER_SECOND - 1, Number.MAX_SAFE_INTEGER);

const KIND_TOKENS: Record<CrumbKind, string> = {
  new: "new",
  update: "update",
  delete: "del",
};

export const CRUMB_KINDS: readonly CrumbKind[] = ["new", "update", "delete"];

const TOKEN_KINDS = new Map<string, CrumbKind>(CRUMB_KINDS.map((kind) => [KIND_TOKENS[kind], kind]));

const CRUMB_NAME_PATTERN = /^cr-(\d{12})-(\d{6})-([a-z]+)\.json$/;

/**
 * Classification of a file found in the breadcrumb directory
 */
export type ParsedCrumbName =
  | { ok: true; name: string; stamp: number; kind: CrumbKind }
  | { ok: false; name: string; reason: string };

/**
 * Build the filename for a crumb
 * @param stamp - Microseconds since the epoch, as issued by a StampClock
 * @throws {RangeError} If the stamp does not fit the fixed-width encoding
 */
export function formatCrumbName(stamp: number, kind: CrumbKind): string {
  if (!Number.isSafeInteger(stamp) || stamp < 0 || stamp > MAX_STAMP) {
    throw new RangeError(`Crumb stamp out of range: ${stamp}`);
  }

  const seconds = Math.floor(stamp / MICROS_PER_SECOND);
  const micros = stamp % MICROS_PER_SECOND;

  return (
    CRUMB_PREFIX +
    String(seconds).padStart(SECONDS_WIDTH, "0") +
    "-" +
    String(micros).padStart(MICROS_WIDTH, "0") +
    "-" +
    KIND_TOKENS[kind] +
    CRUMB_EXTENSION
  );
}

/**
 * Classify a filename as a crumb of a known kind, or as malformed
 */
export function parseCrumbName(name: string): ParsedCrumbName {
  const match = CRUMB_NAME_PATTERN.exec(name);
  if (!match) {
    return { ok: false, name, reason: "name does not match cr-<seconds>-<micros>-<kind>.json" };
  }

  const [, secondsPart = "", microsPart = "", token = ""] = match;
  const kind = TOKEN_KINDS.get(token);
  if (!kind) {
    return { ok: false, name, reason: `unknown crumb kind "${token}"` };
  }

  const stamp = Number(secondsPart) * MICROS_PER_SECOND + Number(microsPart);
  // A clock that observed this stamp must still be able to issue the next one
  if (!Number.isSafeInteger(stamp) || stamp >= MAX_STAMP) {
    return { ok: false, name, reason: "stamp out of range" };
  }

  return { ok: true, name, stamp, kind };
}

/**
 * Wall clock in whole microseconds
 */
export function wallClockMicros(): number {
  return Math.floor((performance.timeOrigin + performance.now()) * 1000);
}

/**
 * Issues strictly increasing crumb stamps
 */
export class StampClock {
  #source: MicrosClock;
  #last = 0;

  constructor(source: MicrosClock = wallClockMicros) {
    this.#source = source;
  }

  /**
   * Most recently issued (or observed) stamp, 0 before the first
   */
  get last(): number {
    return this.#last;
  }

  next(): number {
    const now = Math.floor(this.#source());
    const stamp = now > this.#last ? now : this.#last + 1;
    this.#last = stamp;
    return stamp;
  }

  /**
   * Never issue a stamp at or below one already on disk
   */
  observe(stamp: number): void {
    if (stamp > this.#last) {
      this.#last = stamp;
    }
  }
}
