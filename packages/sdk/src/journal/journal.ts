/**
 * Breadcrumb journal: one small file per mutation between snapshots
 * Crumbs are written atomically, so a crash leaves either a whole crumb or a stray temp file
 */

import * as path from "node:path";
import { atomicWrite, listFiles, readTextFile, removeFile } from "../io.js";
import { stableStringify, RECORD_KEY_ORDER } from "../format.js";
import { decodeRecord } from "../record.js";
import { CrumbCorruptError, CrumbWriteError } from "../errors.js";
import type { MetricsCollector } from "../observability/metrics.js";
import type { CrumbKind, MessageRecord, MicrosClock } from "../types.js";
import { StampClock, formatCrumbName, parseCrumbName, type ParsedCrumbName } from "./crumb-name.js";

/**
 * A file found in the breadcrumb directory, classified by name
 */
export type CrumbFile = ParsedCrumbName & { path: string };

export interface JournalOptions {
  clock?: MicrosClock;
  metrics?: MetricsCollector;
}

/**
 * Journal writer for a breadcrumb directory
 */
export class Journal {
  #dir: string;
  #clock: StampClock;
  #metrics: MetricsCollector | undefined;
  #pending = new Set<Promise<unknown>>();

  constructor(dir: string, options: JournalOptions = {}) {
    this.#dir = dir;
    this.#clock = new StampClock(options.clock);
    this.#metrics = options.metrics;
  }

  get dir(): string {
    return this.#dir;
  }

  /**
   * Issue a stamp without writing a crumb. Every crumb already issued sorts at or
   * before it, every later one after it.
   */
  mark(): number {
    return this.#clock.next();
  }

  /**
   * Journal one mutation. The stamp is taken synchronously, so crumbs sort in call order
   * regardless of which write finishes first.
   * @returns Path of the written crumb
   * @throws {CrumbWriteError} If the crumb cannot be written
   */
  write(kind: CrumbKind, record: MessageRecord): Promise<string> {
    const name = formatCrumbName(this.#clock.next(), kind);
    const crumbPath = path.join(this.#dir, name);
    const content = stableStringify(record, 2, RECORD_KEY_ORDER);

    const op = atomicWrite(crumbPath, content).then(
      () => {
        this.#metrics?.recordCrumbWritten();
        return crumbPath;
      },
      (err: unknown) => {
        this.#metrics?.recordCrumbWriteFailure();
        throw new CrumbWriteError(crumbPath, { cause: err });
      }
    );

    const settle = (): void => {
      this.#pending.delete(op);
    };
    this.#pending.add(op);
    void op.then(settle, settle);

    return op;
  }

  /**
   * Wait until every crumb write started so far has settled
   */
  async drain(): Promise<void> {
    await Promise.allSettled([...this.#pending]);
  }

  /**
   * Every file in the breadcrumb directory, in name (= chronological) order
   */
  async list(): Promise<CrumbFile[]> {
    const names = await listFiles(this.#dir);

    return names.map((name) => {
      const parsed = parseCrumbName(name);
      if (parsed.ok) {
        this.#clock.observe(parsed.stamp);
      }
      return { ...parsed, path: path.join(this.#dir, name) };
    });
  }

  /**
   * Read the record a crumb carries
   * @throws {CrumbCorruptError} If the body is not a valid record
   */
  async read(crumbPath: string): Promise<MessageRecord> {
    const text = await readTextFile(crumbPath);

    let value: unknown;
    try {
      value = JSON.parse(text);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CrumbCorruptError(crumbPath, reason, { cause: err });
    }

    const decoded = decodeRecord(value);
    if (!decoded.ok) {
      throw new CrumbCorruptError(crumbPath, decoded.issues.join("; "));
    }
    return decoded.record;
  }

  /**
   * Delete a single crumb (idempotent)
   */
  async discard(crumbPath: string): Promise<void> {
    await removeFile(crumbPath);
  }

  /**
   * Delete crumbs stamped at or before upTo. Crumbs written later, and malformed files, stay.
   * @returns Number of crumbs deleted
   */
  async compact(upTo: number = Number.MAX_SAFE_INTEGER): Promise<number> {
    const files = await this.list();
    let removed = 0;

    for (const file of files) {
      if (file.ok && file.stamp <= upTo) {
        await removeFile(file.path);
        removed++;
      }
    }

    return removed;
  }

  /**
   * Delete every file in the breadcrumb directory
   * @returns Number of files deleted
   */
  async purge(): Promise<number> {
    const files = await this.list();

    for (const file of files) {
      await removeFile(file.path);
    }

    return files.length;
  }

  /**
   * Number of files waiting in the breadcrumb directory
   */
  async pending(): Promise<number> {
    const names = await listFiles(this.#dir);
    return names.length;
  }
}
