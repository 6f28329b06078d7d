/**
 * Record store: the in-memory trail and its crash-safe persistence
 */

import * as path from "node:path";
import type {
  Trail,
  TrailOptions,
  ResolvedTrailOptions,
  MessageRecord,
  MutationOptions,
  RecordPredicate,
  LoadResult,
  TrailStats,
} from "./types.js";
import { parseRecord, cloneRecord } from "./record.js";
import { inThread } from "./query.js";
import { Journal } from "./journal/journal.js";
import { replayCrumbs } from "./journal/replay.js";
import { readSnapshot, serializeSnapshot, writeSnapshot } from "./snapshot.js";
import { EmptyTrailError } from "./errors.js";
import { logger } from "./observability/logs.js";
import { MetricsCollector } from "./observability/metrics.js";

export const DEFAULT_SNAPSHOT_FILE = "trail.json";
export const DEFAULT_CRUMB_DIR = "crumbs";

/**
 * Ordered, deduplicated trail of messages, most recent first
 *
 * Every operation applies its in-memory effect before its first await, so calls
 * issued back to back observe each other in call order. Only file I/O is awaited.
 *
 * @example
 * ```typescript
 * const trail = openTrail({ root: "./data" });
 * await trail.load();
 *
 * await trail.insert(createRecord({ messageId: "<a1@example.org>", group: "INBOX" }));
 * await trail.updateLocation("<a1@example.org>", "Archive");
 *
 * trail.rotateBackward(); // step back through history
 * await trail.close();
 * ```
 */
class MessageTrail implements Trail {
  #options: ResolvedTrailOptions;
  #records: MessageRecord[] = [];
  #journal: Journal;
  #metrics = new MetricsCollector();
  #autosave: NodeJS.Timeout | undefined;
  #autosaveRunning = false;

  constructor(options: TrailOptions) {
    const root = path.resolve(options.root);
    const autosaveIntervalMs = options.autosaveIntervalMs ?? 0;

    if (!Number.isFinite(autosaveIntervalMs) || autosaveIntervalMs < 0) {
      throw new RangeError(`autosaveIntervalMs must be a non-negative number: ${autosaveIntervalMs}`);
    }

    this.#options = {
      root,
      snapshotPath: path.resolve(root, options.snapshotPath ?? DEFAULT_SNAPSHOT_FILE),
      crumbDir: path.resolve(root, options.crumbDir ?? DEFAULT_CRUMB_DIR),
      autosaveIntervalMs,
    };

    this.#journal = new Journal(this.#options.crumbDir, {
      clock: options.clock,
      metrics: this.#metrics,
    });
  }

  get options(): ResolvedTrailOptions {
    return this.#options;
  }

  get size(): number {
    return this.#records.length;
  }

  #indexOf(messageId: string): number {
    return this.#records.findIndex((record) => record.messageId === messageId);
  }

  async insert(record: MessageRecord, opts: MutationOptions = {}): Promise<void> {
    // Validation also copies, so the caller keeps no reference into the trail
    const stored = parseRecord(record);

    if (this.#indexOf(stored.messageId) !== -1) {
      return;
    }

    this.#records.unshift(stored);

    if (opts.persist ?? true) {
      await this.#journal.write("new", stored);
    }
  }

  async updateLocation(
    messageId: string,
    group: string,
    opts: MutationOptions = {}
  ): Promise<void> {
    const index = this.#indexOf(messageId);
    const record = this.#records[index];
    if (!record) {
      return;
    }

    record.group = group;

    if (opts.persist ?? true) {
      await this.#journal.write("update", record);
    }
  }

  async remove(messageId: string, opts: MutationOptions = {}): Promise<boolean> {
    const index = this.#indexOf(messageId);
    if (index === -1) {
      return false;
    }

    const [removed] = this.#records.splice(index, 1);

    if (removed && (opts.persist ?? true)) {
      await this.#journal.write("delete", removed);
    }

    return true;
  }

  async removeAll(): Promise<void> {
    const forgotten = this.#records.length;
    this.#records = [];

    await this.save();
    // save() keeps malformed leftovers for replay to report; a reset drops them too
    await this.#journal.purge();

    logger.info("trail.cleared", { path: this.#options.snapshotPath, details: { forgotten } });
  }

  find(messageId: string): MessageRecord | undefined {
    const record = this.#records.find((r) => r.messageId === messageId);
    return record ? cloneRecord(record) : undefined;
  }

  findAll(predicate: RecordPredicate): MessageRecord[] {
    return this.#records.filter((record) => predicate(record)).map(cloneRecord);
  }

  thread(messageId: string): MessageRecord[] {
    return this.findAll(inThread(messageId));
  }

  list(): MessageRecord[] {
    return this.#records.map(cloneRecord);
  }

  current(): MessageRecord | undefined {
    const front = this.#records[0];
    return front ? cloneRecord(front) : undefined;
  }

  rotateForward(): MessageRecord {
    const front = this.#records.shift();
    if (!front) {
      throw new EmptyTrailError("rotate forward");
    }
    this.#records.push(front);
    return cloneRecord(front);
  }

  rotateBackward(): MessageRecord {
    const back = this.#records.pop();
    if (!back) {
      throw new EmptyTrailError("rotate backward");
    }
    this.#records.unshift(back);
    return cloneRecord(back);
  }

  async save(snapshotPath: string = this.#options.snapshotPath): Promise<void> {
    const started = Date.now();

    // Everything up to this mark is in the serialized content; later crumbs must survive
    const content = serializeSnapshot(this.#records);
    const cutoff = this.#journal.mark();

    await this.#journal.drain();
    await writeSnapshot(snapshotPath, content);
    const compacted = await this.#journal.compact(cutoff);

    this.#metrics.recordSave(Date.now() - started);
    logger.debug("trail.saved", {
      path: snapshotPath,
      details: { records: this.#records.length, compacted },
    });
  }

  async load(snapshotPath: string = this.#options.snapshotPath): Promise<LoadResult> {
    const started = Date.now();

    const records = await readSnapshot(snapshotPath);
    this.#records = records ?? [];

    // Replay runs even without a snapshot: a crash before the first save leaves only crumbs
    const { applied, discarded } = await replayCrumbs(this.#journal, this);
    this.#metrics.recordReplay(applied, discarded);

    if (applied > 0) {
      logger.info("trail.recovered", {
        path: this.#journal.dir,
        details: { replayed: applied, discarded },
      });
      // Compacts the replayed crumbs: they stay on disk until this snapshot holds them
      await this.save(snapshotPath);
    }

    this.#metrics.recordLoad(Date.now() - started);

    if (this.#options.autosaveIntervalMs > 0 && !this.#autosave) {
      this.startAutosave(this.#options.autosaveIntervalMs);
    }

    return { loaded: records?.length ?? 0, replayed: applied, discarded };
  }

  async stats(): Promise<TrailStats> {
    return {
      records: this.#records.length,
      pendingCrumbs: await this.#journal.pending(),
      snapshotPath: this.#options.snapshotPath,
      crumbDir: this.#options.crumbDir,
      metrics: this.#metrics.snapshot(),
    };
  }

  startAutosave(intervalMs: number): void {
    if (!Number.isFinite(intervalMs) || intervalMs <= 0) {
      throw new RangeError(`Autosave interval must be a positive number: ${intervalMs}`);
    }

    this.#stopAutosave();

    this.#autosave = setInterval(() => {
      // Skip a tick rather than overlap a slow save
      if (this.#autosaveRunning) {
        return;
      }
      this.#autosaveRunning = true;
      void this.save()
        .catch((err: unknown) => {
          logger.error("trail.autosave_failed", {
            path: this.#options.snapshotPath,
            message: err instanceof Error ? err.message : String(err),
          });
        })
        .finally(() => {
          this.#autosaveRunning = false;
        });
    }, intervalMs);

    // Autosave alone never keeps the process alive
    this.#autosave.unref();
  }

  #stopAutosave(): void {
    if (this.#autosave) {
      clearInterval(this.#autosave);
      this.#autosave = undefined;
    }
  }

  async close(): Promise<void> {
    this.#stopAutosave();
    await this.save();
  }
}

/**
 * Open a trail. Nothing is read until load() is called.
 */
export function openTrail(options: TrailOptions): Trail {
  return new MessageTrail(options);
}
