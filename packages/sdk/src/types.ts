/**
 * Core types for the message trail
 */

import type { TrailMetrics } from "./observability/metrics.js";

/**
 * Header a recipient list came from
 */
export type RecipientRole = "to" | "cc" | "bcc";

/**
 * One (role, address-list) pair of a message
 */
export interface Recipient {
  role: RecipientRole;
  addresses: string[];
}

/**
 * One tracked message. Every field except `group` is fixed once the record is stored.
 */
export interface MessageRecord {
  /** Precomputed human-readable summary; the store never interprets it */
  readonly displayLine: string;
  /** Folder or group the message currently lives in */
  group: string;
  /** Unique key, never empty */
  readonly messageId: string;
  /** Formatted timestamp, opaque to the store */
  readonly date: string;
  readonly subject: string;
  readonly sender: string;
  readonly recipients: readonly Recipient[];
  readonly references: string;
  readonly inReplyTo?: string;
}

/**
 * Mutation kinds a crumb can journal
 */
export type CrumbKind = "new" | "update" | "delete";

/**
 * Options for a single mutation
 */
export interface MutationOptions {
  /**
   * Write a crumb for this mutation (default: true).
   * Replay passes false so applying a crumb never creates another.
   */
  persist?: boolean;
}

/**
 * Microsecond wall clock used to stamp crumbs
 */
export type MicrosClock = () => number;

/**
 * Trail configuration
 */
export interface TrailOptions {
  /** Directory holding the snapshot and the crumb directory */
  root: string;
  /** Snapshot file (default: <root>/trail.json) */
  snapshotPath?: string;
  /** Breadcrumb directory (default: <root>/crumbs) */
  crumbDir?: string;
  /** Clock for crumb stamps (default: high-resolution wall clock) */
  clock?: MicrosClock;
  /** Save periodically once load() has completed; 0 disables (default: 0) */
  autosaveIntervalMs?: number;
}

/**
 * Options after defaults are applied
 */
export interface ResolvedTrailOptions {
  root: string;
  snapshotPath: string;
  crumbDir: string;
  autosaveIntervalMs: number;
}

/**
 * Outcome of a load
 */
export interface LoadResult {
  /** Records read from the snapshot, 0 when it was missing */
  loaded: number;
  /** Crumbs applied during replay */
  replayed: number;
  /** Malformed crumbs deleted during replay */
  discarded: number;
}

/**
 * Trail statistics
 */
export interface TrailStats {
  records: number;
  pendingCrumbs: number;
  snapshotPath: string;
  crumbDir: string;
  metrics: TrailMetrics;
}

/**
 * Record predicate for findAll
 */
export type RecordPredicate = (record: MessageRecord) => boolean;

/**
 * Record store interface
 */
export interface Trail {
  readonly options: ResolvedTrailOptions;

  /** Number of records */
  readonly size: number;

  /**
   * Track a message as most recent. Does nothing if its messageId is already tracked.
   * @throws {InvalidRecordError} If the record fails validation
   * @throws {CrumbWriteError} If the crumb cannot be written (the record stays inserted)
   */
  insert(record: MessageRecord, opts?: MutationOptions): Promise<void>;

  /**
   * Move a tracked message to another group. Does nothing if it is not tracked.
   */
  updateLocation(messageId: string, group: string, opts?: MutationOptions): Promise<void>;

  /**
   * Forget a message
   * @returns true if a record was removed
   */
  remove(messageId: string, opts?: MutationOptions): Promise<boolean>;

  /**
   * Forget every message, delete every crumb and save the empty trail.
   * Irreversible; callers confirm with the user first.
   */
  removeAll(): Promise<void>;

  find(messageId: string): MessageRecord | undefined;

  findAll(predicate: RecordPredicate): MessageRecord[];

  /**
   * The message itself (if tracked) plus every tracked reply or descendant referencing it
   */
  thread(messageId: string): MessageRecord[];

  /** All records, most recent first */
  list(): MessageRecord[];

  /** The front record, or undefined when empty */
  current(): MessageRecord | undefined;

  /**
   * Move the front record to the back and return it
   * @throws {EmptyTrailError} If the trail is empty
   */
  rotateForward(): MessageRecord;

  /**
   * Move the back record to the front and return it
   * @throws {EmptyTrailError} If the trail is empty
   */
  rotateBackward(): MessageRecord;

  /**
   * Write the full snapshot atomically, then compact crumbs
   * @param path - Snapshot path (default: options.snapshotPath)
   */
  save(path?: string): Promise<void>;

  /**
   * Replace memory with the snapshot, replay leftover crumbs, re-save if any were replayed
   * @param path - Snapshot path (default: options.snapshotPath)
   * @throws {SnapshotCorruptError} If the snapshot exists but does not parse
   */
  load(path?: string): Promise<LoadResult>;

  stats(): Promise<TrailStats>;

  /**
   * Save every intervalMs until close(). Replaces a running schedule.
   */
  startAutosave(intervalMs: number): void;

  /**
   * Stop autosave and save a final snapshot
   */
  close(): Promise<void>;
}
