/**
 * msgtrail SDK
 *
 * A small, durable, deduplicated trail of messages a user has read or sent
 */

export type {
  RecipientRole,
  Recipient,
  MessageRecord,
  CrumbKind,
  MutationOptions,
  MicrosClock,
  TrailOptions,
  ResolvedTrailOptions,
  LoadResult,
  TrailStats,
  RecordPredicate,
  Trail,
} from "./types.js";

export { p95 } from "./observability/metrics.js";
export type { TrailMetrics } from "./observability/metrics.js";
export { logger, formatLogLine } from "./observability/logs.js";
export type { LogLevel, LogEntry, LogData } from "./observability/logs.js";

// Records
export {
  createRecord,
  parseRecord,
  decodeRecord,
  cloneRecord,
  MessageRecordSchema,
  RecipientSchema,
} from "./record.js";
export type { MessageRecordInput, DecodeResult } from "./record.js";

// Queries
export { byGroup, bySender, matchesText, inThread, allOf, referencedIds } from "./query.js";

// Persistence building blocks
export {
  formatCrumbName,
  parseCrumbName,
  StampClock,
  wallClockMicros,
  CRUMB_KINDS,
} from "./journal/crumb-name.js";
export type { ParsedCrumbName } from "./journal/crumb-name.js";
export { Journal } from "./journal/journal.js";
export type { CrumbFile } from "./journal/journal.js";
export { replayCrumbs } from "./journal/replay.js";
export type { ReplayTarget, ReplayResult } from "./journal/replay.js";
export { readSnapshot, writeSnapshot, serializeSnapshot, parseSnapshot, SNAPSHOT_VERSION } from "./snapshot.js";
export { stableStringify } from "./format.js";
export { atomicWrite, readTextFile, removeFile, ensureDirectory, listFiles } from "./io.js";

// Errors
export {
  TrailError,
  FileNotFoundError,
  FileReadError,
  FileWriteError,
  FileRemoveError,
  DirectoryError,
  ListFilesError,
  CrumbWriteError,
  SnapshotCorruptError,
  CrumbCorruptError,
  EmptyTrailError,
  InvalidRecordError,
} from "./errors.js";

// Store
export { openTrail, DEFAULT_SNAPSHOT_FILE, DEFAULT_CRUMB_DIR } from "./trail.js";
