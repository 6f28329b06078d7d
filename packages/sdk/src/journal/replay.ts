/**
 * Crumb replay (crash recovery)
 *
 * Applies leftover crumbs in filename order, which is chronological, so a record
 * created, moved and deleted before any snapshot ends up deleted.
 *
 * Malformed names are deleted at once. Applied crumbs stay on disk until the caller
 * has saved a snapshot holding their effect; if replay stops on a corrupt crumb,
 * the next load replays the earlier ones again from the same snapshot.
 */

import { logger } from "../observability/logs.js";
import type { MessageRecord, MutationOptions } from "../types.js";
import type { Journal } from "./journal.js";

/**
 * Mutations replay drives, always with persistence suppressed
 */
export interface ReplayTarget {
  insert(record: MessageRecord, opts?: MutationOptions): Promise<void>;
  updateLocation(messageId: string, group: string, opts?: MutationOptions): Promise<void>;
  remove(messageId: string, opts?: MutationOptions): Promise<boolean>;
}

export interface ReplayResult {
  /** Crumbs classified and applied; still on disk */
  applied: number;
  /** Malformed files deleted without touching the target */
  discarded: number;
}

const NO_JOURNAL: MutationOptions = { persist: false };

/**
 * Replay every crumb in the journal's directory against target
 * @throws {CrumbCorruptError} If a well-named crumb does not hold a record; that crumb stays on disk
 */
export async function replayCrumbs(journal: Journal, target: ReplayTarget): Promise<ReplayResult> {
  const files = await journal.list();
  let applied = 0;
  let discarded = 0;

  for (const file of files) {
    if (!file.ok) {
      logger.warn("crumb.malformed", { path: file.path, message: file.reason });
      await journal.discard(file.path);
      discarded++;
      continue;
    }

    const record = await journal.read(file.path);

    switch (file.kind) {
      case "new":
        await target.insert(record, NO_JOURNAL);
        break;
      case "update":
        await target.updateLocation(record.messageId, record.group, NO_JOURNAL);
        break;
      case "delete":
        await target.remove(record.messageId, NO_JOURNAL);
        break;
    }

    applied++;

    logger.debug("crumb.replayed", { path: file.path, messageId: record.messageId });
  }

  return { applied, discarded };
}
