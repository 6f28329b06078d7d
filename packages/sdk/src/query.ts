/**
 * Record predicates for Trail.findAll
 */

import type { MessageRecord, RecordPredicate } from "./types.js";

/**
 * Message ids listed in a References header
 */
export function referencedIds(references: string): string[] {
  return references.split(/\s+/).filter(Boolean);
}

export function byGroup(group: string): RecordPredicate {
  return (record) => record.group === group;
}

/**
 * Case-insensitive substring match on the sender
 */
export function bySender(text: string): RecordPredicate {
  const needle = text.toLowerCase();
  return (record) => record.sender.toLowerCase().includes(needle);
}

/**
 * Case-insensitive substring match on subject, sender or display line
 */
export function matchesText(text: string): RecordPredicate {
  const needle = text.toLowerCase();
  return (record) =>
    record.subject.toLowerCase().includes(needle) ||
    record.sender.toLowerCase().includes(needle) ||
    record.displayLine.toLowerCase().includes(needle);
}

/**
 * The message itself, direct replies, and anything whose References mention it
 */
export function inThread(messageId: string): RecordPredicate {
  return (record: MessageRecord) =>
    record.messageId === messageId ||
    record.inReplyTo === messageId ||
    referencedIds(record.references).includes(messageId);
}

/**
 * Every predicate holds
 */
export function allOf(...predicates: RecordPredicate[]): RecordPredicate {
  return (record) => predicates.every((p) => p(record));
}
