/**
 * Record fixtures
 */

import { createRecord } from "@msgtrail/sdk";
import type { MessageRecord, MessageRecordInput } from "@msgtrail/sdk";

let counter = 0;

/**
 * Build a valid record; every field not given gets a plausible placeholder.
 * A bare messageId is wrapped in angle brackets.
 */
export function makeRecord(overrides: Partial<MessageRecordInput> = {}): MessageRecord {
  counter += 1;
  const raw = overrides.messageId ?? `m${counter}@example.org`;
  const messageId = raw.startsWith("<") ? raw : `<${raw}>`;

  return createRecord({
    group: "INBOX",
    date: "2026-10-01 09:00",
    subject: `Message ${counter}`,
    sender: "ann@example.org",
    recipients: [{ role: "to", addresses: ["bob@example.org"] }],
    ...overrides,
    messageId,
  });
}
