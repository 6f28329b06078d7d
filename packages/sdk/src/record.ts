/**
 * Record construction and validation
 */

import { z } from "zod";
import { InvalidRecordError } from "./errors.js";
import type { MessageRecord } from "./types.js";

export const RecipientSchema = z.object({
  role: z.enum(["to", "cc", "bcc"]),
  addresses: z.array(z.string()),
});

/**
 * Record schema. Optional text fields default to empty so collaborators only
 * supply what their client knows.
 */
export const MessageRecordSchema = z.object({
  displayLine: z.string().default(""),
  group: z.string(),
  messageId: z
    .string()
    .min(1, "messageId must be non-empty")
    .refine((id) => id.trim().length > 0, "messageId must not be blank"),
  date: z.string().default(""),
  subject: z.string().default(""),
  sender: z.string().default(""),
  recipients: z.array(RecipientSchema).default([]),
  references: z.string().default(""),
  inReplyTo: z.string().optional(),
});

/**
 * Fields accepted by createRecord
 */
export type MessageRecordInput = z.input<typeof MessageRecordSchema>;

/**
 * Render zod issues as "path: message" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/**
 * Outcome of decoding an untrusted value
 */
export type DecodeResult =
  | { ok: true; record: MessageRecord }
  | { ok: false; issues: string[] };

/**
 * Decode a value read from disk without throwing
 */
export function decodeRecord(value: unknown): DecodeResult {
  const result = MessageRecordSchema.safeParse(value);
  if (!result.success) {
    return { ok: false, issues: formatIssues(result.error) };
  }
  return { ok: true, record: result.data };
}

/**
 * Build a validated record
 * @throws {InvalidRecordError} If the input is not a valid record
 *
 * @example
 * ```typescript
 * const record = createRecord({
 *   messageId: "<a1@example.org>",
 *   group: "INBOX",
 *   subject: "Quarterly numbers",
 *   sender: "Ann Example <ann@example.org>",
 * });
 * ```
 */
export function createRecord(input: MessageRecordInput): MessageRecord {
  return parseRecord(input);
}

/**
 * Validate an unknown value as a record
 * @throws {InvalidRecordError} If validation fails
 */
export function parseRecord(value: unknown): MessageRecord {
  const decoded = decodeRecord(value);
  if (!decoded.ok) {
    throw new InvalidRecordError(decoded.issues);
  }
  return decoded.record;
}

/**
 * Deep copy, so callers never share a reference with the stored record
 */
export function cloneRecord(record: MessageRecord): MessageRecord {
  return {
    ...record,
    recipients: record.recipients.map((r) => ({ role: r.role, addresses: [...r.addresses] })),
  };
}
