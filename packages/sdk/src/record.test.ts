import { describe, it, expect } from "vitest";
import { createRecord, parseRecord, decodeRecord, cloneRecord } from "./record.js";
import { InvalidRecordError } from "./errors.js";

describe("records", () => {
  describe("createRecord", () => {
    it("should fill optional text fields with empty defaults", () => {
      const record = createRecord({ messageId: "<a1@example.org>", group: "INBOX" });

      expect(record).toEqual({
        displayLine: "",
        group: "INBOX",
        messageId: "<a1@example.org>",
        date: "",
        subject: "",
        sender: "",
        recipients: [],
        references: "",
      });
    });

    it("should keep every supplied field", () => {
      const record = createRecord({
        displayLine: "Ann: Status",
        group: "INBOX",
        messageId: "<a2@example.org>",
        date: "2026-10-01 09:30",
        subject: "Status",
        sender: "Ann <ann@example.org>",
        recipients: [
          { role: "to", addresses: ["bob@example.org"] },
          { role: "cc", addresses: ["cy@example.org", "di@example.org"] },
        ],
        references: "<a1@example.org>",
        inReplyTo: "<a1@example.org>",
      });

      expect(record.recipients[1]).toEqual({
        role: "cc",
        addresses: ["cy@example.org", "di@example.org"],
      });
      expect(record.inReplyTo).toBe("<a1@example.org>");
    });

    it("should reject an empty messageId", () => {
      expect(() => createRecord({ messageId: "", group: "INBOX" })).toThrow(
        "Invalid record: messageId: messageId must be non-empty"
      );
    });

    it("should reject a blank messageId", () => {
      expect(() => createRecord({ messageId: "   ", group: "INBOX" })).toThrow(InvalidRecordError);
    });
  });

  describe("parseRecord", () => {
    it("should list every issue", () => {
      try {
        parseRecord({ messageId: "<a1>", recipients: [{ role: "reply-to", addresses: [] }] });
        expect.fail("Should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(InvalidRecordError);
        const issues = err instanceof InvalidRecordError ? err.issues : [];
        expect(issues).toHaveLength(2);
        expect(issues[0]).toMatch(/^group: /);
        expect(issues[1]).toMatch(/^recipients\.0\.role: /);
      }
    });

    it("should drop unknown fields", () => {
      const record = parseRecord({ messageId: "<a1>", group: "INBOX", score: 3 });

      expect(record).not.toHaveProperty("score");
    });
  });

  it("decodeRecord should report failure without throwing", () => {
    expect(decodeRecord("nope")).toMatchObject({ ok: false });
    expect(decodeRecord({ messageId: "<a1>", group: "G" })).toMatchObject({ ok: true });
  });

  it("cloneRecord should share no arrays with the original", () => {
    const original = createRecord({
      messageId: "<a1>",
      group: "INBOX",
      recipients: [{ role: "to", addresses: ["bob@example.org"] }],
    });

    const copy = cloneRecord(original);
    copy.group = "Archive";
    copy.recipients[0]?.addresses.push("eve@example.org");

    expect(original.group).toBe("INBOX");
    expect(original.recipients[0]?.addresses).toEqual(["bob@example.org"]);
  });
});
