import { describe, it, expect } from "vitest";
import { stableStringify, RECORD_KEY_ORDER } from "./format.js";

describe("stableStringify", () => {
  it("should sort keys alphabetically by default", () => {
    expect(stableStringify({ z: 1, a: 2, m: 3 })).toBe('{\n  "a": 2,\n  "m": 3,\n  "z": 1\n}\n');
  });

  it("should follow an explicit order and put unknown keys last", () => {
    const text = stableStringify(
      { extra: true, group: "INBOX", messageId: "<a1>" },
      0,
      RECORD_KEY_ORDER
    );

    expect(text).toBe('{"messageId":"<a1>","group":"INBOX","extra":true}\n');
  });

  it("should order nested recipient objects too", () => {
    const text = stableStringify({ addresses: ["bob@example.org"], role: "to" }, 0, RECORD_KEY_ORDER);

    expect(text).toBe('{"role":"to","addresses":["bob@example.org"]}\n');
  });

  it("should preserve array order", () => {
    expect(stableStringify({ items: [3, 1, 2] }, 0)).toBe('{"items":[3,1,2]}\n');
  });

  it("should detect circular references", () => {
    const node: { self?: unknown } = {};
    node.self = node;

    expect(() => stableStringify(node)).toThrow("Circular reference detected in object");
  });

  it("should allow the same object twice when it is not a cycle", () => {
    const shared = { a: 1 };

    expect(stableStringify({ x: shared, y: shared }, 0)).toBe('{"x":{"a":1},"y":{"a":1}}\n');
  });
});
