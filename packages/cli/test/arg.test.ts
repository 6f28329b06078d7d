/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { countParser, parseJsonText, parseMessageId } from "../src/lib/arg.js";
import { CliError } from "../src/lib/errors.js";

describe("arg parsing", () => {
  describe("countParser", () => {
    it("should parse valid integers", () => {
      const parse = countParser("--limit");
      expect(parse("0")).toBe(0);
      expect(parse(" 25 ")).toBe(25);
      expect(parse("10000")).toBe(10000);
    });

    it("should reject negative numbers and non-numbers", () => {
      expect(() => countParser("--limit")("-1")).toThrow(InvalidArgumentError);
      expect(() => countParser("--limit")("abc")).toThrow(
        "--limit must be a non-negative integer"
      );
    });

    it("should reject values above the maximum", () => {
      expect(() => countParser("--limit")("10001")).toThrow("--limit must be <= 10000");
      expect(() => countParser("--depth", 5)("6")).toThrow("--depth must be <= 5");
    });
  });

  describe("parseJsonText", () => {
    it("should parse valid JSON", () => {
      expect(parseJsonText('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJsonText("[1,2,3]", "test")).toEqual([1, 2, 3]);
    });

    it("should handle BOM", () => {
      expect(parseJsonText("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should name the source of invalid JSON", () => {
      expect(() => parseJsonText("{", "--data")).toThrow(CliError);
      expect(() => parseJsonText("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });

  describe("parseMessageId", () => {
    it("should add angle brackets to a bare id", () => {
      expect(parseMessageId("a1@example.org")).toBe("<a1@example.org>");
    });

    it("should keep a bracketed id", () => {
      expect(parseMessageId(" <a1@example.org> ")).toBe("<a1@example.org>");
    });

    it("should reject an empty id", () => {
      expect(() => parseMessageId("  ")).toThrow("message id must be non-empty");
    });
  });
});
