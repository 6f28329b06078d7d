/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { resolveRoot, expandTilde, isVerbose } from "../src/lib/env.js";

describe("environment resolution", () => {
  let originalRoot: string | undefined;
  let originalDebug: string | undefined;

  beforeEach(() => {
    originalRoot = process.env.MSGTRAIL_ROOT;
    originalDebug = process.env.MSGTRAIL_CLI_DEBUG;
  });

  afterEach(() => {
    if (originalRoot !== undefined) {
      process.env.MSGTRAIL_ROOT = originalRoot;
    } else {
      delete process.env.MSGTRAIL_ROOT;
    }
    if (originalDebug !== undefined) {
      process.env.MSGTRAIL_CLI_DEBUG = originalDebug;
    } else {
      delete process.env.MSGTRAIL_CLI_DEBUG;
    }
  });

  describe("resolveRoot", () => {
    it("should use CLI option when provided", () => {
      process.env.MSGTRAIL_ROOT = "/env/path";
      expect(resolveRoot("/cli/path")).toBe(path.resolve("/cli/path"));
    });

    it("should use MSGTRAIL_ROOT when CLI option not provided", () => {
      process.env.MSGTRAIL_ROOT = "/env/path";
      expect(resolveRoot()).toBe(path.resolve("/env/path"));
    });

    it("should default to ~/.msgtrail", () => {
      delete process.env.MSGTRAIL_ROOT;
      expect(resolveRoot()).toBe(path.join(homedir(), ".msgtrail"));
    });

    it("should resolve relative paths to absolute", () => {
      expect(resolveRoot("./my-trail")).toBe(path.resolve("my-trail"));
    });
  });

  describe("expandTilde", () => {
    it("should expand a leading tilde", () => {
      expect(expandTilde("~")).toBe(homedir());
      expect(expandTilde("~/mail")).toBe(path.join(homedir(), "mail"));
    });

    it("should leave other paths alone", () => {
      expect(expandTilde("/tmp/~x")).toBe("/tmp/~x");
      expect(expandTilde("~someone/mail")).toBe("~someone/mail");
    });
  });

  describe("isVerbose", () => {
    it("should follow the flag or MSGTRAIL_CLI_DEBUG", () => {
      delete process.env.MSGTRAIL_CLI_DEBUG;
      expect(isVerbose()).toBe(false);
      expect(isVerbose(true)).toBe(true);

      process.env.MSGTRAIL_CLI_DEBUG = "1";
      expect(isVerbose()).toBe(true);
    });
  });
});
