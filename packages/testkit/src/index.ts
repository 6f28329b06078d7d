/**
 * Test helpers for msgtrail packages
 */

export { runCli, parseJsonOutput } from "./cli.js";
export type { CliResult, CliExecOptions } from "./cli.js";
export { createTempRoot, removeDir, withTempTrail, withTempDir } from "./fs.js";
export { makeRecord } from "./records.js";
