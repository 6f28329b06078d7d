/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openTrail } from "@msgtrail/sdk";
import type { Trail, TrailOptions } from "@msgtrail/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "msgtrail-test-")
 */
export async function createTempRoot(prefix = "msgtrail-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a loaded trail in a temp directory, then close the
 * trail and remove the directory
 * @param options - Optional trail options (root will be overridden)
 */
export async function withTempTrail<T>(
  fn: (trail: Trail, root: string) => Promise<T>,
  options?: Partial<TrailOptions>
): Promise<T> {
  const root = await createTempRoot();

  try {
    const trail = openTrail({ ...options, root });
    await trail.load();
    const result = await fn(trail, root);
    await trail.close();
    return result;
  } finally {
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
