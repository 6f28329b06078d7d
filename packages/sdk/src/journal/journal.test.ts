import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, readdir, readFile, writeFile, mkdir } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Journal } from "./journal.js";
import { CrumbCorruptError, CrumbWriteError } from "../errors.js";
import { MetricsCollector } from "../observability/metrics.js";
import type { MessageRecord } from "../types.js";

function record(messageId: string, group = "INBOX"): MessageRecord {
  return {
    displayLine: `${messageId} line`,
    group,
    messageId,
    date: "2026-10-01 09:30",
    subject: "Status",
    sender: "ann@example.org",
    recipients: [{ role: "to", addresses: ["bob@example.org"] }],
    references: "",
  };
}

describe("Journal", () => {
  let testDir: string;
  let crumbDir: string;

  beforeEach(async () => {
    testDir = await mkdtemp(join(tmpdir(), "msgtrail-journal-"));
    crumbDir = join(testDir, "crumbs");
  });

  afterEach(async () => {
    await rm(testDir, { recursive: true, force: true });
  });

  it("should write one crumb per mutation, named by stamp and kind", async () => {
    let now = 2_000_000;
    const journal = new Journal(crumbDir, { clock: () => now++ });

    await journal.write("new", record("<a1>"));
    await journal.write("update", record("<a1>", "Archive"));
    await journal.write("delete", record("<a1>", "Archive"));

    expect(await readdir(crumbDir)).toEqual([
      "cr-000000000002-000000-new.json",
      "cr-000000000002-000001-update.json",
      "cr-000000000002-000002-del.json",
    ]);
  });

  it("should store the full record as the crumb body", async () => {
    const journal = new Journal(crumbDir, { clock: () => 7 });

    const crumbPath = await journal.write("update", record("<a1>", "Archive"));
    const body: unknown = JSON.parse(await readFile(crumbPath, "utf-8"));

    expect(body).toEqual(record("<a1>", "Archive"));
    expect(await journal.read(crumbPath)).toEqual(record("<a1>", "Archive"));
  });

  it("should order crumbs by call even when issued without awaiting", async () => {
    const journal = new Journal(crumbDir, { clock: () => 100 });

    await Promise.all([
      journal.write("new", record("<a1>")),
      journal.write("update", record("<a1>", "G2")),
      journal.write("delete", record("<a1>", "G2")),
    ]);

    const files = await journal.list();
    expect(files.map((f) => (f.ok ? f.kind : "malformed"))).toEqual(["new", "update", "delete"]);
  });

  it("should classify malformed files without failing the listing", async () => {
    const journal = new Journal(crumbDir, { clock: () => 1 });
    await journal.write("new", record("<a1>"));
    await writeFile(join(crumbDir, "stray.txt"), "junk");

    const files = await journal.list();

    expect(files).toHaveLength(2);
    expect(files[0]).toMatchObject({ ok: true, kind: "new" });
    expect(files[1]).toMatchObject({ ok: false, name: "stray.txt", path: join(crumbDir, "stray.txt") });
  });

  it("should issue new stamps above crumbs already on disk", async () => {
    await mkdir(crumbDir, { recursive: true });
    await writeFile(join(crumbDir, "cr-000000000009-000000-new.json"), JSON.stringify(record("<old>")));

    const journal = new Journal(crumbDir, { clock: () => 5 });
    await journal.list();
    const written = await journal.write("new", record("<a1>"));

    expect(written).toBe(join(crumbDir, "cr-000000000009-000001-new.json"));
  });

  it("should compact only crumbs at or before the cutoff", async () => {
    let now = 10;
    const journal = new Journal(crumbDir, { clock: () => now++ });

    await journal.write("new", record("<a1>"));
    const cutoff = journal.mark();
    await journal.write("new", record("<a2>"));
    await writeFile(join(crumbDir, "stray.txt"), "junk");

    expect(await journal.compact(cutoff)).toBe(1);
    expect(await readdir(crumbDir)).toEqual(["cr-000000000000-000012-new.json", "stray.txt"]);
  });

  it("should keep writing after listing a crumb stamped beyond the safe range", async () => {
    await mkdir(crumbDir, { recursive: true });
    await writeFile(join(crumbDir, "cr-999999999998-000000-new.json"), "{}");
    const journal = new Journal(crumbDir, { clock: () => 10 });

    const [far] = await journal.list();
    expect(far).toMatchObject({ ok: false, reason: "stamp out of range" });

    const crumbPath = await journal.write("new", record("<a1>"));
    expect(crumbPath).toBe(join(crumbDir, "cr-000000000000-000010-new.json"));
  });

  it("should purge every file", async () => {
    const journal = new Journal(crumbDir, { clock: () => 10 });
    await journal.write("new", record("<a1>"));
    await writeFile(join(crumbDir, "stray.txt"), "junk");

    expect(await journal.purge()).toBe(2);
    expect(await journal.pending()).toBe(0);
  });

  it("should report a crumb whose body is not JSON", async () => {
    await mkdir(crumbDir, { recursive: true });
    const crumbPath = join(crumbDir, "cr-000000000001-000000-new.json");
    await writeFile(crumbPath, "{ not json");

    const journal = new Journal(crumbDir);

    await expect(journal.read(crumbPath)).rejects.toThrow(CrumbCorruptError);
  });

  it("should report a crumb whose body is not a record", async () => {
    await mkdir(crumbDir, { recursive: true });
    const crumbPath = join(crumbDir, "cr-000000000001-000000-new.json");
    await writeFile(crumbPath, JSON.stringify({ group: "INBOX" }));

    const journal = new Journal(crumbDir);

    await expect(journal.read(crumbPath)).rejects.toThrow(`Corrupt crumb ${crumbPath}: messageId: Required`);
  });

  it("should wrap write failures and count them", async () => {
    // A file where the directory should be
    await writeFile(crumbDir, "not a directory");
    const metrics = new MetricsCollector();
    const journal = new Journal(crumbDir, { metrics });

    await expect(journal.write("new", record("<a1>"))).rejects.toThrow(CrumbWriteError);
    await journal.drain();

    expect(metrics.snapshot()).toMatchObject({ crumbsWritten: 0, crumbWriteFailures: 1 });
  });

  it("drain should wait for writes in flight", async () => {
    const metrics = new MetricsCollector();
    const journal = new Journal(crumbDir, { metrics });

    const write = journal.write("new", record("<a1>"));
    await journal.drain();

    expect(metrics.snapshot().crumbsWritten).toBe(1);
    await write;
  });
});
