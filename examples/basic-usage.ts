/**
 * Basic Usage Example
 *
 * Tracks a few messages, moves one, steps through history and shows that an
 * unsaved change survives a crash.
 * Run with: npx tsx examples/basic-usage.ts
 */

import { createRecord, openTrail, byGroup } from "@msgtrail/sdk";
import { rm } from "node:fs/promises";

async function main(): Promise<void> {
  const root = "./examples-data/basic";
  await rm(root, { recursive: true, force: true });

  const trail = openTrail({ root });
  await trail.load();

  await trail.insert(
    createRecord({
      messageId: "<status-1@example.org>",
      group: "INBOX",
      date: "2026-10-01 09:30",
      sender: "ann@example.org",
      subject: "Status",
      recipients: [{ role: "to", addresses: ["bob@example.org"] }],
    })
  );
  await trail.insert(
    createRecord({
      messageId: "<status-2@example.org>",
      group: "Sent",
      date: "2026-10-01 10:05",
      sender: "bob@example.org",
      subject: "Re: Status",
      references: "<status-1@example.org>",
      inReplyTo: "<status-1@example.org>",
    })
  );
  console.log("Tracked:", trail.list().map((r) => r.messageId));

  await trail.updateLocation("<status-1@example.org>", "Archive");
  console.log("Archived:", trail.findAll(byGroup("Archive")).map((r) => r.subject));
  console.log("Thread:", trail.thread("<status-1@example.org>").map((r) => r.subject));

  console.log("Next:", trail.rotateForward().subject, "->", trail.current()?.subject);
  await trail.save();

  // Not saved: only the crumb records this one
  await trail.remove("<status-2@example.org>");

  const reopened = openTrail({ root });
  const result = await reopened.load();
  console.log("Recovered:", result, reopened.list().map((r) => r.messageId));

  const stats = await reopened.stats();
  console.log(`Stats: ${stats.records} record(s), ${stats.metrics.crumbsReplayed} crumb(s) replayed`);

  await reopened.close();
  await rm(root, { recursive: true, force: true });
}

main().catch((err: unknown) => {
  console.error("Error:", err);
  process.exit(1);
});
