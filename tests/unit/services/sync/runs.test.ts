import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { KyselyRunJournal } from "../../../../src/services/sync/runs.js";
import { createTestDb } from "../../../helpers/sqlite.js";

import type { Database } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

describe("KyselyRunJournal", () => {
  let db: Kysely<Database>;
  let now: Date;
  let journal: KyselyRunJournal;

  beforeEach(async () => {
    db = await createTestDb();
    now = new Date("2024-03-10T23:45:05Z");
    journal = new KyselyRunJournal(db, () => now);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should record a run from start to completion", async () => {
    const runId = await journal.start({
      scheduledFor: new Date("2024-03-10T23:45:00Z"),
      modifiedSince: "2000-01-01",
    });

    const [running] = await journal.recent();
    expect(running).toMatchObject({
      id: runId,
      status: "RUNNING",
      scheduled_for: "2024-03-10T23:45:00.000Z",
      modified_since: "2000-01-01",
      started_at: "2024-03-10T23:45:05.000Z",
      finished_at: null,
    });

    now = new Date("2024-03-10T23:47:00Z");
    await journal.finish(runId, {
      status: "COMPLETED",
      licensesExported: 12,
      recordsLoaded: 11,
      recordsFailed: 1,
      organizationsLinked: 4,
    });

    const [done] = await journal.recent();
    expect(done).toMatchObject({
      status: "COMPLETED",
      finished_at: "2024-03-10T23:47:00.000Z",
      licenses_exported: 12,
      records_loaded: 11,
      records_failed: 1,
      organizations_linked: 4,
      error_message: null,
    });
  });

  it("should list the most recent runs first", async () => {
    const first = await journal.start({
      scheduledFor: new Date("2024-03-10T23:45:00Z"),
      modifiedSince: "2000-01-01",
    });
    await journal.finish(first, { status: "FAILED", errorMessage: "export stage failed: boom" });

    now = new Date("2024-03-11T00:15:05Z");
    const second = await journal.start({
      scheduledFor: new Date("2024-03-11T00:15:00Z"),
      modifiedSince: "2024-03-10",
    });

    const runs = await journal.recent(1);
    expect(runs.map((r) => r.id)).toEqual([second]);

    const all = await journal.recent();
    expect(all.map((r) => [r.status, r.error_message])).toEqual([
      ["RUNNING", null],
      ["FAILED", "export stage failed: boom"],
    ]);
  });
});
