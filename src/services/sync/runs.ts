/**
 * Sync run journal - one row per cycle in sync_runs
 */

import { randomUUID } from "node:crypto";

import type { Database, SyncRun } from "../../db/types.js";
import type { Kysely } from "kysely";

export interface RunStart {
  scheduledFor: Date;
  modifiedSince: string;
}

export interface RunOutcome {
  status: "COMPLETED" | "FAILED";
  licensesExported?: number;
  recordsLoaded?: number;
  recordsFailed?: number;
  organizationsLinked?: number;
  errorMessage?: string;
}

export interface RunJournal {
  start(run: RunStart): Promise<string>;
  finish(runId: string, outcome: RunOutcome): Promise<void>;
}

export class KyselyRunJournal implements RunJournal {
  constructor(
    private db: Kysely<Database>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async start(run: RunStart): Promise<string> {
    const id = randomUUID();
    await this.db
      .insertInto("sync_runs")
      .values({
        id,
        scheduled_for: run.scheduledFor.toISOString(),
        modified_since: run.modifiedSince,
        status: "RUNNING",
        started_at: this.now().toISOString(),
        finished_at: null,
        licenses_exported: null,
        records_loaded: null,
        records_failed: null,
        organizations_linked: null,
        error_message: null,
      })
      .execute();
    return id;
  }

  async finish(runId: string, outcome: RunOutcome): Promise<void> {
    await this.db
      .updateTable("sync_runs")
      .set({
        status: outcome.status,
        finished_at: this.now().toISOString(),
        licenses_exported: outcome.licensesExported ?? null,
        records_loaded: outcome.recordsLoaded ?? null,
        records_failed: outcome.recordsFailed ?? null,
        organizations_linked: outcome.organizationsLinked ?? null,
        error_message: outcome.errorMessage ?? null,
      })
      .where("id", "=", runId)
      .execute();
  }

  /**
   * Most recent runs first
   */
  async recent(limit = 10): Promise<SyncRun[]> {
    return this.db
      .selectFrom("sync_runs")
      .selectAll()
      .orderBy("started_at", "desc")
      .orderBy("id", "desc")
      .limit(limit)
      .execute();
  }
}
