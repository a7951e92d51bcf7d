/**
 * Sync API Routes
 *
 * Read-only view of the scheduler's persisted watermark and the journal of
 * recent sync cycles.
 */

import { Type, type Static } from "@sinclair/typebox";

import { KyselyRunJournal } from "../../services/sync/runs.js";
import {
  NullableNumber,
  NullableString,
  SyncRunStatusSchema,
} from "../schemas/common.js";

import type { Database, SyncRun } from "../../db/types.js";
import type { SyncRunDto, SyncStatusDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

// ============================================================================
// Schemas
// ============================================================================

const SyncStatusQuerySchema = Type.Object({
  runs: Type.Optional(Type.Number({ minimum: 1, maximum: 100, default: 10 })),
});

type SyncStatusQuery = Static<typeof SyncStatusQuerySchema>;

const WatermarkSchema = Type.Object({
  nextRunAt: Type.String({ format: "date-time" }),
  modifiedSince: Type.String({ format: "date" }),
  updatedAt: Type.String({ format: "date-time" }),
});

const SyncRunSchema = Type.Object({
  id: Type.String(),
  scheduledFor: Type.String({ format: "date-time" }),
  modifiedSince: Type.String({ format: "date" }),
  status: SyncRunStatusSchema,
  startedAt: Type.String({ format: "date-time" }),
  finishedAt: NullableString,
  licensesExported: NullableNumber,
  recordsLoaded: NullableNumber,
  recordsFailed: NullableNumber,
  organizationsLinked: NullableNumber,
  errorMessage: NullableString,
});

const SyncStatusResponseSchema = Type.Object({
  data: Type.Object({
    watermark: Type.Union([WatermarkSchema, Type.Null()]),
    runs: Type.Array(SyncRunSchema),
  }),
});

// ============================================================================
// Helper Functions
// ============================================================================

function formatRun(run: SyncRun): SyncRunDto {
  return {
    id: run.id,
    scheduledFor: run.scheduled_for,
    modifiedSince: run.modified_since,
    status: run.status,
    startedAt: run.started_at,
    finishedAt: run.finished_at,
    licensesExported: run.licenses_exported,
    recordsLoaded: run.records_loaded,
    recordsFailed: run.records_failed,
    organizationsLinked: run.organizations_linked,
    errorMessage: run.error_message,
  };
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerSyncRoutes(
  app: FastifyInstance,
  db: Kysely<Database>
): void {
  const journal = new KyselyRunJournal(db);

  // GET /sync/status - Watermark and most recent cycles
  app.get<{ Querystring: SyncStatusQuery }>(
    "/sync/status",
    {
      schema: {
        summary: "Get sync status",
        description:
          "Returns the persisted watermark (next run time and change window) and the most recent sync cycles",
        tags: ["Sync"],
        querystring: SyncStatusQuerySchema,
        response: {
          200: SyncStatusResponseSchema,
        },
      },
    },
    async (request) => {
      const { runs: runLimit = 10 } = request.query;

      const watermark = await db
        .selectFrom("sync_watermarks")
        .select(["next_run_at", "modified_since", "updated_at"])
        .where("stream", "=", "licenses")
        .executeTakeFirst();

      const runs = await journal.recent(runLimit);

      const data: SyncStatusDto = {
        watermark: watermark
          ? {
              nextRunAt: watermark.next_run_at,
              modifiedSince: watermark.modified_since,
              updatedAt: watermark.updated_at,
            }
          : null,
        runs: runs.map(formatRun),
      };

      return { data };
    }
  );
}
