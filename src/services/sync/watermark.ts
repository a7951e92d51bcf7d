/**
 * Watermark - when the next cycle runs and which change window it requests.
 *
 * The state is a plain value threaded through the scheduler; stores only
 * persist it so a restarted daemon can resume where it stopped.
 */

import {
  addMinutes,
  parseDateOnly,
  parseTimestamp,
  toDateString,
} from "../../utils/time.js";

import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

// ============================================================================
// State
// ============================================================================

/** Far-past sentinel meaning "fetch everything" */
export const DEFAULT_MODIFIED_SINCE = "2000-01-01";

export const DEFAULT_INTERVAL_MINUTES = 30;

export interface WatermarkState {
  nextRunAt: Date;
  /** YYYY-MM-DD */
  modifiedSince: string;
}

export function initializeWatermark(
  nextRunAt: Date,
  modifiedSinceOverride?: string
): WatermarkState {
  return {
    nextRunAt,
    modifiedSince:
      modifiedSinceOverride !== undefined
        ? parseDateOnly(modifiedSinceOverride)
        : DEFAULT_MODIFIED_SINCE,
  };
}

/**
 * Move to the next cycle. The new window starts at the calendar date of the
 * cycle that just ran, so it trails the schedule by one interval and any
 * record changed during that cycle is fetched again.
 */
export function advanceWatermark(
  state: WatermarkState,
  intervalMinutes: number = DEFAULT_INTERVAL_MINUTES
): WatermarkState {
  return {
    modifiedSince: toDateString(state.nextRunAt),
    nextRunAt: addMinutes(state.nextRunAt, intervalMinutes),
  };
}

// ============================================================================
// Stores
// ============================================================================

export interface WatermarkStore {
  load(): Promise<WatermarkState | null>;
  save(state: WatermarkState): Promise<void>;
}

export class MemoryWatermarkStore implements WatermarkStore {
  private state: WatermarkState | null;

  constructor(initial: WatermarkState | null = null) {
    this.state = initial;
  }

  load(): Promise<WatermarkState | null> {
    return Promise.resolve(this.state);
  }

  save(state: WatermarkState): Promise<void> {
    this.state = { ...state };
    return Promise.resolve();
  }
}

/**
 * One row per stream in sync_watermarks
 */
export class KyselyWatermarkStore implements WatermarkStore {
  constructor(
    private db: Kysely<Database>,
    private readonly stream = "licenses"
  ) {}

  async load(): Promise<WatermarkState | null> {
    const row = await this.db
      .selectFrom("sync_watermarks")
      .select(["next_run_at", "modified_since"])
      .where("stream", "=", this.stream)
      .executeTakeFirst();

    if (!row) {
      return null;
    }

    return {
      nextRunAt: parseTimestamp(row.next_run_at),
      modifiedSince: row.modified_since,
    };
  }

  async save(state: WatermarkState): Promise<void> {
    const now = new Date().toISOString();
    await this.db
      .insertInto("sync_watermarks")
      .values({
        stream: this.stream,
        next_run_at: state.nextRunAt.toISOString(),
        modified_since: state.modifiedSince,
        updated_at: now,
      })
      .onConflict((oc) =>
        oc.column("stream").doUpdateSet({
          next_run_at: state.nextRunAt.toISOString(),
          modified_since: state.modifiedSince,
          updated_at: now,
        })
      )
      .execute();
  }
}
