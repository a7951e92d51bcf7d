/**
 * Scheduler - waits for the watermark's next run time, runs a cycle,
 * advances and persists the watermark, and repeats.
 *
 * Cycles never overlap. Cancellation is honoured only while waiting or
 * between cycles; a cycle that has started always runs to completion.
 */

import { errorMessage } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { isDue } from "../../utils/time.js";
import { systemClock, type Clock } from "./clock.js";
import {
  advanceWatermark,
  DEFAULT_INTERVAL_MINUTES,
  type WatermarkState,
  type WatermarkStore,
} from "./watermark.js";

import type { RunJournal } from "./runs.js";
import type { CycleResult } from "./stages.js";

const logger = syncLogger.child({ component: "scheduler" });

// ============================================================================
// Types
// ============================================================================

export interface CycleRunner {
  runCycle(modifiedSince: string): Promise<CycleResult>;
}

export interface SchedulerOptions {
  intervalMinutes?: number;
  /** Poll period before the first cycle */
  initialPollMs?: number;
  /** Poll period between cycles */
  steadyPollMs?: number;
  /** Stop after this many cycles; runs forever when omitted */
  maxCycles?: number;
  signal?: AbortSignal;
  /** Called after every cycle, successful or not */
  onCycle?: (outcome: CycleOutcome) => void;
}

export interface CycleOutcome {
  scheduledFor: Date;
  modifiedSince: string;
  result: CycleResult | null;
  error: unknown;
  next: WatermarkState;
}

export interface SchedulerResult {
  cyclesRun: number;
  cyclesFailed: number;
  state: WatermarkState;
  stoppedBy: "abort" | "max-cycles";
}

// ============================================================================
// Scheduler
// ============================================================================

export class SyncScheduler {
  private readonly intervalMinutes: number;
  private readonly initialPollMs: number;
  private readonly steadyPollMs: number;

  constructor(
    private readonly runner: CycleRunner,
    private readonly store: WatermarkStore,
    private readonly journal: RunJournal,
    private readonly options: SchedulerOptions = {},
    private readonly clock: Clock = systemClock
  ) {
    this.intervalMinutes = options.intervalMinutes ?? DEFAULT_INTERVAL_MINUTES;
    this.initialPollMs = options.initialPollMs ?? 60_000;
    this.steadyPollMs = options.steadyPollMs ?? 120_000;
  }

  async run(initial: WatermarkState): Promise<SchedulerResult> {
    let state = initial;
    let cyclesRun = 0;
    let cyclesFailed = 0;
    const { maxCycles, signal } = this.options;

    await this.store.save(state);
    logger.info(
      {
        nextRunAt: state.nextRunAt.toISOString(),
        modifiedSince: state.modifiedSince,
        maxCycles,
      },
      "Scheduler started"
    );

    await this.waitUntil(state.nextRunAt, this.initialPollMs);

    while (signal?.aborted !== true) {
      const ok = await this.runOne(state);
      cyclesRun++;
      if (!ok) {
        cyclesFailed++;
      }

      state = advanceWatermark(state, this.intervalMinutes);
      await this.persist(state);
      logger.info(
        {
          nextRunAt: state.nextRunAt.toISOString(),
          modifiedSince: state.modifiedSince,
        },
        "Watermark advanced"
      );

      if (maxCycles !== undefined && cyclesRun >= maxCycles) {
        return { cyclesRun, cyclesFailed, state, stoppedBy: "max-cycles" };
      }

      await this.waitUntil(state.nextRunAt, this.steadyPollMs);
    }

    logger.info({ cyclesRun }, "Scheduler stopped");
    return { cyclesRun, cyclesFailed, state, stoppedBy: "abort" };
  }

  /**
   * Sleep in ticks of at most `pollMs` until `due`, or until aborted
   */
  private async waitUntil(due: Date, pollMs: number): Promise<void> {
    const { signal } = this.options;

    for (;;) {
      const now = this.clock.now();
      if (isDue(now, due) || signal?.aborted === true) {
        return;
      }
      const remaining = due.getTime() - now.getTime();
      logger.debug(
        { now: now.toISOString(), due: due.toISOString() },
        "Waiting for next run"
      );
      await this.clock.sleep(Math.min(pollMs, remaining), signal);
    }
  }

  /**
   * Save the advanced watermark. A store failure keeps the in-memory state
   * so the loop goes on; the next successful save catches up.
   */
  private async persist(state: WatermarkState): Promise<void> {
    try {
      await this.store.save(state);
    } catch (error) {
      logger.error(
        { error, nextRunAt: state.nextRunAt.toISOString() },
        "Failed to persist watermark"
      );
    }
  }

  /**
   * Run a single cycle and journal it. Errors are logged and recorded,
   * never rethrown: the cycle is lost and the next window re-covers it.
   */
  private async runOne(state: WatermarkState): Promise<boolean> {
    const { modifiedSince, nextRunAt } = state;
    logger.info(
      {
        scheduledFor: nextRunAt.toISOString(),
        now: this.clock.now().toISOString(),
        modifiedSince,
      },
      "Cycle started"
    );

    const next = advanceWatermark(state, this.intervalMinutes);
    let runId: string | undefined;
    let outcome: CycleOutcome;

    try {
      runId = await this.journal.start({ scheduledFor: nextRunAt, modifiedSince });
      const result = await this.runner.runCycle(modifiedSince);
      const { load } = result.loaded;
      logger.info(
        {
          licensesExported: result.exported.licensesExported,
          recordsLoaded: load.loaded,
          recordsFailed: load.failures.length,
        },
        "Cycle completed"
      );
      outcome = { scheduledFor: nextRunAt, modifiedSince, result, error: null, next };
    } catch (error) {
      logger.error({ error, modifiedSince }, "Cycle failed");
      outcome = { scheduledFor: nextRunAt, modifiedSince, result: null, error, next };
    }

    if (runId !== undefined) {
      await this.finishRun(runId, outcome);
    }
    this.notify(outcome);

    return outcome.result !== null;
  }

  private async finishRun(runId: string, outcome: CycleOutcome): Promise<void> {
    const { result } = outcome;
    try {
      await this.journal.finish(
        runId,
        result !== null
          ? {
              status: "COMPLETED",
              licensesExported: result.exported.licensesExported,
              recordsLoaded: result.loaded.load.loaded,
              recordsFailed: result.loaded.load.failures.length,
              organizationsLinked: result.loaded.enrichment?.licensesLinked ?? 0,
            }
          : { status: "FAILED", errorMessage: errorMessage(outcome.error) }
      );
    } catch (error) {
      logger.error({ error, runId }, "Failed to journal cycle");
    }
  }

  private notify(outcome: CycleOutcome): void {
    try {
      this.options.onCycle?.(outcome);
    } catch (error) {
      logger.warn({ error }, "onCycle hook threw");
    }
  }
}
