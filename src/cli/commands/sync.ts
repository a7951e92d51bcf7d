import chalk from "chalk";
import { InvalidArgumentError } from "commander";
import ora from "ora";

import { missingUpstreamSettings, type AppConfig } from "../../config.js";
import { errorMessage } from "../../errors.js";
import {
  DEFAULT_MODIFIED_SINCE,
  MemoryWatermarkStore,
  SyncScheduler,
  createSyncPipeline,
  initializeWatermark,
  type CycleOutcome,
  type WatermarkState,
  type WatermarkStore,
} from "../../services/sync/index.js";
import { parseDateOnly, parseTimestamp } from "../../utils/time.js";
import { withContext } from "../utils/context.js";
import {
  displayEnrichmentReport,
  displayLoadReport,
  displayRuns,
  displayWatermark,
  printError,
  printSuccess,
  printWarning,
} from "../utils/display.js";

import type { Command } from "commander";

// ============================================================================
// Helpers
// ============================================================================

function parsePositiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed < 1 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function parseDateOption(value: string): string {
  try {
    return parseDateOnly(value);
  } catch (error) {
    throw new InvalidArgumentError(errorMessage(error));
  }
}

/**
 * The export needs the marketplace credentials; the organization API key is
 * optional and only disables enrichment when missing.
 */
function checkUpstreamSettings(config: AppConfig): boolean {
  const missing = missingUpstreamSettings(config);
  const required = missing.filter((key) => key !== "ORG_API_KEY");

  if (required.length > 0) {
    printError(`Missing settings: ${required.join(", ")}`);
    process.exitCode = 1;
    return false;
  }
  if (missing.includes("ORG_API_KEY")) {
    printWarning("ORG_API_KEY is not set; organizations will not be enriched");
  }
  return true;
}

interface RunOptions {
  at?: string;
  modifiedSince?: string;
  resume?: boolean;
  cycles?: number;
}

async function resolveInitialState(
  options: RunOptions,
  store: WatermarkStore
): Promise<WatermarkState> {
  if (options.resume === true) {
    const stored = await store.load();
    if (stored !== null) {
      if (options.at !== undefined || options.modifiedSince !== undefined) {
        printWarning("Resuming from the stored watermark; --at and --modified-since are ignored");
      }
      return stored;
    }
    printWarning("No stored watermark to resume from");
  }

  if (options.at === undefined) {
    throw new Error("--at is required unless --resume finds a stored watermark");
  }
  return initializeWatermark(parseTimestamp(options.at), options.modifiedSince);
}

function printCycle(outcome: CycleOutcome): void {
  const when = outcome.scheduledFor.toISOString();
  if (outcome.result !== null) {
    const { exported, loaded } = outcome.result;
    console.log(
      `${chalk.green("✓")} ${when} since ${outcome.modifiedSince}: ` +
        `${String(exported.licensesExported)} exported, ` +
        `${String(loaded.load.loaded)} loaded, ` +
        `${String(loaded.load.failures.length)} skipped, ` +
        `${String(loaded.enrichment?.licensesLinked ?? 0)} linked`
    );
  } else {
    console.log(
      `${chalk.red("✗")} ${when} since ${outcome.modifiedSince}: ${errorMessage(outcome.error)}`
    );
  }
  console.log(
    chalk.gray(
      `  next run ${outcome.next.nextRunAt.toISOString()} since ${outcome.next.modifiedSince}`
    )
  );
}

// ============================================================================
// Sync Commands
// ============================================================================

export function registerSyncCommand(program: Command): void {
  const sync = program
    .command("sync")
    .description("Synchronize marketplace licenses and organization profiles")
    .addHelpText(
      "after",
      `
SYNC WORKFLOW:
══════════════════════════════════════════════════════════════════════════════
  1. license-sync db migrate
  2. license-sync sync run --at 2024-03-10T23:45:00Z
     └─ first cycle fetches everything changed since ${DEFAULT_MODIFIED_SINCE},
        then one cycle every SYNC_INTERVAL_MINUTES
  3. license-sync sync run --resume   # after a restart

Each cycle exports to ARTIFACT_PATH, waits SETTLE_DELAY_MS, then loads the
artifact. A failed cycle is journaled and the schedule moves on.
══════════════════════════════════════════════════════════════════════════════
`
    );

  // sync run
  sync
    .command("run")
    .description("Run the sync daemon on its schedule")
    .option("--at <timestamp>", "First run time (ISO-8601, UTC when no offset)")
    .option(
      "--modified-since <date>",
      `Change window of the first cycle (default ${DEFAULT_MODIFIED_SINCE})`,
      parseDateOption
    )
    .option("--resume", "Continue from the stored watermark")
    .option("--cycles <n>", "Stop after this many cycles", parsePositiveInt)
    .action(async (options: RunOptions) => {
      await withContext(async ({ config, db }) => {
        if (!checkUpstreamSettings(config)) {
          return;
        }

        const pipeline = createSyncPipeline(db, config);
        const controller = new AbortController();
        const onSignal = (signal: NodeJS.Signals): void => {
          printWarning(`${signal} received, stopping before the next cycle`);
          controller.abort();
        };
        process.once("SIGINT", onSignal);
        process.once("SIGTERM", onSignal);

        try {
          const initial = await resolveInitialState(options, pipeline.watermarks);
          console.log(
            chalk.bold(
              `First cycle at ${initial.nextRunAt.toISOString()} since ${initial.modifiedSince}\n`
            )
          );

          const scheduler = new SyncScheduler(
            pipeline.runner,
            pipeline.watermarks,
            pipeline.journal,
            {
              intervalMinutes: config.sync.intervalMinutes,
              initialPollMs: config.sync.initialPollMs,
              steadyPollMs: config.sync.steadyPollMs,
              maxCycles: options.cycles,
              signal: controller.signal,
              onCycle: printCycle,
            }
          );

          const result = await scheduler.run(initial);
          console.log(
            `\n${String(result.cyclesRun)} cycle(s) run, ${String(result.cyclesFailed)} failed (stopped by ${result.stoppedBy})`
          );
        } catch (error) {
          printError(errorMessage(error));
          process.exitCode = 1;
        } finally {
          process.off("SIGINT", onSignal);
          process.off("SIGTERM", onSignal);
        }
      });
    });

  // sync once
  sync
    .command("once")
    .description("Run a single export + load cycle now")
    .option(
      "--modified-since <date>",
      "Change window start (YYYY-MM-DD)",
      parseDateOption,
      DEFAULT_MODIFIED_SINCE
    )
    .action(async (options: { modifiedSince: string }) => {
      await withContext(async ({ config, db }) => {
        if (!checkUpstreamSettings(config)) {
          return;
        }

        const pipeline = createSyncPipeline(db, config);
        const outcomes: CycleOutcome[] = [];
        const scheduler = new SyncScheduler(
          pipeline.runner,
          new MemoryWatermarkStore(),
          pipeline.journal,
          {
            intervalMinutes: config.sync.intervalMinutes,
            maxCycles: 1,
            onCycle: (outcome) => {
              outcomes.push(outcome);
            },
          }
        );

        const spinner = ora(
          `Syncing licenses changed since ${options.modifiedSince}...`
        ).start();

        try {
          const result = await scheduler.run(
            initializeWatermark(new Date(), options.modifiedSince)
          );
          const outcome = outcomes[0];

          if (
            result.cyclesFailed > 0 ||
            outcome === undefined ||
            outcome.result === null
          ) {
            spinner.fail(`Sync failed: ${errorMessage(outcome?.error)}`);
            process.exitCode = 1;
            return;
          }

          spinner.succeed(
            `Exported ${String(outcome.result.exported.licensesExported)} licenses`
          );
          displayLoadReport(outcome.result.loaded.load);
          displayEnrichmentReport(outcome.result.loaded.enrichment);
        } catch (error) {
          spinner.fail(`Sync failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });
    });

  // sync export
  sync
    .command("export")
    .description("Export changed licenses to a JSON file without loading them")
    .option("-o, --output <path>", "Output file (default ARTIFACT_PATH)")
    .option(
      "--modified-since <date>",
      "Change window start (YYYY-MM-DD)",
      parseDateOption,
      DEFAULT_MODIFIED_SINCE
    )
    .action(async (options: { output?: string; modifiedSince: string }) => {
      await withContext(async ({ config, db }) => {
        if (!checkUpstreamSettings(config)) {
          return;
        }

        const outputPath = options.output ?? config.sync.artifactPath;
        const spinner = ora(
          `Exporting licenses changed since ${options.modifiedSince}...`
        ).start();

        try {
          const { exportStage } = createSyncPipeline(db, config, {
            organizationSource: null,
          });
          const result = await exportStage.run({
            outputPath,
            modifiedSince: options.modifiedSince,
          });
          spinner.succeed(
            `Exported ${String(result.licensesExported)} licenses to ${outputPath}`
          );
        } catch (error) {
          spinner.fail(`Export failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });
    });

  // sync load
  sync
    .command("load")
    .description("Load a previously exported JSON file into the database")
    .option("-i, --input <path>", "Input file (default ARTIFACT_PATH)")
    .action(async (options: { input?: string }) => {
      await withContext(async ({ config, db }) => {
        const inputPath = options.input ?? config.sync.artifactPath;
        const spinner = ora(`Loading ${inputPath}...`).start();

        try {
          const { loadStage } = createSyncPipeline(db, config);
          const result = await loadStage.run({ inputPath });
          spinner.succeed("Load completed");
          displayLoadReport(result.load);
          displayEnrichmentReport(result.enrichment);
          if (result.load.failures.length > 0) {
            printWarning("Some records were skipped; see above");
          } else {
            printSuccess(`${String(result.load.loaded)} records loaded`);
          }
        } catch (error) {
          spinner.fail(`Load failed: ${errorMessage(error)}`);
          process.exitCode = 1;
        }
      });
    });

  // sync status
  sync
    .command("status")
    .description("Show the stored watermark and recent runs")
    .option("--runs <n>", "Number of runs to show", parsePositiveInt, 10)
    .action(async (options: { runs: number }) => {
      await withContext(async ({ config, db }) => {
        try {
          const { watermarks, journal } = createSyncPipeline(db, config, {
            organizationSource: null,
          });
          displayWatermark(await watermarks.load());
          displayRuns(await journal.recent(options.runs));
        } catch (error) {
          printError(errorMessage(error));
          process.exitCode = 1;
        }
      });
    });
}
