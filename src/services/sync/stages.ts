/**
 * Stage runner - one sync cycle: export licenses to the artifact, let it
 * settle, then load the artifact into the database.
 */

import { StageError, type StageName } from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { formatDuration } from "../../utils/time.js";
import { LicenseGraphLoader, type LoadReport } from "../persistence/license-loader.js";
import {
  OrganizationLoader,
  type EnrichmentReport,
} from "../persistence/organizations.js";
import { readArtifact, removeArtifact, writeArtifact } from "./artifact.js";
import { systemClock, type Clock } from "./clock.js";

import type { Database } from "../../db/types.js";
import type { LicenseSource, OrganizationSource } from "../../types/index.js";
import type { Kysely } from "kysely";

const logger = syncLogger.child({ component: "stages" });

// ============================================================================
// Types
// ============================================================================

export interface ExportInput {
  outputPath: string;
  /** YYYY-MM-DD */
  modifiedSince: string;
}

export interface ExportResult {
  licensesExported: number;
}

export interface LoadInput {
  inputPath: string;
}

export interface LoadResult {
  load: LoadReport;
  /** null when no organization source is configured */
  enrichment: EnrichmentReport | null;
}

export interface ExportStage {
  run(input: ExportInput): Promise<ExportResult>;
}

export interface LoadStage {
  run(input: LoadInput): Promise<LoadResult>;
}

export interface CycleResult {
  exported: ExportResult;
  loaded: LoadResult;
}

// ============================================================================
// Stages
// ============================================================================

export class LicenseExportStage implements ExportStage {
  constructor(private readonly source: LicenseSource) {}

  async run({ outputPath, modifiedSince }: ExportInput): Promise<ExportResult> {
    const records = await this.source.exportLicenses(modifiedSince);
    await writeArtifact(outputPath, records);
    logger.info(
      { outputPath, modifiedSince, licensesExported: records.length },
      "Artifact written"
    );
    return { licensesExported: records.length };
  }
}

export class LicenseLoadStage implements LoadStage {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly organizations: OrganizationSource | null,
    private readonly now: () => Date = () => new Date()
  ) {}

  async run({ inputPath }: LoadInput): Promise<LoadResult> {
    const records = await readArtifact(inputPath);
    const load = await new LicenseGraphLoader(this.db, this.now).load(records);

    const enrichment =
      this.organizations !== null
        ? await new OrganizationLoader(
            this.db,
            this.organizations,
            this.now
          ).enrich(load.licenses)
        : null;

    return { load, enrichment };
  }
}

// ============================================================================
// Runner
// ============================================================================

export interface StageRunnerOptions {
  artifactPath: string;
  settleDelayMs: number;
}

export class StageRunner {
  constructor(
    private readonly exportStage: ExportStage,
    private readonly loadStage: LoadStage,
    private readonly options: StageRunnerOptions,
    private readonly clock: Clock = systemClock
  ) {}

  /**
   * Run export then load, strictly in sequence. No retries: a failing
   * stage surfaces as a StageError and the cycle is lost.
   */
  async runCycle(modifiedSince: string): Promise<CycleResult> {
    const { artifactPath, settleDelayMs } = this.options;

    // A stale artifact must never be mistaken for this cycle's export
    await removeArtifact(artifactPath);

    const exported = await this.timed("export", () =>
      this.exportStage.run({ outputPath: artifactPath, modifiedSince })
    );

    if (settleDelayMs > 0) {
      logger.debug({ settleDelayMs }, "Waiting before load stage");
      await this.clock.sleep(settleDelayMs);
    }

    const loaded = await this.timed("load", () =>
      this.loadStage.run({ inputPath: artifactPath })
    );

    return { exported, loaded };
  }

  private async timed<T>(stage: StageName, fn: () => Promise<T>): Promise<T> {
    const started = this.clock.now().getTime();
    logger.info({ stage, at: this.clock.now().toISOString() }, "Stage started");
    try {
      const result = await fn();
      logger.info(
        {
          stage,
          duration: formatDuration(this.clock.now().getTime() - started),
        },
        "Stage finished"
      );
      return result;
    } catch (error) {
      logger.error({ stage, error }, "Stage failed");
      throw new StageError(stage, error);
    }
  }
}
