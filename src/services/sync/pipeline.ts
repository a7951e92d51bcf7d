/**
 * Wires the configured upstream clients, stages and stores together.
 */

import { MarketplaceClient } from "../../clients/marketplace.js";
import { OrgDataClient } from "../../clients/org-data.js";
import { syncLogger } from "../../logger.js";
import { systemClock, type Clock } from "./clock.js";
import { KyselyRunJournal } from "./runs.js";
import {
  LicenseExportStage,
  LicenseLoadStage,
  StageRunner,
} from "./stages.js";
import { KyselyWatermarkStore } from "./watermark.js";

import type { AppConfig } from "../../config.js";
import type { Database } from "../../db/types.js";
import type { LicenseSource, OrganizationSource } from "../../types/index.js";
import type { Kysely } from "kysely";

export interface SyncPipeline {
  licenseSource: LicenseSource;
  organizationSource: OrganizationSource | null;
  exportStage: LicenseExportStage;
  loadStage: LicenseLoadStage;
  runner: StageRunner;
  watermarks: KyselyWatermarkStore;
  journal: KyselyRunJournal;
}

export interface SyncPipelineOverrides {
  licenseSource?: LicenseSource;
  /** null disables organization enrichment */
  organizationSource?: OrganizationSource | null;
  clock?: Clock;
}

export function createSyncPipeline(
  db: Kysely<Database>,
  config: AppConfig,
  overrides: SyncPipelineOverrides = {}
): SyncPipeline {
  const clock = overrides.clock ?? systemClock;
  const now = (): Date => clock.now();

  const licenseSource =
    overrides.licenseSource ?? new MarketplaceClient(config.marketplace);

  let organizationSource: OrganizationSource | null;
  if (overrides.organizationSource !== undefined) {
    organizationSource = overrides.organizationSource;
  } else if (config.orgApi.apiKey !== "") {
    organizationSource = new OrgDataClient(config.orgApi);
  } else {
    syncLogger.warn("ORG_API_KEY is not set; organization enrichment is disabled");
    organizationSource = null;
  }

  const exportStage = new LicenseExportStage(licenseSource);
  const loadStage = new LicenseLoadStage(db, organizationSource, now);

  return {
    licenseSource,
    organizationSource,
    exportStage,
    loadStage,
    runner: new StageRunner(
      exportStage,
      loadStage,
      {
        artifactPath: config.sync.artifactPath,
        settleDelayMs: config.sync.settleDelayMs,
      },
      clock
    ),
    watermarks: new KyselyWatermarkStore(db),
    journal: new KyselyRunJournal(db, now),
  };
}
