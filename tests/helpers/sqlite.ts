import { runMigration } from "../../src/db/migrate.js";
import { createSqliteDb } from "../../src/db/sqlite.js";

import type { Database } from "../../src/db/types.js";
import type { LicenseRecord } from "../../src/types/index.js";
import type { Kysely } from "kysely";

/**
 * Fresh in-memory database with the full schema and foreign keys enforced
 */
export async function createTestDb(): Promise<Kysely<Database>> {
  const db = createSqliteDb(":memory:");
  await runMigration(db);
  return db;
}

export function makeLicenseRecord(
  licenseId: string,
  overrides: Partial<LicenseRecord> = {}
): LicenseRecord {
  return {
    licenseId,
    addonKey: "com.example.tracker",
    addonName: "Tracker",
    hosting: "Server",
    hostLicenseId: null,
    lastUpdated: "2024-03-01",
    licenseType: "COMMERCIAL",
    maintenanceStartDate: "2024-01-01",
    maintenanceEndDate: "2025-01-01",
    status: "active",
    tier: "10 Users",
    contactDetails: {
      company: "Acme Corp",
      country: "United States",
      region: "Americas",
      technicalContact: { email: "tech@acme.com", name: "Tech Person" },
      billingContact: { email: "billing@acme.com", name: "Bill Person" },
    },
    partnerDetails: null,
    ...overrides,
  };
}

export async function countRows(
  db: Kysely<Database>,
  table: keyof Database
): Promise<number> {
  const rows = await db.selectFrom(table).selectAll().execute();
  return rows.length;
}
