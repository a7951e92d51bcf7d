import { Value } from "@sinclair/typebox/value";

import {
  RecordValidationError,
  UnresolvedReferenceError,
  errorMessage,
  isRecordLevelError,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import { LicenseRecordSchema, type LicenseRecord } from "../../types/index.js";
import {
  findAddonByKey,
  upsertAddon,
  upsertContact,
  upsertLicense,
  upsertLicenseContactDetails,
  upsertPartnerDetails,
  type UpsertResult,
} from "./upsert.js";

import type { Database } from "../../db/types.js";
import type { Kysely } from "kysely";

const logger = syncLogger.child({ component: "license-loader" });

// ============================================================================
// Types
// ============================================================================

export interface EntityCounts {
  inserted: number;
  updated: number;
}

export type EntityName =
  | "contacts"
  | "addons"
  | "partnerDetails"
  | "licenseContactDetails"
  | "licenses";

export interface RecordFailure {
  /** Position of the record in the batch */
  index: number;
  licenseId: string | null;
  reason: string;
}

/**
 * What enrichment needs to know about a license that was stored
 */
export interface LoadedLicense {
  licenseId: string;
  techContactEmail: string;
  company: string | null;
}

export interface LoadReport {
  total: number;
  loaded: number;
  counts: Record<EntityName, EntityCounts>;
  failures: RecordFailure[];
  licenses: LoadedLicense[];
}

type CountDelta = Partial<Record<EntityName, EntityCounts>>;

const ENTITY_NAMES: readonly EntityName[] = [
  "contacts",
  "addons",
  "partnerDetails",
  "licenseContactDetails",
  "licenses",
];

function emptyCounts(): Record<EntityName, EntityCounts> {
  return {
    contacts: { inserted: 0, updated: 0 },
    addons: { inserted: 0, updated: 0 },
    partnerDetails: { inserted: 0, updated: 0 },
    licenseContactDetails: { inserted: 0, updated: 0 },
    licenses: { inserted: 0, updated: 0 },
  };
}

function tally(delta: CountDelta, entity: EntityName, result: UpsertResult): void {
  const counts = delta[entity] ?? { inserted: 0, updated: 0 };
  if (result.inserted) {
    counts.inserted++;
  } else {
    counts.updated++;
  }
  delta[entity] = counts;
}

function nonEmpty(value: string | null | undefined): string | null {
  return value !== undefined && value !== null && value.trim() !== ""
    ? value
    : null;
}

/**
 * Best-effort license id of a record that may not have passed validation
 */
function peekLicenseId(raw: unknown): string | null {
  if (typeof raw === "object" && raw !== null && "licenseId" in raw) {
    const { licenseId } = raw;
    return typeof licenseId === "string" ? licenseId : null;
  }
  return null;
}

export function validateLicenseRecord(raw: unknown): LicenseRecord {
  if (Value.Check(LicenseRecordSchema, raw)) {
    return raw;
  }
  const first = Value.Errors(LicenseRecordSchema, raw).First();
  const where = first !== undefined && first.path !== "" ? first.path : "/";
  throw new RecordValidationError(
    `Invalid license record at ${where}: ${first?.message ?? "unknown error"}`
  );
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Upserts a batch of exported license records into the normalized tables.
 *
 * Each record is applied in its own transaction, leaves first: contacts,
 * addon, partner, license contact details, then the license itself. A
 * record-level failure rolls back only that record and is reported; any
 * other error aborts the load.
 */
export class LicenseGraphLoader {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly now: () => Date = () => new Date()
  ) {}

  async load(records: readonly unknown[]): Promise<LoadReport> {
    const report: LoadReport = {
      total: records.length,
      loaded: 0,
      counts: emptyCounts(),
      failures: [],
      licenses: [],
    };
    const syncedAt = this.now().toISOString();

    logger.info({ total: records.length }, "Loading license records");

    for (const [index, raw] of records.entries()) {
      try {
        const { delta, license } = await this.db
          .transaction()
          .execute((trx) => this.applyRecord(trx, raw, syncedAt));

        for (const entity of ENTITY_NAMES) {
          const counts = delta[entity];
          if (counts !== undefined) {
            report.counts[entity].inserted += counts.inserted;
            report.counts[entity].updated += counts.updated;
          }
        }
        report.loaded++;
        report.licenses.push(license);
      } catch (error) {
        if (!isRecordLevelError(error)) {
          logger.error(
            { error, index, licenseId: peekLicenseId(raw) },
            "Fatal error while loading license records"
          );
          throw error;
        }
        const failure: RecordFailure = {
          index,
          licenseId: peekLicenseId(raw),
          reason: errorMessage(error),
        };
        report.failures.push(failure);
        logger.warn(failure, "Skipping license record");
      }
    }

    logger.info(
      {
        total: report.total,
        loaded: report.loaded,
        failed: report.failures.length,
        counts: report.counts,
      },
      "License records loaded"
    );

    return report;
  }

  private async applyRecord(
    trx: Kysely<Database>,
    raw: unknown,
    syncedAt: string
  ): Promise<{ delta: CountDelta; license: LoadedLicense }> {
    const record = validateLicenseRecord(raw);
    const delta: CountDelta = {};
    const { contactDetails } = record;

    // Contacts
    const techContact = contactDetails.technicalContact;
    if (techContact === undefined || techContact === null) {
      throw new RecordValidationError(
        `License ${record.licenseId} has no technical contact`
      );
    }
    const tech = await upsertContact(trx, techContact, syncedAt);
    tally(delta, "contacts", tech);

    let billContactId: string | null = null;
    const billContact = contactDetails.billingContact;
    if (billContact !== undefined && billContact !== null) {
      const bill = await upsertContact(trx, billContact, syncedAt);
      tally(delta, "contacts", bill);
      billContactId = bill.id;
    }

    // Addon: created from the record when it names the addon, otherwise
    // it must already exist
    const addonName = nonEmpty(record.addonName);
    if (addonName !== null) {
      tally(
        delta,
        "addons",
        await upsertAddon(trx, { key: record.addonKey, name: addonName }, syncedAt)
      );
    }
    const addon = await findAddonByKey(trx, record.addonKey);
    if (addon === undefined) {
      throw new UnresolvedReferenceError("addon", record.addonKey);
    }

    // Partner
    let partnerDetailsId: string | null = null;
    if (record.partnerDetails !== undefined && record.partnerDetails !== null) {
      const partner = await upsertPartnerDetails(
        trx,
        record.partnerDetails,
        syncedAt
      );
      tally(delta, "partnerDetails", partner);
      partnerDetailsId = partner.id;
    }

    // License contact details need the full (company, country, region) key
    let licenseContactDetailsId: string | null = null;
    const company = nonEmpty(contactDetails.company);
    const country = nonEmpty(contactDetails.country);
    const region = nonEmpty(contactDetails.region);
    if (company !== null && country !== null && region !== null) {
      const lcd = await upsertLicenseContactDetails(
        trx,
        {
          company,
          country,
          region,
          techContactId: tech.id,
          billContactId,
        },
        syncedAt
      );
      tally(delta, "licenseContactDetails", lcd);
      licenseContactDetailsId = lcd.id;
    }

    // License
    const license = await upsertLicense(
      trx,
      {
        licenseId: record.licenseId,
        addonId: addon.id,
        addonKey: addon.key,
        licenseContactDetailsId,
        partnerDetailsId,
        hosting: record.hosting,
        hostLicenseId: nonEmpty(record.hostLicenseId),
        lastUpdated: record.lastUpdated.slice(0, 10),
        licenseType: record.licenseType,
        maintenanceStartDate: record.maintenanceStartDate.slice(0, 10),
        maintenanceEndDate: record.maintenanceEndDate.slice(0, 10),
        status: record.status,
        tier: record.tier,
      },
      syncedAt
    );
    tally(delta, "licenses", license);

    return {
      delta,
      license: {
        licenseId: record.licenseId,
        techContactEmail: techContact.email,
        company,
      },
    };
  }
}
