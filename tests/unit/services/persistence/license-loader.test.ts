import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { RecordValidationError } from "../../../../src/errors.js";
import {
  LicenseGraphLoader,
  validateLicenseRecord,
} from "../../../../src/services/persistence/license-loader.js";
import {
  countRows,
  createTestDb,
  makeLicenseRecord,
} from "../../../helpers/sqlite.js";

import type { Database } from "../../../../src/db/types.js";
import type { Kysely } from "kysely";

const NOW = new Date("2024-03-10T23:45:00Z");

describe("LicenseGraphLoader", () => {
  let db: Kysely<Database>;
  let loader: LicenseGraphLoader;

  beforeEach(async () => {
    db = await createTestDb();
    loader = new LicenseGraphLoader(db, () => NOW);
  });

  afterEach(async () => {
    await db.destroy();
  });

  it("should store a license with its contacts, addon and contact details", async () => {
    const report = await loader.load([makeLicenseRecord("L-1")]);

    expect(report.total).toBe(1);
    expect(report.loaded).toBe(1);
    expect(report.failures).toEqual([]);
    expect(report.counts).toEqual({
      contacts: { inserted: 2, updated: 0 },
      addons: { inserted: 1, updated: 0 },
      partnerDetails: { inserted: 0, updated: 0 },
      licenseContactDetails: { inserted: 1, updated: 0 },
      licenses: { inserted: 1, updated: 0 },
    });
    expect(report.licenses).toEqual([
      { licenseId: "L-1", techContactEmail: "tech@acme.com", company: "Acme Corp" },
    ]);

    const license = await db
      .selectFrom("licenses")
      .innerJoin("addons", "addons.id", "licenses.addon_id")
      .innerJoin(
        "license_contact_details as lcd",
        "lcd.id",
        "licenses.license_contact_details_id"
      )
      .innerJoin("contacts", "contacts.id", "lcd.tech_contact_id")
      .select([
        "licenses.license_id",
        "licenses.addon_key",
        "licenses.last_updated",
        "licenses.organization_id",
        "licenses.synced_at",
        "addons.name as addon_name",
        "lcd.company",
        "contacts.email as tech_email",
      ])
      .executeTakeFirstOrThrow();

    expect(license).toEqual({
      license_id: "L-1",
      addon_key: "com.example.tracker",
      last_updated: "2024-03-01",
      organization_id: null,
      synced_at: "2024-03-10T23:45:00.000Z",
      addon_name: "Tracker",
      company: "Acme Corp",
      tech_email: "tech@acme.com",
    });
  });

  it("should be idempotent when the same batch is applied twice", async () => {
    const batch = [
      makeLicenseRecord("L-1"),
      makeLicenseRecord("L-2", {
        partnerDetails: { partnerName: "Resellers Ltd", partnerType: "RESELLER" },
      }),
    ];

    await loader.load(batch);
    const before = await db
      .selectFrom("licenses")
      .select(["id", "license_id"])
      .orderBy("license_id")
      .execute();

    const second = await loader.load(batch);

    expect(second.counts.licenses).toEqual({ inserted: 0, updated: 2 });
    expect(second.counts.contacts).toEqual({ inserted: 0, updated: 4 });
    expect(second.counts.partnerDetails).toEqual({ inserted: 0, updated: 1 });
    expect(await countRows(db, "licenses")).toBe(2);
    expect(await countRows(db, "contacts")).toBe(2);
    expect(await countRows(db, "addons")).toBe(1);
    expect(await countRows(db, "partner_details")).toBe(1);
    expect(await countRows(db, "license_contact_details")).toBe(1);

    const after = await db
      .selectFrom("licenses")
      .select(["id", "license_id"])
      .orderBy("license_id")
      .execute();
    expect(after).toEqual(before);
  });

  it("should keep the last record when a batch repeats a license id", async () => {
    const report = await loader.load([
      makeLicenseRecord("L-1", { status: "active" }),
      makeLicenseRecord("L-1", { status: "inactive" }),
    ]);

    expect(report.loaded).toBe(2);
    expect(report.counts.licenses).toEqual({ inserted: 1, updated: 1 });

    const rows = await db.selectFrom("licenses").select("status").execute();
    expect(rows).toEqual([{ status: "inactive" }]);
  });

  it("should reject only the record whose addon cannot be resolved", async () => {
    const report = await loader.load([
      makeLicenseRecord("L-1"),
      makeLicenseRecord("L-2", {
        addonKey: "com.example.unknown",
        addonName: null,
      }),
      makeLicenseRecord("L-3"),
    ]);

    expect(report.loaded).toBe(2);
    expect(report.failures).toEqual([
      {
        index: 1,
        licenseId: "L-2",
        reason: "No addon found for key 'com.example.unknown'",
      },
    ]);

    const ids = await db
      .selectFrom("licenses")
      .select("license_id")
      .orderBy("license_id")
      .execute();
    expect(ids).toEqual([{ license_id: "L-1" }, { license_id: "L-3" }]);
  });

  it("should roll back the contacts of a rejected record", async () => {
    await loader.load([
      makeLicenseRecord("L-2", {
        addonKey: "com.example.unknown",
        addonName: "",
        contactDetails: {
          company: "Globex",
          country: "Germany",
          region: "EMEA",
          technicalContact: { email: "it@globex.de" },
        },
      }),
    ]);

    expect(await countRows(db, "contacts")).toBe(0);
  });

  it("should resolve an addon stored by an earlier record", async () => {
    const report = await loader.load([
      makeLicenseRecord("L-1"),
      makeLicenseRecord("L-2", { addonName: null }),
    ]);

    expect(report.failures).toEqual([]);
    expect(report.counts.addons).toEqual({ inserted: 1, updated: 0 });
  });

  it("should report a record without a technical contact", async () => {
    const report = await loader.load([
      makeLicenseRecord("L-1", {
        contactDetails: {
          company: "Acme Corp",
          country: "United States",
          region: "Americas",
          technicalContact: null,
        },
      }),
    ]);

    expect(report.loaded).toBe(0);
    expect(report.failures).toEqual([
      { index: 0, licenseId: "L-1", reason: "License L-1 has no technical contact" },
    ]);
  });

  it("should report records that fail validation", async () => {
    const { licenseId: _dropped, ...withoutId } = makeLicenseRecord("L-1");

    const report = await loader.load([withoutId, "not a record"]);

    expect(report.loaded).toBe(0);
    expect(report.failures).toHaveLength(2);
    expect(report.failures[0]?.licenseId).toBeNull();
    expect(report.failures[0]?.reason).toMatch(
      /^Invalid license record at \/licenseId: /
    );
    expect(report.failures[1]?.reason).toMatch(/^Invalid license record at \/: /);
  });

  it("should skip contact details when the region is missing", async () => {
    const report = await loader.load([
      makeLicenseRecord("L-1", {
        contactDetails: {
          company: "Acme Corp",
          country: "United States",
          region: "",
          technicalContact: { email: "tech@acme.com" },
        },
      }),
    ]);

    expect(report.counts.licenseContactDetails).toEqual({ inserted: 0, updated: 0 });
    const license = await db
      .selectFrom("licenses")
      .select("license_contact_details_id")
      .executeTakeFirstOrThrow();
    expect(license.license_contact_details_id).toBeNull();
  });

  it("should cascade deleting a technical contact to its licenses", async () => {
    await loader.load([makeLicenseRecord("L-1"), makeLicenseRecord("L-2")]);

    await db.deleteFrom("contacts").where("email", "=", "tech@acme.com").execute();

    expect(await countRows(db, "license_contact_details")).toBe(0);
    expect(await countRows(db, "licenses")).toBe(0);
    expect(await countRows(db, "addons")).toBe(1);
  });

  it("should cascade deleting partner details to their licenses", async () => {
    await loader.load([
      makeLicenseRecord("L-1"),
      makeLicenseRecord("L-2", {
        partnerDetails: { partnerName: "Resellers Ltd", partnerType: "RESELLER" },
      }),
    ]);

    await db.deleteFrom("partner_details").execute();

    const ids = await db.selectFrom("licenses").select("license_id").execute();
    expect(ids).toEqual([{ license_id: "L-1" }]);
  });

  it("should reject a license whose addon id and key disagree", async () => {
    await loader.load([makeLicenseRecord("L-1")]);
    await db
      .insertInto("addons")
      .values({
        id: "00000000-0000-4000-8000-000000000002",
        key: "com.example.board",
        name: "Board",
        synced_at: NOW.toISOString(),
      })
      .execute();

    await expect(
      db
        .updateTable("licenses")
        .set({ addon_id: "00000000-0000-4000-8000-000000000002" })
        .execute()
    ).rejects.toThrow(/FOREIGN KEY constraint failed/);

    const license = await db
      .selectFrom("licenses")
      .innerJoin("addons", "addons.id", "licenses.addon_id")
      .select(["licenses.addon_key", "addons.key"])
      .executeTakeFirstOrThrow();
    expect(license).toEqual({ addon_key: "com.example.tracker", key: "com.example.tracker" });
  });

  it("should keep an organization link when the license is updated", async () => {
    await loader.load([makeLicenseRecord("L-1")]);
    await db
      .insertInto("organizations")
      .values({
        id: "00000000-0000-4000-8000-000000000001",
        name: "Acme",
        primary_role: null,
        short_description: null,
        domain: "acme.com",
        homepage_url: null,
        facebook_url: null,
        twitter_url: null,
        linkedin_url: null,
        api_url: null,
        city: null,
        region: null,
        country: null,
        stock_exchange: null,
        stock_symbol: null,
        created_at: null,
        updated_at: null,
        synced_at: NOW.toISOString(),
      })
      .execute();
    await db
      .updateTable("licenses")
      .set({ organization_id: "00000000-0000-4000-8000-000000000001" })
      .execute();

    await loader.load([makeLicenseRecord("L-1", { status: "inactive" })]);

    const license = await db
      .selectFrom("licenses")
      .select(["status", "organization_id"])
      .executeTakeFirstOrThrow();
    expect(license).toEqual({
      status: "inactive",
      organization_id: "00000000-0000-4000-8000-000000000001",
    });
  });
});

describe("validateLicenseRecord", () => {
  it("should return a valid record unchanged", () => {
    const record = makeLicenseRecord("L-1");
    expect(validateLicenseRecord(record)).toBe(record);
  });

  it("should throw a RecordValidationError for a bad date", () => {
    expect(() =>
      validateLicenseRecord(makeLicenseRecord("L-1", { lastUpdated: "March" }))
    ).toThrow(RecordValidationError);
  });
});
