import { randomUUID } from "node:crypto";

import type { Kysely } from "kysely";

import type { Database } from "../../db/types.js";
import type {
  MarketplaceContact,
  MarketplacePartnerDetails,
  OrganizationProfile,
} from "../../types/index.js";

/**
 * Outcome of a natural-key upsert. `inserted` is false when an existing row
 * was updated in place (its id is preserved).
 */
export interface UpsertResult {
  id: string;
  inserted: boolean;
}

// Every upsert below follows the same shape:
//   INSERT ... VALUES (new uuid, ...)
//   ON CONFLICT (natural key) DO UPDATE SET <every non-key column> = excluded.<column>
//   RETURNING id
// The row was inserted iff the returned id is the one we generated.

// ============================================================================
// Contacts
// ============================================================================

export async function upsertContact(
  db: Kysely<Database>,
  contact: MarketplaceContact,
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("contacts")
    .values({
      id,
      email: contact.email,
      address_1: contact.address1 ?? null,
      address_2: contact.address2 ?? null,
      city: contact.city ?? null,
      name: contact.name ?? null,
      phone: contact.phone ?? null,
      postcode: contact.postcode ?? null,
      state: contact.state ?? null,
      synced_at: syncedAt,
    })
    .onConflict((oc) =>
      oc.column("email").doUpdateSet((eb) => ({
        address_1: eb.ref("excluded.address_1"),
        address_2: eb.ref("excluded.address_2"),
        city: eb.ref("excluded.city"),
        name: eb.ref("excluded.name"),
        phone: eb.ref("excluded.phone"),
        postcode: eb.ref("excluded.postcode"),
        state: eb.ref("excluded.state"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}

// ============================================================================
// Addons
// ============================================================================

export async function upsertAddon(
  db: Kysely<Database>,
  addon: { key: string; name: string },
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("addons")
    .values({ id, key: addon.key, name: addon.name, synced_at: syncedAt })
    .onConflict((oc) =>
      oc.column("key").doUpdateSet((eb) => ({
        name: eb.ref("excluded.name"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}

export async function findAddonByKey(
  db: Kysely<Database>,
  key: string
): Promise<{ id: string; key: string } | undefined> {
  return db
    .selectFrom("addons")
    .select(["id", "key"])
    .where("key", "=", key)
    .executeTakeFirst();
}

// ============================================================================
// Partner Details
// ============================================================================

export async function upsertPartnerDetails(
  db: Kysely<Database>,
  partner: MarketplacePartnerDetails,
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("partner_details")
    .values({
      id,
      name: partner.partnerName,
      type: partner.partnerType,
      bill_contact_name: partner.billingContact?.name ?? null,
      bill_contact_email: partner.billingContact?.email ?? null,
      synced_at: syncedAt,
    })
    .onConflict((oc) =>
      oc.columns(["name", "type"]).doUpdateSet((eb) => ({
        bill_contact_name: eb.ref("excluded.bill_contact_name"),
        bill_contact_email: eb.ref("excluded.bill_contact_email"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}

// ============================================================================
// License Contact Details
// ============================================================================

export interface LicenseContactDetailsInput {
  company: string;
  country: string;
  region: string;
  techContactId: string;
  billContactId: string | null;
}

export async function upsertLicenseContactDetails(
  db: Kysely<Database>,
  details: LicenseContactDetailsInput,
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("license_contact_details")
    .values({
      id,
      company: details.company,
      country: details.country,
      region: details.region,
      tech_contact_id: details.techContactId,
      bill_contact_id: details.billContactId,
      synced_at: syncedAt,
    })
    .onConflict((oc) =>
      oc.columns(["company", "country", "region"]).doUpdateSet((eb) => ({
        tech_contact_id: eb.ref("excluded.tech_contact_id"),
        bill_contact_id: eb.ref("excluded.bill_contact_id"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}

// ============================================================================
// Licenses
// ============================================================================

export interface LicenseInput {
  licenseId: string;
  addonId: string;
  addonKey: string;
  licenseContactDetailsId: string | null;
  partnerDetailsId: string | null;
  hosting: string;
  hostLicenseId: string | null;
  lastUpdated: string;
  licenseType: string;
  maintenanceStartDate: string;
  maintenanceEndDate: string;
  status: string;
  tier: string;
}

/**
 * organization_id is written by enrichment only; an update leaves it as is.
 */
export async function upsertLicense(
  db: Kysely<Database>,
  license: LicenseInput,
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("licenses")
    .values({
      id,
      license_id: license.licenseId,
      addon_id: license.addonId,
      addon_key: license.addonKey,
      license_contact_details_id: license.licenseContactDetailsId,
      partner_details_id: license.partnerDetailsId,
      organization_id: null,
      hosting: license.hosting,
      host_license_id: license.hostLicenseId,
      last_updated: license.lastUpdated,
      license_type: license.licenseType,
      maintenance_start_date: license.maintenanceStartDate,
      maintenance_end_date: license.maintenanceEndDate,
      status: license.status,
      tier: license.tier,
      synced_at: syncedAt,
    })
    .onConflict((oc) =>
      oc.column("license_id").doUpdateSet((eb) => ({
        addon_id: eb.ref("excluded.addon_id"),
        addon_key: eb.ref("excluded.addon_key"),
        license_contact_details_id: eb.ref("excluded.license_contact_details_id"),
        partner_details_id: eb.ref("excluded.partner_details_id"),
        hosting: eb.ref("excluded.hosting"),
        host_license_id: eb.ref("excluded.host_license_id"),
        last_updated: eb.ref("excluded.last_updated"),
        license_type: eb.ref("excluded.license_type"),
        maintenance_start_date: eb.ref("excluded.maintenance_start_date"),
        maintenance_end_date: eb.ref("excluded.maintenance_end_date"),
        status: eb.ref("excluded.status"),
        tier: eb.ref("excluded.tier"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}

// ============================================================================
// Organizations
// ============================================================================

/**
 * Store an organization profile keyed by its domain (trailing "/" removed).
 * Profiles without a name or a domain are rejected by the caller.
 */
export async function upsertOrganization(
  db: Kysely<Database>,
  profile: OrganizationProfile & { name: string; domain: string },
  syncedAt: string
): Promise<UpsertResult> {
  const id = randomUUID();
  const row = await db
    .insertInto("organizations")
    .values({
      id,
      name: profile.name,
      primary_role: profile.primaryRole,
      short_description: profile.shortDescription,
      domain: profile.domain.replace(/\/+$/, ""),
      homepage_url: profile.homepageUrl,
      facebook_url: profile.facebookUrl,
      twitter_url: profile.twitterUrl,
      linkedin_url: profile.linkedinUrl,
      api_url: profile.apiUrl,
      city: profile.city,
      region: profile.region,
      country: profile.country,
      stock_exchange: profile.stockExchange,
      stock_symbol: profile.stockSymbol,
      created_at: profile.createdAt,
      updated_at: profile.updatedAt,
      synced_at: syncedAt,
    })
    .onConflict((oc) =>
      oc.column("domain").doUpdateSet((eb) => ({
        name: eb.ref("excluded.name"),
        primary_role: eb.ref("excluded.primary_role"),
        short_description: eb.ref("excluded.short_description"),
        homepage_url: eb.ref("excluded.homepage_url"),
        facebook_url: eb.ref("excluded.facebook_url"),
        twitter_url: eb.ref("excluded.twitter_url"),
        linkedin_url: eb.ref("excluded.linkedin_url"),
        api_url: eb.ref("excluded.api_url"),
        city: eb.ref("excluded.city"),
        region: eb.ref("excluded.region"),
        country: eb.ref("excluded.country"),
        stock_exchange: eb.ref("excluded.stock_exchange"),
        stock_symbol: eb.ref("excluded.stock_symbol"),
        created_at: eb.ref("excluded.created_at"),
        updated_at: eb.ref("excluded.updated_at"),
        synced_at: eb.ref("excluded.synced_at"),
      }))
    )
    .returning("id")
    .executeTakeFirstOrThrow();

  return { id: row.id, inserted: row.id === id };
}
