import type { Selectable } from "kysely";

// ============================================================================
// Conventions
// ============================================================================
//
// - Primary keys are UUID strings generated by the application.
// - Timestamps are ISO-8601 strings (pg type parsers return them as such).
// - Calendar dates are YYYY-MM-DD strings.
// - synced_at is set on every write and is never read by the watermark.

export type SyncRunStatus = "RUNNING" | "COMPLETED" | "FAILED";

// ============================================================================
// Entity Tables
// ============================================================================

/**
 * contacts - billing and technical contact people, keyed by email
 */
export interface ContactsTable {
  id: string;
  email: string;
  address_1: string | null;
  address_2: string | null;
  city: string | null;
  name: string | null;
  phone: string | null;
  postcode: string | null;
  state: string | null;
  synced_at: string;
}

/**
 * addons - purchasable products, keyed by key (name is unique as well)
 */
export interface AddonsTable {
  id: string;
  key: string;
  name: string;
  synced_at: string;
}

/**
 * organizations - company profiles from the organization-data API, keyed by domain
 */
export interface OrganizationsTable {
  id: string;
  name: string;
  primary_role: string | null;
  short_description: string | null;
  domain: string;
  homepage_url: string | null;
  facebook_url: string | null;
  twitter_url: string | null;
  linkedin_url: string | null;
  api_url: string | null;
  city: string | null;
  region: string | null;
  country: string | null;
  stock_exchange: string | null;
  stock_symbol: string | null;
  created_at: number | null; // seconds since the epoch
  updated_at: number | null; // seconds since the epoch
  synced_at: string;
}

/**
 * partner_details - resellers / solution partners, keyed by (name, type)
 */
export interface PartnerDetailsTable {
  id: string;
  name: string;
  type: string;
  bill_contact_name: string | null;
  bill_contact_email: string | null;
  synced_at: string;
}

/**
 * license_contact_details - company + region bundle, keyed by (company, country, region)
 */
export interface LicenseContactDetailsTable {
  id: string;
  company: string;
  country: string;
  region: string;
  bill_contact_id: string | null;
  tech_contact_id: string;
  synced_at: string;
}

/**
 * licenses - the synced license instances, keyed by license_id
 */
export interface LicensesTable {
  id: string;
  license_id: string;
  addon_id: string;
  addon_key: string;
  license_contact_details_id: string | null;
  partner_details_id: string | null;
  organization_id: string | null;
  hosting: string;
  host_license_id: string | null;
  last_updated: string;
  license_type: string;
  maintenance_start_date: string;
  maintenance_end_date: string;
  status: string;
  tier: string;
  synced_at: string;
}

// ============================================================================
// Sync Bookkeeping Tables
// ============================================================================

/**
 * sync_watermarks - persisted scheduler state, one row per stream
 */
export interface SyncWatermarksTable {
  stream: string;
  next_run_at: string;
  modified_since: string;
  updated_at: string;
}

/**
 * sync_runs - one row per sync cycle
 */
export interface SyncRunsTable {
  id: string;
  scheduled_for: string;
  modified_since: string;
  status: SyncRunStatus;
  started_at: string;
  finished_at: string | null;
  licenses_exported: number | null;
  records_loaded: number | null;
  records_failed: number | null;
  organizations_linked: number | null;
  error_message: string | null;
}

// ============================================================================
// Database Interface
// ============================================================================

export interface Database {
  contacts: ContactsTable;
  addons: AddonsTable;
  organizations: OrganizationsTable;
  partner_details: PartnerDetailsTable;
  license_contact_details: LicenseContactDetailsTable;
  licenses: LicensesTable;
  sync_watermarks: SyncWatermarksTable;
  sync_runs: SyncRunsTable;
}

// ============================================================================
// Row Types
// ============================================================================

export type SyncRun = Selectable<SyncRunsTable>;
