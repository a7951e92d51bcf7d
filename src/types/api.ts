/**
 * API Request/Response Types
 */

import type { SyncRunStatus } from "../db/types.js";
import type { PaginationMeta } from "../utils/pagination.js";

// ============================================================================
// Common Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
  meta?: {
    pagination?: PaginationMeta;
  };
}

export interface ApiError {
  error: string;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// ============================================================================
// Sync Types
// ============================================================================

export interface WatermarkDto {
  nextRunAt: string;
  modifiedSince: string;
  updatedAt: string;
}

export interface SyncRunDto {
  id: string;
  scheduledFor: string;
  modifiedSince: string;
  status: SyncRunStatus;
  startedAt: string;
  finishedAt: string | null;
  licensesExported: number | null;
  recordsLoaded: number | null;
  recordsFailed: number | null;
  organizationsLinked: number | null;
  errorMessage: string | null;
}

export interface SyncStatusDto {
  watermark: WatermarkDto | null;
  runs: SyncRunDto[];
}

// ============================================================================
// License Types
// ============================================================================

export interface ContactDto {
  email: string;
  name: string | null;
  phone: string | null;
  city: string | null;
  state: string | null;
  postcode: string | null;
}

export interface LicenseSummaryDto {
  id: string;
  licenseId: string;
  addonKey: string;
  addonName: string;
  hosting: string;
  licenseType: string;
  status: string;
  tier: string;
  lastUpdated: string;
  maintenanceStartDate: string;
  maintenanceEndDate: string;
  company: string | null;
  organizationDomain: string | null;
}

export interface LicenseDetailDto extends LicenseSummaryDto {
  hostLicenseId: string | null;
  country: string | null;
  region: string | null;
  technicalContact: ContactDto | null;
  billingContact: ContactDto | null;
  partner: { name: string; type: string } | null;
  syncedAt: string;
}

// ============================================================================
// Organization Types
// ============================================================================

export interface OrganizationDto {
  id: string;
  name: string;
  domain: string;
  primaryRole: string | null;
  shortDescription: string | null;
  homepageUrl: string | null;
  linkedinUrl: string | null;
  city: string | null;
  region: string | null;
  country: string | null;
  stockExchange: string | null;
  stockSymbol: string | null;
  licenseCount: number;
  syncedAt: string;
}
