// Upstream data shapes: marketplace license export and organization profiles

import { Type, type Static } from "@sinclair/typebox";

const OptionalText = Type.Optional(Type.Union([Type.String(), Type.Null()]));

// =====================
// Marketplace License Export
// =====================

/**
 * Contact person as reported in contactDetails.technicalContact /
 * contactDetails.billingContact
 */
export const MarketplaceContactSchema = Type.Object({
  email: Type.String({ minLength: 1 }),
  name: OptionalText,
  phone: OptionalText,
  address1: OptionalText,
  address2: OptionalText,
  city: OptionalText,
  postcode: OptionalText,
  state: OptionalText,
});

export type MarketplaceContact = Static<typeof MarketplaceContactSchema>;

export const ContactDetailsSchema = Type.Object({
  company: OptionalText,
  country: OptionalText,
  region: OptionalText,
  // Optional here so a missing contact is reported with its own reason
  technicalContact: Type.Optional(Type.Union([MarketplaceContactSchema, Type.Null()])),
  billingContact: Type.Optional(Type.Union([MarketplaceContactSchema, Type.Null()])),
});

export const PartnerDetailsSchema = Type.Object({
  partnerName: Type.String({ minLength: 1 }),
  partnerType: Type.String({ minLength: 1 }),
  billingContact: Type.Optional(
    Type.Union([
      Type.Object({
        name: OptionalText,
        email: OptionalText,
      }),
      Type.Null(),
    ])
  ),
});

export type MarketplacePartnerDetails = Static<typeof PartnerDetailsSchema>;

const CalendarDate = Type.String({ pattern: "^\\d{4}-\\d{2}-\\d{2}" });

/**
 * One element of the "export licenses" response array
 */
export const LicenseRecordSchema = Type.Object({
  licenseId: Type.String({ minLength: 1 }),
  addonKey: Type.String({ minLength: 1 }),
  addonName: OptionalText,
  hosting: Type.String(),
  hostLicenseId: OptionalText,
  lastUpdated: CalendarDate,
  licenseType: Type.String(),
  maintenanceStartDate: CalendarDate,
  maintenanceEndDate: CalendarDate,
  status: Type.String(),
  tier: Type.String(),
  contactDetails: ContactDetailsSchema,
  partnerDetails: Type.Optional(Type.Union([PartnerDetailsSchema, Type.Null()])),
});

export type LicenseRecord = Static<typeof LicenseRecordSchema>;

// =====================
// Organization Data API
// =====================

/**
 * data.items[].properties of an organization search response
 */
export const OrganizationPropertiesSchema = Type.Object({
  name: OptionalText,
  primary_role: OptionalText,
  short_description: OptionalText,
  domain: OptionalText,
  homepage_url: OptionalText,
  facebook_url: OptionalText,
  twitter_url: OptionalText,
  linkedin_url: OptionalText,
  api_url: OptionalText,
  city_name: OptionalText,
  region_name: OptionalText,
  country_code: OptionalText,
  stock_exchange: OptionalText,
  stock_symbol: OptionalText,
  created_at: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
  updated_at: Type.Optional(Type.Union([Type.Number(), Type.Null()])),
});

export const OrganizationSearchResponseSchema = Type.Object({
  data: Type.Object({
    items: Type.Array(
      Type.Object({
        properties: OrganizationPropertiesSchema,
      })
    ),
  }),
});

export type OrganizationSearchResponse = Static<
  typeof OrganizationSearchResponseSchema
>;

/**
 * Organization profile as handed to the enrichment step
 */
export interface OrganizationProfile {
  name: string | null;
  primaryRole: string | null;
  shortDescription: string | null;
  domain: string | null;
  homepageUrl: string | null;
  facebookUrl: string | null;
  twitterUrl: string | null;
  linkedinUrl: string | null;
  apiUrl: string | null;
  city: string | null;
  region: string | null;
  country: string | null;
  stockExchange: string | null;
  stockSymbol: string | null;
  createdAt: number | null;
  updatedAt: number | null;
}

// =====================
// Collaborator Interfaces
// =====================

/**
 * Source of license records changed on or after a calendar date
 */
export interface LicenseSource {
  exportLicenses(modifiedSince: string): Promise<unknown[]>;
}

/**
 * Source of organization profiles
 */
export interface OrganizationSource {
  searchByDomain(domain: string): Promise<OrganizationProfile[]>;
  searchByName(name: string): Promise<OrganizationProfile[]>;
}
