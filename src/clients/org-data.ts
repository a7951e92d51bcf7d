import { Value } from "@sinclair/typebox/value";

import { UpstreamError, errorMessage } from "../errors.js";
import { apiLogger } from "../logger.js";
import {
  OrganizationSearchResponseSchema,
  type OrganizationProfile,
  type OrganizationSearchResponse,
  type OrganizationSource,
} from "../types/index.js";
import { RateLimitedHttp, type FetchFn } from "./http.js";

export interface OrgDataClientOptions {
  baseUrl: string;
  apiKey: string;
  rateLimitMs: number;
  fetch?: FetchFn;
}

type SearchField = "domain_name" | "name";

function toProfile(
  properties: OrganizationSearchResponse["data"]["items"][number]["properties"]
): OrganizationProfile {
  return {
    name: properties.name ?? null,
    primaryRole: properties.primary_role ?? null,
    shortDescription: properties.short_description ?? null,
    domain: properties.domain ?? null,
    homepageUrl: properties.homepage_url ?? null,
    facebookUrl: properties.facebook_url ?? null,
    twitterUrl: properties.twitter_url ?? null,
    linkedinUrl: properties.linkedin_url ?? null,
    apiUrl: properties.api_url ?? null,
    city: properties.city_name ?? null,
    region: properties.region_name ?? null,
    country: properties.country_code ?? null,
    stockExchange: properties.stock_exchange ?? null,
    stockSymbol: properties.stock_symbol ?? null,
    createdAt: properties.created_at ?? null,
    updatedAt: properties.updated_at ?? null,
  };
}

/**
 * Organization-data API: `/odm-organizations` searched by domain or by name
 */
export class OrgDataClient implements OrganizationSource {
  private readonly http: RateLimitedHttp;

  constructor(private readonly options: OrgDataClientOptions) {
    this.http = new RateLimitedHttp("org-data", {
      minIntervalMs: options.rateLimitMs,
      fetch: options.fetch,
    });
  }

  searchUrl(field: SearchField, value: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    const query = new URLSearchParams({
      user_key: this.options.apiKey,
      [field]: value,
    });
    return `${base}/odm-organizations?${query.toString()}`;
  }

  searchByDomain(domain: string): Promise<OrganizationProfile[]> {
    return this.search("domain_name", domain);
  }

  searchByName(name: string): Promise<OrganizationProfile[]> {
    return this.search("name", name);
  }

  private async search(
    field: SearchField,
    value: string
  ): Promise<OrganizationProfile[]> {
    const url = this.searchUrl(field, value);

    let response: Response;
    try {
      response = await this.http.fetch(url, {
        headers: { Accept: "application/json" },
      });
    } catch (error) {
      throw new UpstreamError(
        `Organization search failed: ${errorMessage(error)}`
      );
    }

    if (!response.ok) {
      apiLogger.error(
        { field, value, status: response.status },
        "Organization search failed"
      );
      throw new UpstreamError(
        `Organization search by ${field} '${value}' failed: ${String(response.status)} ${response.statusText}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError(
        `Organization search returned invalid JSON: ${errorMessage(error)}`,
        response.status
      );
    }

    if (!Value.Check(OrganizationSearchResponseSchema, body)) {
      throw new UpstreamError(
        `Unexpected organization search response for ${field} '${value}'`,
        response.status
      );
    }

    const profiles = body.data.items.map((item) => toProfile(item.properties));
    apiLogger.debug(
      { field, value, hits: profiles.length },
      "Organization search completed"
    );
    return profiles;
  }
}
