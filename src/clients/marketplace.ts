import { UpstreamError, errorMessage } from "../errors.js";
import { apiLogger } from "../logger.js";
import { RateLimitedHttp, type FetchFn } from "./http.js";

import type { LicenseSource } from "../types/index.js";

export interface MarketplaceClientOptions {
  baseUrl: string;
  vendorId: string;
  user: string;
  password: string;
  fetch?: FetchFn;
}

/**
 * Vendor marketplace "export licenses" endpoint
 */
export class MarketplaceClient implements LicenseSource {
  private readonly http: RateLimitedHttp;

  constructor(private readonly options: MarketplaceClientOptions) {
    this.http = new RateLimitedHttp("marketplace", {
      minIntervalMs: 0,
      fetch: options.fetch,
    });
  }

  exportUrl(modifiedSince: string): string {
    const base = this.options.baseUrl.replace(/\/+$/, "");
    const vendor = encodeURIComponent(this.options.vendorId);
    const query = new URLSearchParams({ lastUpdated: modifiedSince });
    return `${base}/rest/2/vendors/${vendor}/reporting/licenses/export?${query.toString()}`;
  }

  /**
   * Fetch every license record changed on or after `modifiedSince`
   * (YYYY-MM-DD). The records are returned unvalidated; the load stage
   * checks them one by one.
   */
  async exportLicenses(modifiedSince: string): Promise<unknown[]> {
    const url = this.exportUrl(modifiedSince);
    const credentials = Buffer.from(
      `${this.options.user}:${this.options.password}`
    ).toString("base64");

    apiLogger.info({ modifiedSince }, "Exporting licenses from marketplace");

    let response: Response;
    try {
      response = await this.http.fetch(url, {
        headers: {
          Authorization: `Basic ${credentials}`,
          Accept: "application/json",
        },
      });
    } catch (error) {
      throw new UpstreamError(
        `Marketplace request failed: ${errorMessage(error)}`
      );
    }

    if (!response.ok) {
      apiLogger.error(
        { status: response.status, statusText: response.statusText },
        "Failed to export licenses"
      );
      throw new UpstreamError(
        `Failed to export licenses: ${String(response.status)} ${response.statusText}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new UpstreamError(
        `Marketplace returned invalid JSON: ${errorMessage(error)}`,
        response.status
      );
    }

    if (!Array.isArray(body)) {
      throw new UpstreamError(
        "Marketplace export response is not a JSON array",
        response.status
      );
    }

    apiLogger.debug(
      { licenseCount: body.length, modifiedSince },
      "Successfully exported licenses"
    );

    return body;
  }
}
