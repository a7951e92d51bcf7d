import { setTimeout as sleep } from "node:timers/promises";

import { apiLogger } from "../logger.js";

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface RateLimitedHttpOptions {
  /** Minimum gap between two requests, in milliseconds */
  minIntervalMs: number;
  /** Replaced in tests */
  fetch?: FetchFn;
}

const SECRET_PARAMS = ["user_key", "api_key", "password"];

/**
 * Copy of the URL with credential query parameters masked, for logging
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const name of SECRET_PARAMS) {
      if (parsed.searchParams.has(name)) {
        parsed.searchParams.set(name, "****");
      }
    }
    return parsed.toString();
  } catch {
    return url;
  }
}

/**
 * fetch() wrapper that spaces requests out and logs every round trip.
 * One instance per upstream, so each API keeps its own request interval.
 */
export class RateLimitedHttp {
  private lastRequestTime = 0;
  private readonly fetchFn: FetchFn;

  constructor(
    private readonly upstream: string,
    private readonly options: RateLimitedHttpOptions
  ) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async fetch(url: string, init?: RequestInit): Promise<Response> {
    const elapsed = Date.now() - this.lastRequestTime;

    if (elapsed < this.options.minIntervalMs) {
      const waitTime = this.options.minIntervalMs - elapsed;
      apiLogger.debug(
        { upstream: this.upstream, waitTime },
        "Rate limiting: waiting before request"
      );
      await sleep(waitTime);
    }

    this.lastRequestTime = Date.now();

    const method = init?.method ?? "GET";
    const safeUrl = redactUrl(url);
    apiLogger.debug(
      { upstream: this.upstream, method, url: safeUrl },
      "Sending request"
    );

    const startTime = performance.now();
    const response = await this.fetchFn(url, init);
    const duration = Math.round(performance.now() - startTime);

    apiLogger.debug(
      {
        upstream: this.upstream,
        method,
        url: safeUrl,
        status: response.status,
        statusText: response.statusText,
        duration: `${String(duration)}ms`,
      },
      "Received response"
    );

    return response;
  }
}
