import { describe, expect, it, vi } from "vitest";

import { MarketplaceClient } from "../../../src/clients/marketplace.js";
import { UpstreamError } from "../../../src/errors.js";

function client(response: Response | Error) {
  const fetch = vi.fn((_input: string, _init?: RequestInit) =>
    response instanceof Error ? Promise.reject(response) : Promise.resolve(response)
  );
  return {
    fetch,
    client: new MarketplaceClient({
      baseUrl: "https://marketplace.example.test/",
      vendorId: "1234",
      user: "vendor@example.test",
      password: "test-secret",
      fetch,
    }),
  };
}

describe("MarketplaceClient", () => {
  it("should build the export URL", () => {
    const { client: c } = client(new Response("[]"));

    expect(c.exportUrl("2024-03-10")).toBe(
      "https://marketplace.example.test/rest/2/vendors/1234/reporting/licenses/export?lastUpdated=2024-03-10"
    );
  });

  it("should send basic credentials and return the records", async () => {
    const records = [{ licenseId: "L-1" }, { licenseId: "L-2" }];
    const { client: c, fetch } = client(
      new Response(JSON.stringify(records), { status: 200 })
    );

    await expect(c.exportLicenses("2024-03-10")).resolves.toEqual(records);

    const call = fetch.mock.calls[0];
    expect(call?.[0]).toBe(
      "https://marketplace.example.test/rest/2/vendors/1234/reporting/licenses/export?lastUpdated=2024-03-10"
    );
    expect(call?.[1]?.headers).toEqual({
      Authorization: `Basic ${Buffer.from("vendor@example.test:test-secret").toString("base64")}`,
      Accept: "application/json",
    });
  });

  it("should raise an UpstreamError for a non-2xx status", async () => {
    const { client: c } = client(
      new Response("unavailable", { status: 503, statusText: "Service Unavailable" })
    );

    const error = await c.exportLicenses("2024-03-10").catch((e: unknown) => e);
    expect(error).toBeInstanceOf(UpstreamError);
    expect(error).toMatchObject({
      status: 503,
      message: "Failed to export licenses: 503 Service Unavailable",
    });
  });

  it("should raise an UpstreamError when the body is not an array", async () => {
    const { client: c } = client(new Response('{"licenses":[]}', { status: 200 }));

    await expect(c.exportLicenses("2024-03-10")).rejects.toThrow(
      "Marketplace export response is not a JSON array"
    );
  });

  it("should raise an UpstreamError when the request fails", async () => {
    const { client: c } = client(new Error("connect ECONNREFUSED"));

    await expect(c.exportLicenses("2024-03-10")).rejects.toThrow(
      "Marketplace request failed: connect ECONNREFUSED"
    );
  });
});
