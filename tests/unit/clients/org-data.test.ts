import { describe, expect, it, vi } from "vitest";

import { redactUrl } from "../../../src/clients/http.js";
import { OrgDataClient } from "../../../src/clients/org-data.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status });
}

function client(response: Response) {
  const fetch = vi.fn((_input: string, _init?: RequestInit) =>
    Promise.resolve(response)
  );
  return {
    fetch,
    client: new OrgDataClient({
      baseUrl: "https://api.example.test",
      apiKey: "test-secret",
      rateLimitMs: 0,
      fetch,
    }),
  };
}

describe("OrgDataClient", () => {
  it("should search by domain and map the properties", async () => {
    const { client: c, fetch } = client(
      jsonResponse({
        data: {
          items: [
            {
              properties: {
                name: "Acme",
                domain: "acme.com/",
                city_name: "Springfield",
                region_name: "Oregon",
                country_code: "USA",
                created_at: 1_500_000_000,
              },
            },
          ],
        },
      })
    );

    const profiles = await c.searchByDomain("acme.com");

    expect(fetch.mock.calls[0]?.[0]).toBe(
      "https://api.example.test/odm-organizations?user_key=test-secret&domain_name=acme.com"
    );
    expect(profiles).toEqual([
      {
        name: "Acme",
        primaryRole: null,
        shortDescription: null,
        domain: "acme.com/",
        homepageUrl: null,
        facebookUrl: null,
        twitterUrl: null,
        linkedinUrl: null,
        apiUrl: null,
        city: "Springfield",
        region: "Oregon",
        country: "USA",
        stockExchange: null,
        stockSymbol: null,
        createdAt: 1_500_000_000,
        updatedAt: null,
      },
    ]);
  });

  it("should search by name", async () => {
    const { client: c, fetch } = client(jsonResponse({ data: { items: [] } }));

    await expect(c.searchByName("Acme Corp")).resolves.toEqual([]);
    expect(fetch.mock.calls[0]?.[0]).toBe(
      "https://api.example.test/odm-organizations?user_key=test-secret&name=Acme+Corp"
    );
  });

  it("should reject a response of the wrong shape", async () => {
    const { client: c } = client(jsonResponse({ items: [] }));

    await expect(c.searchByDomain("acme.com")).rejects.toThrow(
      "Unexpected organization search response for domain_name 'acme.com'"
    );
  });

  it("should reject a non-2xx status", async () => {
    const { client: c } = client(
      new Response("", { status: 429, statusText: "Too Many Requests" })
    );

    await expect(c.searchByName("Acme")).rejects.toMatchObject({
      status: 429,
      message: "Organization search by name 'Acme' failed: 429 Too Many Requests",
    });
  });
});

describe("redactUrl", () => {
  it("should mask credential parameters", () => {
    expect(
      redactUrl("https://api.example.test/odm-organizations?user_key=test-secret&name=Acme")
    ).toBe("https://api.example.test/odm-organizations?user_key=****&name=Acme");
  });

  it("should return an unparseable URL unchanged", () => {
    expect(redactUrl("not a url")).toBe("not a url");
  });
});
