import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { UpstreamError } from "../../../../src/errors.js";
import { LicenseGraphLoader } from "../../../../src/services/persistence/license-loader.js";
import { OrganizationLoader } from "../../../../src/services/persistence/organizations.js";
import { createTestDb, makeLicenseRecord } from "../../../helpers/sqlite.js";

import type { Database } from "../../../../src/db/types.js";
import type {
  OrganizationProfile,
  OrganizationSource,
} from "../../../../src/types/index.js";
import type { Kysely } from "kysely";

const NOW = new Date("2024-03-10T23:45:00Z");

function profile(name: string, domain: string | null): OrganizationProfile {
  return {
    name,
    primaryRole: "company",
    shortDescription: null,
    domain,
    homepageUrl: domain !== null ? `https://${domain}` : null,
    facebookUrl: null,
    twitterUrl: null,
    linkedinUrl: null,
    apiUrl: null,
    city: "Springfield",
    region: null,
    country: "USA",
    stockExchange: null,
    stockSymbol: null,
    createdAt: 1_500_000_000,
    updatedAt: 1_600_000_000,
  };
}

function fakeSource(
  byDomain: Record<string, OrganizationProfile[]>,
  byName: Record<string, OrganizationProfile[]> = {}
) {
  return {
    searchByDomain: vi.fn((domain: string) =>
      Promise.resolve(byDomain[domain] ?? [])
    ),
    searchByName: vi.fn((name: string) => Promise.resolve(byName[name] ?? [])),
  } satisfies OrganizationSource;
}

function contacts(company: string, email: string) {
  return {
    contactDetails: {
      company,
      country: "United States",
      region: "Americas",
      technicalContact: { email },
    },
  };
}

describe("OrganizationLoader", () => {
  let db: Kysely<Database>;

  beforeEach(async () => {
    db = await createTestDb();
  });

  afterEach(async () => {
    await db.destroy();
  });

  async function loadLicenses(
    records: ReturnType<typeof makeLicenseRecord>[]
  ) {
    const report = await new LicenseGraphLoader(db, () => NOW).load(records);
    return report.licenses;
  }

  it("should link every license of a domain to the matched organization", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme Corp", "ops@acme.com")),
      makeLicenseRecord("L-2", contacts("Acme Corp", "dev@Acme.com")),
    ]);
    const source = fakeSource({ "acme.com": [profile("Acme", "acme.com/")] });

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(source.searchByDomain).toHaveBeenCalledTimes(1);
    expect(source.searchByDomain).toHaveBeenCalledWith("acme.com");
    expect(source.searchByName).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      licensesExamined: 2,
      domainsQueried: 1,
      repeatDomains: 1,
      domainHits: 1,
      organizationsInserted: 1,
      licensesLinked: 2,
      failures: [],
    });

    const org = await db
      .selectFrom("organizations")
      .select(["id", "name", "domain", "city"])
      .executeTakeFirstOrThrow();
    expect(org).toMatchObject({ name: "Acme", domain: "acme.com", city: "Springfield" });

    const linked = await db
      .selectFrom("licenses")
      .select("organization_id")
      .execute();
    expect(linked).toEqual([
      { organization_id: org.id },
      { organization_id: org.id },
    ]);
  });

  it("should fall back to a name search when the domain has no hits", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Globex Corporation", "it@globex-mail.com")),
    ]);
    const source = fakeSource(
      {},
      { "Globex Corporation": [profile("Globex Corporation", "globex.com")] }
    );

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(source.searchByName).toHaveBeenCalledWith("Globex Corporation");
    expect(report).toMatchObject({
      domainMisses: 1,
      nameHits: 1,
      organizationsInserted: 1,
      licensesLinked: 1,
    });
  });

  it("should skip free-mail domains and bad email addresses", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme Corp", "someone@gmail.com")),
      makeLicenseRecord("L-2", contacts("Initech", "nobody@localhost")),
    ]);
    const source = fakeSource({});

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(source.searchByDomain).not.toHaveBeenCalled();
    expect(report).toMatchObject({
      domainsQueried: 0,
      ispSkips: 1,
      badEmails: 1,
      licensesLinked: 0,
    });
  });

  it("should leave licenses unlinked when several candidates match", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme", "ops@acme.com")),
    ]);
    const source = fakeSource({
      "acme.com": [profile("Acme Labs", "acmelabs.com"), profile("Acme Systems", "acmesys.com")],
    });

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(report.unmatched).toBe(1);
    expect(report.organizationsInserted).toBe(0);
    const license = await db
      .selectFrom("licenses")
      .select("organization_id")
      .executeTakeFirstOrThrow();
    expect(license.organization_id).toBeNull();
  });

  it("should not store a profile without a domain", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme Corp", "ops@acme.com")),
    ]);
    const source = fakeSource({ "acme.com": [profile("Acme", null)] });

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(report.unmatched).toBe(1);
    expect(report.organizationsInserted).toBe(0);
  });

  it("should record an upstream failure and continue with the next domain", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme Corp", "ops@acme.com")),
      makeLicenseRecord("L-2", contacts("Initech", "it@initech.com")),
    ]);
    const source = fakeSource({ "initech.com": [profile("Initech", "initech.com")] });
    source.searchByDomain.mockImplementationOnce(() =>
      Promise.reject(new UpstreamError("Organization API returned 503", 503))
    );

    const report = await new OrganizationLoader(db, source, () => NOW).enrich(
      licenses
    );

    expect(report.failures).toEqual([
      { domain: "acme.com", reason: "Organization API returned 503" },
    ]);
    expect(report.organizationsInserted).toBe(1);
    expect(report.licensesLinked).toBe(1);
  });

  it("should update an organization that is already stored", async () => {
    const licenses = await loadLicenses([
      makeLicenseRecord("L-1", contacts("Acme Corp", "ops@acme.com")),
    ]);
    const source = fakeSource({ "acme.com": [profile("Acme", "acme.com")] });
    const loader = new OrganizationLoader(db, source, () => NOW);

    await loader.enrich(licenses);
    const second = await loader.enrich(licenses);

    expect(second.organizationsInserted).toBe(0);
    expect(second.organizationsUpdated).toBe(1);
    const rows = await db.selectFrom("organizations").select("id").execute();
    expect(rows).toHaveLength(1);
  });
});
