import {
  UpstreamError,
  errorMessage,
  isConstraintViolation,
} from "../../errors.js";
import { syncLogger } from "../../logger.js";
import {
  getDomainFromEmail,
  isIspDomain,
  pickMatch,
} from "./matching.js";
import { upsertOrganization } from "./upsert.js";

import type { Database } from "../../db/types.js";
import type {
  OrganizationProfile,
  OrganizationSource,
} from "../../types/index.js";
import type { LoadedLicense } from "./license-loader.js";
import type { Kysely } from "kysely";

const logger = syncLogger.child({ component: "organizations" });

// ============================================================================
// Types
// ============================================================================

export interface EnrichmentFailure {
  domain: string;
  reason: string;
}

export interface EnrichmentReport {
  licensesExamined: number;
  domainsQueried: number;
  repeatDomains: number;
  badEmails: number;
  ispSkips: number;
  domainHits: number;
  domainMisses: number;
  nameHits: number;
  nameMisses: number;
  unmatched: number;
  organizationsInserted: number;
  organizationsUpdated: number;
  licensesLinked: number;
  failures: EnrichmentFailure[];
}

interface DomainGroup {
  company: string | null;
  licenseIds: string[];
}

type StorableProfile = OrganizationProfile & { name: string; domain: string };

function isStorable(profile: OrganizationProfile): profile is StorableProfile {
  return (
    profile.name !== null &&
    profile.name.trim() !== "" &&
    profile.domain !== null &&
    profile.domain.trim() !== ""
  );
}

function emptyReport(licensesExamined: number): EnrichmentReport {
  return {
    licensesExamined,
    domainsQueried: 0,
    repeatDomains: 0,
    badEmails: 0,
    ispSkips: 0,
    domainHits: 0,
    domainMisses: 0,
    nameHits: 0,
    nameMisses: 0,
    unmatched: 0,
    organizationsInserted: 0,
    organizationsUpdated: 0,
    licensesLinked: 0,
    failures: [],
  };
}

// ============================================================================
// Loader
// ============================================================================

/**
 * Looks up the organization behind each licensed company, stores the best
 * matching profile and links it to the company's licenses.
 *
 * Each distinct contact domain is queried once: by domain first, by company
 * name when the domain yields nothing.
 */
export class OrganizationLoader {
  constructor(
    private readonly db: Kysely<Database>,
    private readonly source: OrganizationSource,
    private readonly now: () => Date = () => new Date()
  ) {}

  async enrich(licenses: readonly LoadedLicense[]): Promise<EnrichmentReport> {
    const report = emptyReport(licenses.length);
    const groups = this.groupByDomain(licenses, report);

    logger.info(
      { licenses: licenses.length, domains: groups.size },
      "Enriching licenses with organization data"
    );

    for (const [domain, group] of groups) {
      report.domainsQueried++;
      try {
        await this.enrichDomain(domain, group, report);
      } catch (error) {
        if (!(error instanceof UpstreamError) && !isConstraintViolation(error)) {
          throw error;
        }
        const failure = { domain, reason: errorMessage(error) };
        report.failures.push(failure);
        logger.warn(failure, "Organization lookup failed");
      }
    }

    logger.info(
      {
        domainsQueried: report.domainsQueried,
        organizationsInserted: report.organizationsInserted,
        organizationsUpdated: report.organizationsUpdated,
        licensesLinked: report.licensesLinked,
        failed: report.failures.length,
      },
      "Organization enrichment finished"
    );

    return report;
  }

  private groupByDomain(
    licenses: readonly LoadedLicense[],
    report: EnrichmentReport
  ): Map<string, DomainGroup> {
    const groups = new Map<string, DomainGroup>();

    for (const license of licenses) {
      const domain = getDomainFromEmail(license.techContactEmail);
      if (domain === null) {
        report.badEmails++;
        logger.warn(
          { licenseId: license.licenseId, email: license.techContactEmail },
          "Bad email address"
        );
        continue;
      }
      if (isIspDomain(domain)) {
        report.ispSkips++;
        continue;
      }

      const group = groups.get(domain);
      if (group !== undefined) {
        report.repeatDomains++;
        group.licenseIds.push(license.licenseId);
        group.company ??= license.company;
      } else {
        groups.set(domain, {
          company: license.company,
          licenseIds: [license.licenseId],
        });
      }
    }

    return groups;
  }

  private choose(
    profiles: OrganizationProfile[],
    company: string,
    domain: string
  ): OrganizationProfile | null {
    const index = pickMatch(
      company,
      domain,
      profiles.map((p) => p.name)
    );
    return index === null ? null : (profiles[index] ?? null);
  }

  private async enrichDomain(
    domain: string,
    group: DomainGroup,
    report: EnrichmentReport
  ): Promise<void> {
    const company = group.company ?? "";

    const byDomain = await this.source.searchByDomain(domain);
    let profile: OrganizationProfile | null;
    if (byDomain.length > 0) {
      report.domainHits++;
      profile = this.choose(byDomain, company, domain);
    } else {
      report.domainMisses++;
      profile = null;
      if (company.trim() !== "") {
        const byName = await this.source.searchByName(company);
        if (byName.length > 0) {
          report.nameHits++;
          profile = this.choose(byName, company, domain);
        } else {
          report.nameMisses++;
        }
      }
    }

    if (profile === null || !isStorable(profile)) {
      report.unmatched++;
      logger.debug({ domain, company }, "No organization picked");
      return;
    }

    const syncedAt = this.now().toISOString();
    const storable = profile;
    const { inserted, linked } = await this.db
      .transaction()
      .execute(async (trx) => {
        const stored = await upsertOrganization(trx, storable, syncedAt);
        const result = await trx
          .updateTable("licenses")
          .set({ organization_id: stored.id })
          .where("license_id", "in", group.licenseIds)
          .executeTakeFirst();
        return {
          inserted: stored.inserted,
          linked: Number(result.numUpdatedRows),
        };
      });

    if (inserted) {
      report.organizationsInserted++;
    } else {
      report.organizationsUpdated++;
    }
    report.licensesLinked += linked;
    logger.debug(
      { domain, organization: storable.name, linked },
      "Organization linked to licenses"
    );
  }
}
