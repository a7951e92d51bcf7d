/**
 * Organization API Routes
 */

import { Type, type Static } from "@sinclair/typebox";
import { sql } from "kysely";

import { NotFoundError } from "../plugins/error-handler.js";
import { NullableString, createResponseSchema } from "../schemas/common.js";

import type { Database } from "../../db/types.js";
import type { OrganizationDto } from "../../types/api.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

// ============================================================================
// Schemas
// ============================================================================

const OrganizationParamsSchema = Type.Object({
  domain: Type.String({ minLength: 1 }),
});

type OrganizationParams = Static<typeof OrganizationParamsSchema>;

const OrganizationSchema = Type.Object({
  id: Type.String(),
  name: Type.String(),
  domain: Type.String(),
  primaryRole: NullableString,
  shortDescription: NullableString,
  homepageUrl: NullableString,
  linkedinUrl: NullableString,
  city: NullableString,
  region: NullableString,
  country: NullableString,
  stockExchange: NullableString,
  stockSymbol: NullableString,
  licenseCount: Type.Number(),
  syncedAt: Type.String({ format: "date-time" }),
});

// ============================================================================
// Route Registration
// ============================================================================

export function registerOrganizationRoutes(
  app: FastifyInstance,
  db: Kysely<Database>
): void {
  // GET /organizations/:domain - Organization profile by domain
  app.get<{ Params: OrganizationParams }>(
    "/organizations/:domain",
    {
      schema: {
        summary: "Get organization by domain",
        description:
          "Returns the stored organization profile for a domain and the number of licenses linked to it",
        tags: ["Organizations"],
        params: OrganizationParamsSchema,
        response: {
          200: createResponseSchema(OrganizationSchema),
        },
      },
    },
    async (request) => {
      const domain = request.params.domain.toLowerCase().replace(/\/+$/, "");

      const org = await db
        .selectFrom("organizations")
        .selectAll()
        .where(sql<string>`lower(domain)`, "=", domain)
        .executeTakeFirst();

      if (!org) {
        throw new NotFoundError(`Organization for domain ${domain} not found`);
      }

      const count = await db
        .selectFrom("licenses")
        .select(sql<number>`count(*)`.as("count"))
        .where("organization_id", "=", org.id)
        .executeTakeFirst();

      const data: OrganizationDto = {
        id: org.id,
        name: org.name,
        domain: org.domain,
        primaryRole: org.primary_role,
        shortDescription: org.short_description,
        homepageUrl: org.homepage_url,
        linkedinUrl: org.linkedin_url,
        city: org.city,
        region: org.region,
        country: org.country,
        stockExchange: org.stock_exchange,
        stockSymbol: org.stock_symbol,
        licenseCount: Number(count?.count ?? 0),
        syncedAt: org.synced_at,
      };

      return { data };
    }
  );
}
