/**
 * License API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import {
  createPaginationMeta,
  parseLimit,
  validateCursor,
} from "../../utils/pagination.js";
import { InvalidCursorError, NotFoundError } from "../plugins/error-handler.js";
import {
  NullableString,
  PaginationMetaSchema,
  createResponseSchema,
} from "../schemas/common.js";

import type { Database } from "../../db/types.js";
import type {
  ContactDto,
  LicenseDetailDto,
  LicenseSummaryDto,
} from "../../types/api.js";
import type { FastifyInstance } from "fastify";
import type { Kysely } from "kysely";

// ============================================================================
// Schemas
// ============================================================================

const ListLicensesQuerySchema = Type.Object({
  status: Type.Optional(Type.String({ description: "Filter by license status" })),
  addonKey: Type.Optional(Type.String({ description: "Filter by addon key" })),
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 100, default: 50 })),
  cursor: Type.Optional(Type.String()),
});

type ListLicensesQuery = Static<typeof ListLicensesQuerySchema>;

const LicenseParamsSchema = Type.Object({
  licenseId: Type.String(),
});

type LicenseParams = Static<typeof LicenseParamsSchema>;

const LicenseSummarySchema = Type.Object({
  id: Type.String(),
  licenseId: Type.String(),
  addonKey: Type.String(),
  addonName: Type.String(),
  hosting: Type.String(),
  licenseType: Type.String(),
  status: Type.String(),
  tier: Type.String(),
  lastUpdated: Type.String({ format: "date" }),
  maintenanceStartDate: Type.String({ format: "date" }),
  maintenanceEndDate: Type.String({ format: "date" }),
  company: NullableString,
  organizationDomain: NullableString,
});

const ContactSchema = Type.Object({
  email: Type.String(),
  name: NullableString,
  phone: NullableString,
  city: NullableString,
  state: NullableString,
  postcode: NullableString,
});

const LicenseDetailSchema = Type.Composite([
  LicenseSummarySchema,
  Type.Object({
    hostLicenseId: NullableString,
    country: NullableString,
    region: NullableString,
    technicalContact: Type.Union([ContactSchema, Type.Null()]),
    billingContact: Type.Union([ContactSchema, Type.Null()]),
    partner: Type.Union([
      Type.Object({ name: Type.String(), type: Type.String() }),
      Type.Null(),
    ]),
    syncedAt: Type.String({ format: "date-time" }),
  }),
]);

const LicenseListResponseSchema = Type.Object({
  data: Type.Array(LicenseSummarySchema),
  meta: Type.Object({
    pagination: PaginationMetaSchema,
  }),
});

// ============================================================================
// Queries
// ============================================================================

function baseLicenseQuery(db: Kysely<Database>) {
  return db
    .selectFrom("licenses")
    .innerJoin("addons", "addons.id", "licenses.addon_id")
    .leftJoin(
      "license_contact_details as lcd",
      "lcd.id",
      "licenses.license_contact_details_id"
    )
    .leftJoin("organizations", "organizations.id", "licenses.organization_id")
    .select([
      "licenses.id",
      "licenses.license_id",
      "licenses.addon_key",
      "addons.name as addon_name",
      "licenses.hosting",
      "licenses.license_type",
      "licenses.status",
      "licenses.tier",
      "licenses.last_updated",
      "licenses.maintenance_start_date",
      "licenses.maintenance_end_date",
      "lcd.company",
      "organizations.domain as organization_domain",
    ]);
}

type LicenseSummaryRow = Awaited<
  ReturnType<ReturnType<typeof baseLicenseQuery>["executeTakeFirstOrThrow"]>
>;

function formatLicense(row: LicenseSummaryRow): LicenseSummaryDto {
  return {
    id: row.id,
    licenseId: row.license_id,
    addonKey: row.addon_key,
    addonName: row.addon_name,
    hosting: row.hosting,
    licenseType: row.license_type,
    status: row.status,
    tier: row.tier,
    lastUpdated: row.last_updated,
    maintenanceStartDate: row.maintenance_start_date,
    maintenanceEndDate: row.maintenance_end_date,
    company: row.company,
    organizationDomain: row.organization_domain,
  };
}

async function findContact(
  db: Kysely<Database>,
  id: string | null
): Promise<ContactDto | null> {
  if (id === null) {
    return null;
  }
  const contact = await db
    .selectFrom("contacts")
    .select(["email", "name", "phone", "city", "state", "postcode"])
    .where("id", "=", id)
    .executeTakeFirst();
  return contact ?? null;
}

// ============================================================================
// Route Registration
// ============================================================================

export function registerLicenseRoutes(
  app: FastifyInstance,
  db: Kysely<Database>
): void {
  // GET /licenses - Paginated license list ordered by license id
  app.get<{ Querystring: ListLicensesQuery }>(
    "/licenses",
    {
      schema: {
        summary: "List licenses",
        description:
          "Returns synced licenses ordered by license id, with optional status and addon filters",
        tags: ["Licenses"],
        querystring: ListLicensesQuerySchema,
        response: {
          200: LicenseListResponseSchema,
        },
      },
    },
    async (request) => {
      const { status, addonKey, limit: rawLimit, cursor } = request.query;

      const limit = parseLimit(rawLimit, 50, 100);
      const cursorPayload = validateCursor(cursor);
      if (cursor !== undefined && cursor !== "" && cursorPayload === null) {
        throw new InvalidCursorError(cursor);
      }

      let query = baseLicenseQuery(db)
        .orderBy("licenses.license_id", "asc")
        .limit(limit + 1);

      if (status !== undefined) {
        query = query.where("licenses.status", "=", status);
      }
      if (addonKey !== undefined) {
        query = query.where("licenses.addon_key", "=", addonKey);
      }
      if (cursorPayload) {
        query = query.where(
          "licenses.license_id",
          ">",
          String(cursorPayload.sortValue)
        );
      }

      const rows = await query.execute();
      const hasMore = rows.length > limit;
      const items = rows.slice(0, limit).map(formatLicense);

      return {
        data: items,
        meta: {
          pagination: createPaginationMeta(
            items,
            limit,
            (item) => item.licenseId,
            hasMore
          ),
        },
      };
    }
  );

  // GET /licenses/:licenseId - License with contacts and partner
  app.get<{ Params: LicenseParams }>(
    "/licenses/:licenseId",
    {
      schema: {
        summary: "Get license",
        description:
          "Returns one license with its addon, contact details, partner and linked organization",
        tags: ["Licenses"],
        params: LicenseParamsSchema,
        response: {
          200: createResponseSchema(LicenseDetailSchema),
        },
      },
    },
    async (request) => {
      const { licenseId } = request.params;

      const row = await baseLicenseQuery(db)
        .leftJoin(
          "partner_details",
          "partner_details.id",
          "licenses.partner_details_id"
        )
        .select([
          "licenses.host_license_id",
          "licenses.synced_at",
          "lcd.country",
          "lcd.region",
          "lcd.tech_contact_id",
          "lcd.bill_contact_id",
          "partner_details.name as partner_name",
          "partner_details.type as partner_type",
        ])
        .where("licenses.license_id", "=", licenseId)
        .executeTakeFirst();

      if (!row) {
        throw new NotFoundError(`License ${licenseId} not found`);
      }

      const data: LicenseDetailDto = {
        ...formatLicense(row),
        hostLicenseId: row.host_license_id,
        country: row.country,
        region: row.region,
        technicalContact: await findContact(db, row.tech_contact_id),
        billingContact: await findContact(db, row.bill_contact_id),
        partner:
          row.partner_name !== null && row.partner_type !== null
            ? { name: row.partner_name, type: row.partner_type }
            : null,
        syncedAt: row.synced_at,
      };

      return { data };
    }
  );
}
