import type { Kysely } from "kysely";

/**
 * Entity tables plus sync bookkeeping.
 *
 * Written with the schema builder rather than raw SQL so the same migration
 * runs on PostgreSQL and on SQLite.
 */
export async function up(db: Kysely<unknown>): Promise<void> {
  await db.schema
    .createTable("contacts")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("email", "varchar", (col) => col.notNull().unique())
    .addColumn("address_1", "varchar")
    .addColumn("address_2", "varchar")
    .addColumn("city", "varchar")
    .addColumn("name", "varchar")
    .addColumn("phone", "varchar")
    .addColumn("postcode", "varchar")
    .addColumn("state", "varchar")
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("addons")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("key", "varchar", (col) => col.notNull().unique())
    .addColumn("name", "varchar", (col) => col.notNull().unique())
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    // Target of the licenses (addon_id, addon_key) composite foreign key
    .addUniqueConstraint("addons_id_key_unique", ["id", "key"])
    .execute();

  await db.schema
    .createTable("organizations")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("name", "varchar", (col) => col.notNull())
    .addColumn("primary_role", "varchar")
    .addColumn("short_description", "varchar")
    .addColumn("domain", "varchar", (col) => col.notNull().unique())
    .addColumn("homepage_url", "varchar")
    .addColumn("facebook_url", "varchar")
    .addColumn("twitter_url", "varchar")
    .addColumn("linkedin_url", "varchar")
    .addColumn("api_url", "varchar")
    .addColumn("city", "varchar")
    .addColumn("region", "varchar")
    .addColumn("country", "varchar")
    .addColumn("stock_exchange", "varchar")
    .addColumn("stock_symbol", "varchar")
    .addColumn("created_at", "integer")
    .addColumn("updated_at", "integer")
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("partner_details")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("name", "varchar", (col) => col.notNull())
    .addColumn("type", "varchar", (col) => col.notNull())
    .addColumn("bill_contact_name", "varchar")
    .addColumn("bill_contact_email", "varchar")
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    .addUniqueConstraint("partner_details_name_type_unique", ["name", "type"])
    .execute();

  await db.schema
    .createTable("license_contact_details")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("company", "varchar", (col) => col.notNull())
    .addColumn("country", "varchar", (col) => col.notNull())
    .addColumn("region", "varchar", (col) => col.notNull())
    .addColumn("bill_contact_id", "uuid", (col) =>
      col.references("contacts.id").onUpdate("cascade").onDelete("cascade")
    )
    .addColumn("tech_contact_id", "uuid", (col) =>
      col
        .notNull()
        .references("contacts.id")
        .onUpdate("cascade")
        .onDelete("cascade")
    )
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    .addUniqueConstraint("license_contact_details_natural_key", [
      "company",
      "country",
      "region",
    ])
    .execute();

  await db.schema
    .createTable("licenses")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("license_id", "varchar", (col) => col.notNull().unique())
    .addColumn("addon_id", "uuid", (col) => col.notNull())
    .addColumn("addon_key", "varchar", (col) => col.notNull())
    .addColumn("license_contact_details_id", "uuid", (col) =>
      col
        .references("license_contact_details.id")
        .onUpdate("cascade")
        .onDelete("cascade")
    )
    .addColumn("partner_details_id", "uuid", (col) =>
      col
        .references("partner_details.id")
        .onUpdate("cascade")
        .onDelete("cascade")
    )
    .addColumn("organization_id", "uuid", (col) =>
      col.references("organizations.id").onUpdate("cascade").onDelete("set null")
    )
    .addColumn("hosting", "varchar", (col) => col.notNull())
    .addColumn("host_license_id", "varchar")
    .addColumn("last_updated", "date", (col) => col.notNull())
    .addColumn("license_type", "varchar", (col) => col.notNull())
    .addColumn("maintenance_start_date", "date", (col) => col.notNull())
    .addColumn("maintenance_end_date", "date", (col) => col.notNull())
    .addColumn("status", "varchar", (col) => col.notNull())
    .addColumn("tier", "varchar", (col) => col.notNull())
    .addColumn("synced_at", "timestamptz", (col) => col.notNull())
    // addon_id and addon_key always name the same addon
    .addForeignKeyConstraint(
      "licenses_addon_fk",
      ["addon_id", "addon_key"],
      "addons",
      ["id", "key"],
      (cb) => cb.onUpdate("cascade").onDelete("cascade")
    )
    .execute();

  await db.schema
    .createIndex("licenses_organization_id_idx")
    .on("licenses")
    .column("organization_id")
    .execute();

  await db.schema
    .createTable("sync_watermarks")
    .addColumn("stream", "varchar", (col) => col.primaryKey())
    .addColumn("next_run_at", "timestamptz", (col) => col.notNull())
    .addColumn("modified_since", "date", (col) => col.notNull())
    .addColumn("updated_at", "timestamptz", (col) => col.notNull())
    .execute();

  await db.schema
    .createTable("sync_runs")
    .addColumn("id", "uuid", (col) => col.primaryKey())
    .addColumn("scheduled_for", "timestamptz", (col) => col.notNull())
    .addColumn("modified_since", "date", (col) => col.notNull())
    .addColumn("status", "varchar", (col) => col.notNull())
    .addColumn("started_at", "timestamptz", (col) => col.notNull())
    .addColumn("finished_at", "timestamptz")
    .addColumn("licenses_exported", "integer")
    .addColumn("records_loaded", "integer")
    .addColumn("records_failed", "integer")
    .addColumn("organizations_linked", "integer")
    .addColumn("error_message", "text")
    .execute();

  await db.schema
    .createIndex("sync_runs_started_at_idx")
    .on("sync_runs")
    .column("started_at")
    .execute();
}

export async function down(db: Kysely<unknown>): Promise<void> {
  await db.schema.dropTable("sync_runs").ifExists().execute();
  await db.schema.dropTable("sync_watermarks").ifExists().execute();
  await db.schema.dropTable("licenses").ifExists().execute();
  await db.schema.dropTable("license_contact_details").ifExists().execute();
  await db.schema.dropTable("partner_details").ifExists().execute();
  await db.schema.dropTable("organizations").ifExists().execute();
  await db.schema.dropTable("addons").ifExists().execute();
  await db.schema.dropTable("contacts").ifExists().execute();
}
