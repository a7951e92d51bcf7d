/**
 * Display utilities for CLI output formatting
 */

import chalk from "chalk";
import CliTable3 from "cli-table3";

import type { MigrationState, TableStat } from "../../db/migrate.js";
import type { SyncRun } from "../../db/types.js";
import type { LoadReport } from "../../services/persistence/license-loader.js";
import type { EnrichmentReport } from "../../services/persistence/organizations.js";
import type { WatermarkState } from "../../services/sync/watermark.js";

/**
 * Display row counts per table
 */
export function displayTableStats(stats: TableStat[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Table"), chalk.cyan("Rows")],
    colWidths: [28, 12],
  });

  for (const row of stats) {
    table.push([row.table_name, String(row.row_count)]);
  }

  console.log(table.toString());
}

export function displayMigrationStatus(migrations: MigrationState[]): void {
  const table = new CliTable3({
    head: [chalk.cyan("Migration"), chalk.cyan("Executed")],
    colWidths: [32, 28],
  });

  for (const m of migrations) {
    table.push([
      m.name,
      m.executedAt !== undefined
        ? m.executedAt.toISOString()
        : chalk.yellow("pending"),
    ]);
  }

  console.log(table.toString());
}

export function displayWatermark(state: WatermarkState | null): void {
  console.log(chalk.bold("\nWatermark:"));
  if (state === null) {
    console.log(chalk.gray("  No watermark stored (run 'sync run' first)"));
    return;
  }
  console.log(`  Next run at:    ${chalk.green(state.nextRunAt.toISOString())}`);
  console.log(`  Modified since: ${chalk.green(state.modifiedSince)}`);
}

function runStatus(status: SyncRun["status"]): string {
  switch (status) {
    case "COMPLETED":
      return chalk.green(status);
    case "FAILED":
      return chalk.red(status);
    case "RUNNING":
      return chalk.yellow(status);
  }
}

/**
 * Display recent sync runs, newest first
 */
export function displayRuns(runs: SyncRun[]): void {
  console.log(chalk.bold("\nRecent runs:"));
  if (runs.length === 0) {
    console.log(chalk.gray("  No runs recorded"));
    return;
  }

  const table = new CliTable3({
    head: [
      chalk.cyan("Scheduled for"),
      chalk.cyan("Since"),
      chalk.cyan("Status"),
      chalk.cyan("Exported"),
      chalk.cyan("Loaded"),
      chalk.cyan("Failed"),
      chalk.cyan("Linked"),
      chalk.cyan("Error"),
    ],
    colWidths: [26, 12, 11, 10, 8, 8, 8, 40],
    wordWrap: true,
  });

  const count = (n: number | null): string => (n !== null ? String(n) : "-");

  for (const run of runs) {
    table.push([
      run.scheduled_for,
      run.modified_since,
      runStatus(run.status),
      count(run.licenses_exported),
      count(run.records_loaded),
      count(run.records_failed),
      count(run.organizations_linked),
      run.error_message ?? "",
    ]);
  }

  console.log(table.toString());
}

/**
 * Display entity counts and record failures of a load
 */
export function displayLoadReport(report: LoadReport): void {
  console.log(
    chalk.bold(
      `\nLoaded ${String(report.loaded)}/${String(report.total)} license records`
    )
  );

  const table = new CliTable3({
    head: [chalk.cyan("Entity"), chalk.cyan("Inserted"), chalk.cyan("Updated")],
    colWidths: [26, 10, 10],
  });

  for (const [entity, counts] of Object.entries(report.counts)) {
    table.push([entity, String(counts.inserted), String(counts.updated)]);
  }

  console.log(table.toString());

  if (report.failures.length > 0) {
    console.log(chalk.yellow(`\n${String(report.failures.length)} record(s) skipped:`));
    for (const failure of report.failures.slice(0, 20)) {
      console.log(
        `  #${String(failure.index)} ${failure.licenseId ?? chalk.gray("(no id)")}: ${failure.reason}`
      );
    }
    if (report.failures.length > 20) {
      const remaining = report.failures.length - 20;
      console.log(chalk.gray(`  ... and ${String(remaining)} more`));
    }
  }
}

export function displayEnrichmentReport(report: EnrichmentReport | null): void {
  if (report === null) {
    console.log(chalk.gray("\nOrganization enrichment disabled"));
    return;
  }

  console.log(chalk.bold("\nOrganization enrichment:"));
  console.log(`  Domains queried:  ${String(report.domainsQueried)}`);
  console.log(`  Repeat domains:   ${String(report.repeatDomains)}`);
  console.log(`  Bad emails:       ${String(report.badEmails)}`);
  console.log(`  ISP skips:        ${String(report.ispSkips)}`);
  console.log(
    `  Domain hits/miss: ${String(report.domainHits)}/${String(report.domainMisses)}`
  );
  console.log(
    `  Name hits/miss:   ${String(report.nameHits)}/${String(report.nameMisses)}`
  );
  console.log(`  Unmatched:        ${String(report.unmatched)}`);
  console.log(
    `  Organizations:    ${String(report.organizationsInserted)} new, ${String(report.organizationsUpdated)} updated`
  );
  console.log(`  Licenses linked:  ${String(report.licensesLinked)}`);

  for (const failure of report.failures) {
    console.log(chalk.yellow(`  ! ${failure.domain}: ${failure.reason}`));
  }
}

/**
 * Print error message
 */
export function printError(message: string): void {
  console.error(chalk.red("Error:"), message);
}

/**
 * Print success message
 */
export function printSuccess(message: string): void {
  console.log(chalk.green("Success:"), message);
}

/**
 * Print warning message
 */
export function printWarning(message: string): void {
  console.log(chalk.yellow("Warning:"), message);
}
