#!/usr/bin/env node

/**
 * License Sync CLI
 *
 * Incremental sync of marketplace licenses and organization profiles.
 */

import { Command } from "commander";

import { registerDbCommand } from "./commands/db.js";
import { registerSyncCommand } from "./commands/sync.js";

const program = new Command();

program
  .name("license-sync")
  .description("Marketplace license and organization sync CLI")
  .version("0.1.0");

registerDbCommand(program);
registerSyncCommand(program);

program.action(() => {
  // Show help by default
  program.outputHelp();
});

await program.parseAsync();
