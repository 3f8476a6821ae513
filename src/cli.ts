#!/usr/bin/env node
/**
 * CLI entrypoint for ledger-sync.
 *
 * Usage:
 *   ledger-sync run --config ledger-sync.json
 *   ledger-sync run --storage-path ./data --db-path ./ledger.db --entity transaction
 *   ledger-sync stats --db-path ./ledger.db
 *   ledger-sync clean --db-path ./ledger.db
 */
import { runCli } from "./commands.js";

process.exit(await runCli(process.argv.slice(2)));
