/**
 * Command dispatch for the ledger-sync CLI. Returns the process exit code.
 */
import { parseArgs } from "node:util";
import { loadConfigFile, parseConfig, type Config } from "./config.js";
import { LedgerSync } from "./index.js";
import { log } from "./logger.js";

export const USAGE = `
ledger-sync: load account and transaction CSVs into a relational store

Usage:
  ledger-sync run      [options]   validate, coerce and upsert every entity type
  ledger-sync init-db  [options]   create the target tables
  ledger-sync stats    [options]   print table statistics
  ledger-sync clean    [options]   delete every row from the entity tables

Options:
  --config <file>        JSON configuration file
  --storage-path <dir>   Disk storage directory  (default: ./data)
  --db-path <file>       SQLite database         (default: ./ledger-sync.db)
  --entity <name>        Run only this entity type (repeatable)
  --no-stats             Skip post-load statistics
  --help                 Show this help
`.trim();

const COMMANDS = ["run", "init-db", "stats", "clean"] as const;
type Command = (typeof COMMANDS)[number];

function isCommand(value: string | undefined): value is Command {
  return COMMANDS.some((c) => c === value);
}

function parseCliArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: {
      config: { type: "string" },
      "storage-path": { type: "string" },
      "db-path": { type: "string" },
      entity: { type: "string", multiple: true },
      "no-stats": { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
    allowPositionals: true,
    strict: true,
  });
}

type CliValues = ReturnType<typeof parseCliArgs>["values"];

async function resolveConfig(values: CliValues): Promise<Config> {
  const base = values.config
    ? await loadConfigFile(values.config)
    : parseConfig({
        storage: { provider: "disk", basePath: values["storage-path"] ?? "./data" },
        db: { provider: "sqlite", path: values["db-path"] ?? "./ledger-sync.db" },
      });
  if (values["no-stats"]) base.reporting.enabled = false;
  return base;
}

async function dispatch(ctx: LedgerSync, command: Command, values: CliValues): Promise<number> {
  switch (command) {
    case "init-db":
      console.log("Tables ready.");
      return 0;

    case "stats":
      for (const stats of await ctx.statistics()) {
        console.log(`${stats.entityName}: ${stats.totalRecords} rows`);
        for (const [name, value] of Object.entries(stats.aggregates)) {
          console.log(`  ${name}: ${value ?? "-"}`);
        }
      }
      return 0;

    case "clean":
      for (const [entity, rows] of Object.entries(await ctx.clean())) {
        console.log(`  ${entity}: ${rows} rows deleted`);
      }
      return 0;

    case "run": {
      const result = await ctx.runPipeline({ only: values.entity });
      for (const step of result.steps) {
        const status = step.success ? "ok" : step.state;
        console.log(`  ${step.entityName}: ${status} (${step.rowsLoaded} rows)`);
        if (step.errorMessage) console.log(`    ${step.errorMessage}`);
      }
      if (result.success) {
        console.log(`Run ${result.runId} succeeded.`);
        return 0;
      }
      console.error(`Run ${result.runId} failed: ${result.errorMessage}`);
      return 1;
    }
  }
}

export async function runCli(argv: string[]): Promise<number> {
  let parsed: ReturnType<typeof parseCliArgs>;
  try {
    parsed = parseCliArgs(argv);
  } catch (err) {
    console.error(`${String(err)}\n\n${USAGE}`);
    return 1;
  }
  const { values, positionals } = parsed;
  const command = positionals[0];

  if (values.help) {
    console.log(USAGE);
    return 0;
  }
  if (!isCommand(command)) {
    console.error(USAGE);
    return 1;
  }

  let ctx: LedgerSync | null = null;
  try {
    ctx = await LedgerSync.fromConfig(await resolveConfig(values));
    return await dispatch(ctx, command, values);
  } catch (err) {
    log.cli.error({ err, command }, "command failed");
    console.error(String(err));
    return 1;
  } finally {
    await ctx?.close();
  }
}
