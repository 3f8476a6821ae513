/**
 * Structured logging built on pino.
 *
 * Configuration:
 *   LEDGER_SYNC_LOG_LEVEL  – minimum level (default: "info", dev: "debug", tests: "silent")
 *   LEDGER_SYNC_LOG_PRETTY – force pretty output on/off (auto in development)
 *
 * Usage:
 *   import { log } from "./logger.js";
 *   log.pipeline.info({ runId }, "run started");
 *   log.upsert.error({ err }, "insert phase failed");
 */
import pino from "pino";
import type { Logger } from "pino";

const IS_TEST =
  process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const IS_DEV = process.env.NODE_ENV !== "production" && !IS_TEST;

function resolveLevel(): string {
  if (process.env.LEDGER_SYNC_LOG_LEVEL) {
    return process.env.LEDGER_SYNC_LOG_LEVEL;
  }
  if (IS_TEST) return "silent";
  if (IS_DEV) return "debug";
  return "info";
}

function resolveTransport(): pino.TransportSingleOptions | undefined {
  if (IS_TEST) return undefined;

  const wantPretty =
    process.env.LEDGER_SYNC_LOG_PRETTY === "true" ||
    (process.env.LEDGER_SYNC_LOG_PRETTY !== "false" && IS_DEV);

  if (!wantPretty) return undefined;
  return {
    target: "pino-pretty",
    options: {
      colorize: true,
      translateTime: "HH:MM:ss.l",
      ignore: "pid,hostname",
    },
  };
}

const transport = resolveTransport();

export const rootLogger: Logger = pino({
  level: resolveLevel(),
  ...(transport ? { transport } : {}),
  base: { service: "ledger-sync" },
  timestamp: pino.stdTimeFunctions.isoTime,
  redact: {
    paths: [
      "password",
      "*.password",
      "secretAccessKey",
      "*.secretAccessKey",
      "connectionString",
      "*.connectionString",
    ],
    censor: "[REDACTED]",
  },
});

// ---------------------------------------------------------------------------
// Subsystem child loggers
// ---------------------------------------------------------------------------

export const log = {
  /** Run orchestration and step transitions */
  pipeline: rootLogger.child({ subsystem: "pipeline" }),
  validator: rootLogger.child({ subsystem: "validator" }),
  coercer: rootLogger.child({ subsystem: "coercer" }),
  upsert: rootLogger.child({ subsystem: "upsert" }),
  /** Database backends and schema bootstrap */
  db: rootLogger.child({ subsystem: "db" }),
  storage: rootLogger.child({ subsystem: "storage" }),
  reporting: rootLogger.child({ subsystem: "reporting" }),
  cli: rootLogger.child({ subsystem: "cli" }),
  root: rootLogger,
};

export type { Logger };
