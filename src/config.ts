/**
 * Configuration validation and backend factory.
 */
import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { DatabaseBackend } from "./db/backend.js";
import { PostgresBackend } from "./db/postgres.js";
import { SQLiteBackend } from "./db/sqlite.js";
import type { StorageBackend } from "./storage/backend.js";
import { DiskStorage } from "./storage/disk.js";
import { S3Storage } from "./storage/s3.js";

// ---------------------------------------------------------------------------
// Config schema
// ---------------------------------------------------------------------------

const DiskStorageConfigSchema = z.object({
  provider: z.literal("disk"),
  basePath: z.string().min(1).default("./data"),
});

const S3StorageConfigSchema = z.object({
  provider: z.literal("s3"),
  bucket: z.string().min(1),
  accessKeyId: z.string().min(1),
  secretAccessKey: z.string().min(1),
  endpoint: z.string().url().optional(),
  region: z.string().min(1).default("us-east-1"),
  prefix: z.string().optional(),
  forcePathStyle: z.boolean().default(true),
});

const StorageConfigSchema = z.discriminatedUnion("provider", [
  DiskStorageConfigSchema,
  S3StorageConfigSchema,
]);

const SqliteConfigSchema = z.object({
  provider: z.literal("sqlite"),
  path: z.string().min(1).default(":memory:"),
});

const PostgresConfigSchema = z.object({
  provider: z.literal("postgres"),
  connectionString: z.string().min(1),
});

const DbConfigSchema = z.discriminatedUnion("provider", [
  SqliteConfigSchema,
  PostgresConfigSchema,
]);

const EtlConfigSchema = z.object({
  tolerance: z.union([z.number().nonnegative(), z.string().regex(/^\d+(\.\d+)?$/)]).default(0.01),
  /** Entity name → storage key of its CSV file. */
  files: z
    .record(z.string().min(1))
    .default({ account: "accounts.csv", transaction: "transactions.csv" }),
});

export const ConfigSchema = z.object({
  storage: StorageConfigSchema.default({ provider: "disk" }),
  db: DbConfigSchema.default({ provider: "sqlite" }),
  etl: EtlConfigSchema.default({}),
  reporting: z.object({ enabled: z.boolean().default(true) }).default({}),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;
export type StorageConfig = z.infer<typeof StorageConfigSchema>;
export type DbConfig = z.infer<typeof DbConfigSchema>;

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

export function buildStorage(config: StorageConfig): StorageBackend {
  switch (config.provider) {
    case "disk":
      return new DiskStorage(config.basePath);
    case "s3":
      return new S3Storage(config);
  }
}

export function buildDb(config: DbConfig): DatabaseBackend {
  switch (config.provider) {
    case "sqlite":
      return new SQLiteBackend(config.path);
    case "postgres":
      return new PostgresBackend(config.connectionString);
  }
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

export function parseConfig(raw: unknown): Config {
  return ConfigSchema.parse(raw ?? {});
}

/** Read and validate a JSON config file. */
export async function loadConfigFile(path: string): Promise<Config> {
  const text = await readFile(path, "utf-8");
  return parseConfig(JSON.parse(text));
}
