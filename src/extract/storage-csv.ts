/**
 * CSV extraction strategy: reads one CSV object per entity type from a
 * storage backend and turns it into a raw batch.
 */
import { ExtractionFailedException } from "../core/exceptions.js";
import type { ExtractionStrategy } from "../core/etl.js";
import type { Batch, RawRecord } from "../core/types.js";
import type { EntityDescriptor } from "../entities/descriptor.js";
import { log } from "../logger.js";
import type { StorageBackend } from "../storage/backend.js";
import { parseCsv, type ParsedCsv } from "./csv.js";

export class CsvExtractionStrategy implements ExtractionStrategy {
  private files: Readonly<Record<string, string>>;

  /** `files` maps entity names to storage keys. */
  constructor(files: Readonly<Record<string, string>>) {
    this.files = files;
  }

  async extract(entity: EntityDescriptor, storage: StorageBackend): Promise<Batch> {
    const key = this.files[entity.name];
    if (!key) {
      throw new ExtractionFailedException(`no source file configured for '${entity.name}'`);
    }
    if (!(await storage.exists(key))) {
      throw new ExtractionFailedException(`source file '${key}' for '${entity.name}' not found`);
    }

    const text = new TextDecoder("utf-8").decode(await storage.read(key));
    let parsed: ParsedCsv;
    try {
      parsed = parseCsv(text);
    } catch (err) {
      throw new ExtractionFailedException(`${key}: ${String(err)}`);
    }

    // Empty fields become null; everything else stays a string for the validator.
    const batch = parsed.rows.map((values) => {
      const record: RawRecord = {};
      parsed.headers.forEach((header, idx) => {
        const value = values[idx];
        record[header] = value === "" ? null : value;
      });
      return record;
    });

    log.storage.info({ entity: entity.name, key, rows: batch.length }, "batch extracted");
    return batch;
  }
}
