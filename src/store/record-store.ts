import type { Pool } from "mysql2/promise";
import type { AppConfig } from "../config/index.js";
import { fetchAllDocuments } from "../db/mysql.js";
import { UpstreamFetchError, errorMessage } from "../errors.js";
import { childLogger } from "../observability/logger.js";
import type { CollectionName, RawDocument } from "../records/types.js";

const log = childLogger("record-store");

export interface RecordStore {
  /** Every document of the collection, or an UpstreamFetchError. Never a partial read. */
  fetch(collection: CollectionName): Promise<RawDocument[]>;
}

export type TableReader = (table: string) => Promise<RawDocument[]>;

export interface RetryOptions {
  maxRetries: number;
  /** Delay before retry n is `retryDelayMs * n`. */
  retryDelayMs: number;
}

/**
 * Reads whole collections through `readTable`, retrying a failed read from
 * the start with a linear backoff.
 */
export class RetryingRecordStore implements RecordStore {
  constructor(
    private readonly readTable: TableReader,
    private readonly tables: Record<CollectionName, string>,
    private readonly retry: RetryOptions
  ) {}

  async fetch(collection: CollectionName): Promise<RawDocument[]> {
    const table = this.tables[collection];
    const maxAttempts = Math.max(1, this.retry.maxRetries);
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        const documents = await this.readTable(table);
        log.debug({ collection, table, count: documents.length, attempt }, "Collection loaded");
        return documents;
      } catch (err) {
        lastError = err;
        if (attempt < maxAttempts) {
          const delayMs = this.retry.retryDelayMs * attempt;
          log.warn(
            { collection, table, attempt, maxAttempts, delayMs, error: errorMessage(err) },
            "Collection read failed, retrying after delay"
          );
          await new Promise((resolve) => setTimeout(resolve, delayMs));
        }
      }
    }

    log.error({ collection, table, attempts: maxAttempts, err: lastError }, "Collection read failed after retries");
    throw new UpstreamFetchError(collection, maxAttempts, lastError);
  }
}

export function createMysqlRecordStore(pool: Pool, config: AppConfig): RecordStore {
  return new RetryingRecordStore(
    (table) => fetchAllDocuments(pool, table, config.ops.fetchBatchSize),
    config.collections,
    { maxRetries: config.ops.fetchMaxRetries, retryDelayMs: config.ops.fetchRetryDelayMs }
  );
}
