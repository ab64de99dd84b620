import { RetryConfig } from "../config/env.js";
import { UploadError, isTransientError, toFailureReason } from "../domain/errors.js";
import { GraphStore, UpsertResult } from "../domain/graphStore.js";
import { EmbeddedChunkRecord, FailedItem } from "../domain/types.js";
import { chunkArray, mapWithConcurrency } from "../utils/concurrency.js";
import { Logger } from "../utils/logger.js";
import { withRetry } from "../utils/retry.js";
import { withTimeout } from "../utils/timeout.js";
import { isFiniteVector } from "../utils/vector.js";

export interface UploaderOptions {
  batchSize: number;
  concurrency: number;
  maxAttempts: number;
  /** Bound on each store call, schema setup included. */
  timeoutMs: number;
  vectorDimension: number;
  retry: RetryConfig;
}

export interface UploadResult {
  created: number;
  updated: number;
  failed: FailedItem[];
}

interface BatchOutcome {
  results: UpsertResult[];
  failed: FailedItem[];
}

export class Uploader {
  constructor(
    private readonly store: GraphStore,
    private readonly options: UploaderOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Ensures the store schema, then upserts every record keyed by chunk id.
   * A schema failure rejects the whole run; record failures are collected.
   */
  async upload(records: EmbeddedChunkRecord[]): Promise<UploadResult> {
    await withTimeout(this.store.initialize(), this.options.timeoutMs, "Store schema setup");

    const failed: FailedItem[] = [];
    const valid: EmbeddedChunkRecord[] = [];
    for (const record of records) {
      const problem = this.validate(record);
      if (problem) {
        this.logger.warn(problem.message);
        failed.push({ id: record.id, reason: problem.message });
        continue;
      }
      valid.push(record);
    }

    const batches = chunkArray(latestById(valid), this.options.batchSize);
    const outcomes = await mapWithConcurrency(batches, this.options.concurrency, (batch, index) =>
      this.upsertBatch(batch, index),
    );

    let created = 0;
    let updated = 0;
    for (const outcome of outcomes) {
      for (const result of outcome.results) {
        if (result.outcome === "created") {
          created += 1;
        } else {
          updated += 1;
        }
      }
      failed.push(...outcome.failed);
    }

    this.logger.info(`Upload finished: ${created} created, ${updated} updated, ${failed.length} failed`);
    return { created, updated, failed };
  }

  private validate(record: EmbeddedChunkRecord): UploadError | null {
    if (!isFiniteVector(record.vector)) {
      return new UploadError(`Chunk ${record.id} has an empty or non-finite vector`);
    }
    if (record.vector.length !== this.options.vectorDimension) {
      return new UploadError(
        `Chunk ${record.id} has a vector of dimension ${record.vector.length}, expected ${this.options.vectorDimension}`,
      );
    }
    return null;
  }

  private async upsertBatch(batch: EmbeddedChunkRecord[], batchIndex: number): Promise<BatchOutcome> {
    try {
      return { results: await this.callStore(batch, `batch ${batchIndex}`), failed: [] };
    } catch (error) {
      if (batch.length === 1) {
        return { results: [], failed: [{ id: batch[0].id, reason: toFailureReason(error) }] };
      }
      this.logger.warn(
        `Upload batch ${batchIndex} failed (${toFailureReason(error)}); retrying its ${batch.length} records one by one`,
      );
    }

    const outcome: BatchOutcome = { results: [], failed: [] };
    for (const record of batch) {
      try {
        outcome.results.push(...(await this.callStore([record], record.id)));
      } catch (error) {
        this.logger.warn(`Record ${record.id} failed: ${toFailureReason(error)}`);
        outcome.failed.push({ id: record.id, reason: toFailureReason(error) });
      }
    }
    return outcome;
  }

  private callStore(batch: EmbeddedChunkRecord[], label: string): Promise<UpsertResult[]> {
    const attempt = () =>
      withTimeout(this.store.upsertChunks(batch), this.options.timeoutMs, `Upload ${label}`);
    return withRetry(attempt, {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.retry.baseDelayMs,
      maxDelayMs: this.options.retry.maxDelayMs,
      backoffMultiplier: 2,
      shouldRetry: isTransientError,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `Upload ${label} attempt ${attempt} failed (${toFailureReason(error)}); retrying in ${delayMs}ms`,
        ),
    });
  }
}

/** Keeps the last record per id, in first-seen order. */
function latestById(records: EmbeddedChunkRecord[]): EmbeddedChunkRecord[] {
  const byId = new Map<string, EmbeddedChunkRecord>();
  for (const record of records) {
    byId.set(record.id, record);
  }
  return [...byId.values()];
}
