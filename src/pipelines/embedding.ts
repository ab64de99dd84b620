import { RetryConfig } from "../config/env.js";
import { ConfigError, EmbeddingError, isTransientError, toFailureReason } from "../domain/errors.js";
import { ChunkRecord, EmbeddedChunkRecord, FailedItem } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { chunkArray, mapWithConcurrency } from "../utils/concurrency.js";
import { Logger } from "../utils/logger.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";
import { isFiniteVector } from "../utils/vector.js";

export interface EmbedderOptions {
  batchSize: number;
  concurrency: number;
  maxAttempts: number;
  vectorDimension: number;
  retry: RetryConfig;
}

export interface EmbedResult {
  embedded: EmbeddedChunkRecord[];
  failed: FailedItem[];
}

export class Embedder {
  constructor(
    private readonly client: EmbeddingClient,
    private readonly options: EmbedderOptions,
    private readonly logger: Logger,
  ) {}

  /**
   * Every input chunk ends up in exactly one of `embedded` or `failed`.
   * A batch that keeps failing is retried item by item, so one bad chunk
   * does not take its neighbours down with it.
   *
   * Rejects when nothing at all could be embedded, and on a ConfigError
   * from the client, since neither leaves anything to write downstream.
   */
  async embed(chunks: ChunkRecord[]): Promise<EmbedResult> {
    const batches = chunkArray(chunks, this.options.batchSize);
    this.logger.info(
      `Embedding ${chunks.length} chunks in ${batches.length} batches with ${this.client.modelId}`,
    );

    const outcomes = await mapWithConcurrency(batches, this.options.concurrency, (batch, index) =>
      this.embedBatch(batch, index),
    );

    const result: EmbedResult = {
      embedded: outcomes.flatMap((outcome) => outcome.embedded),
      failed: outcomes.flatMap((outcome) => outcome.failed),
    };
    this.logger.info(`Embedded ${result.embedded.length} chunks, ${result.failed.length} failed`);

    if (chunks.length > 0 && result.embedded.length === 0) {
      throw new EmbeddingError(
        `No chunks could be embedded; ${result.failed.length} of ${chunks.length} failed. First failure: ${result.failed[0].reason}`,
      );
    }
    return result;
  }

  private async embedBatch(batch: ChunkRecord[], batchIndex: number): Promise<EmbedResult> {
    try {
      const vectors = await this.callProvider(
        batch.map((chunk) => chunk.text),
        `batch ${batchIndex}`,
      );
      return this.attachVectors(batch, vectors);
    } catch (error) {
      throwIfConfigError(error);
      if (batch.length === 1) {
        return { embedded: [], failed: [{ id: batch[0].id, reason: toFailureReason(error) }] };
      }
      this.logger.warn(
        `Batch ${batchIndex} failed (${toFailureReason(error)}); retrying its ${batch.length} chunks one by one`,
      );
    }

    const result: EmbedResult = { embedded: [], failed: [] };
    for (const chunk of batch) {
      try {
        const vectors = await this.callProvider([chunk.text], chunk.id);
        const single = this.attachVectors([chunk], vectors);
        result.embedded.push(...single.embedded);
        result.failed.push(...single.failed);
      } catch (error) {
        throwIfConfigError(error);
        this.logger.warn(`Chunk ${chunk.id} failed: ${toFailureReason(error)}`);
        result.failed.push({ id: chunk.id, reason: toFailureReason(error) });
      }
    }
    return result;
  }

  private callProvider(texts: string[], label: string): Promise<number[][]> {
    return withRetry(() => this.client.embedTexts(texts), {
      maxAttempts: this.options.maxAttempts,
      baseDelayMs: this.options.retry.baseDelayMs,
      maxDelayMs: this.options.retry.maxDelayMs,
      backoffMultiplier: 2,
      shouldRetry: isTransientError,
      onRetry: (error, attempt, delayMs) =>
        this.logger.warn(
          `Embedding ${label} attempt ${attempt} failed (${toFailureReason(error)}); retrying in ${delayMs}ms`,
        ),
    });
  }

  private attachVectors(batch: ChunkRecord[], vectors: number[][]): EmbedResult {
    const result: EmbedResult = { embedded: [], failed: [] };
    batch.forEach((chunk, index) => {
      const vector = vectors[index];
      if (!vector || !isFiniteVector(vector) || vector.length !== this.options.vectorDimension) {
        result.failed.push({
          id: chunk.id,
          reason: `Expected a vector of dimension ${this.options.vectorDimension}, got ${vector ? vector.length : 0}`,
        });
        return;
      }
      result.embedded.push({ ...chunk, vector, embeddingModelId: this.client.modelId });
    });
    return result;
  }
}

function throwIfConfigError(error: unknown): void {
  const cause = error instanceof RetryExhaustedError ? error.lastError : error;
  if (cause instanceof ConfigError) {
    throw cause;
  }
}
