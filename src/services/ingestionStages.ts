import { ZodType, ZodTypeDef } from "zod";
import { AppConfig } from "../config/env.js";
import { ConfigError } from "../domain/errors.js";
import { GraphStore } from "../domain/graphStore.js";
import {
  chunkSchema,
  classifiedPageSchema,
  embeddedChunkSchema,
  pageSchema,
} from "../domain/schemas.js";
import { Category } from "../domain/types.js";
import { EmbeddingClient } from "../infra/ai/types.js";
import { ArtifactPaths, resolveArtifactPaths } from "../infra/artifacts/paths.js";
import { readJsonl, writeJsonl } from "../infra/artifacts/jsonl.js";
import { PageFetcher } from "../infra/http/pageFetcher.js";
import { createChunkingStrategy, Splitter } from "../pipelines/chunking.js";
import { Classifier } from "../pipelines/classification.js";
import { Embedder } from "../pipelines/embedding.js";
import { Scraper } from "../pipelines/scraping.js";
import { Uploader } from "../pipelines/uploading.js";
import { Logger } from "../utils/logger.js";

export interface StageContext {
  config: AppConfig;
  logger: Logger;
  /** Defaults to the paths derived from `config.dataDir`. */
  paths?: ArtifactPaths;
}

export interface ScrapeStageSummary {
  pages: number;
  failures: number;
  skipped: number;
}

export interface ClassifyStageSummary {
  pages: number;
  invalidLines: number;
  counts: Record<Category, number>;
  ambiguous: number;
}

export interface SplitStageSummary {
  pages: number;
  invalidLines: number;
  chunks: number;
  skippedPages: number;
  failures: number;
}

export interface EmbedStageSummary {
  chunks: number;
  invalidLines: number;
  embedded: number;
  failed: number;
}

export interface UploadStageSummary {
  records: number;
  invalidLines: number;
  created: number;
  updated: number;
  failed: number;
}

export async function runScrapeStage(
  ctx: StageContext,
  fetcher: PageFetcher,
  seedUrls: string[] = ctx.config.scrape.seedUrls,
): Promise<ScrapeStageSummary> {
  const { config } = ctx;
  const paths = resolvePaths(ctx);
  if (seedUrls.length === 0) {
    throw new ConfigError("No seed URLs given. Set SCRAPE_SEED_URLS or pass URLs as arguments.");
  }

  const scraper = new Scraper(
    fetcher,
    {
      maxDepth: config.scrape.maxDepth,
      maxPages: config.scrape.maxPages,
      concurrency: config.scrape.concurrency,
      maxAttempts: config.scrape.maxAttempts,
      excludePatterns: config.scrape.excludePatterns,
      retry: config.retry,
    },
    ctx.logger.child("scrape"),
  );
  const result = await scraper.crawl(seedUrls);

  await writeJsonl(paths.pages, result.pages);
  await writeJsonl(paths.scrapeFailures, result.failures);
  ctx.logger.info(`Wrote ${result.pages.length} pages to ${paths.pages}`);

  return {
    pages: result.pages.length,
    failures: result.failures.length,
    skipped: result.skipped.length,
  };
}

export async function runClassifyStage(ctx: StageContext): Promise<ClassifyStageSummary> {
  const paths = resolvePaths(ctx);
  const { records, invalidLines } = await readArtifact(ctx, paths.pages, pageSchema);

  const classifier = new Classifier(ctx.config.classify, ctx.logger.child("classify"));
  const result = classifier.classify(records);

  await writeJsonl(paths.classifiedPages, result.pages);
  return {
    pages: result.pages.length,
    invalidLines,
    counts: result.counts,
    ambiguous: result.ambiguous.length,
  };
}

export async function runSplitStage(ctx: StageContext): Promise<SplitStageSummary> {
  const { split } = ctx.config;
  const paths = resolvePaths(ctx);
  const { records, invalidLines } = await readArtifact(ctx, paths.classifiedPages, classifiedPageSchema);

  const splitter = new Splitter(
    createChunkingStrategy(split.strategy, {
      maxChunkSize: split.maxChunkSize,
      overlapSize: split.overlapSize,
      lookback: split.lookback,
    }),
    { excludeCategories: split.excludeCategories },
    ctx.logger.child("split"),
  );
  const result = splitter.split(records);

  await writeJsonl(paths.chunks, result.chunks);
  await writeJsonl(paths.splitFailures, result.failures);
  return {
    pages: records.length,
    invalidLines,
    chunks: result.chunks.length,
    skippedPages: result.skippedPages,
    failures: result.failures.length,
  };
}

export async function runEmbedStage(
  ctx: StageContext,
  client: EmbeddingClient,
): Promise<EmbedStageSummary> {
  const { embedding } = ctx.config;
  const paths = resolvePaths(ctx);
  const { records, invalidLines } = await readArtifact(ctx, paths.chunks, chunkSchema);

  const embedder = new Embedder(
    client,
    {
      batchSize: embedding.batchSize,
      concurrency: embedding.concurrency,
      maxAttempts: embedding.maxAttempts,
      vectorDimension: embedding.vectorDimension,
      retry: ctx.config.retry,
    },
    ctx.logger.child("embed"),
  );
  const result = await embedder.embed(records);

  await writeJsonl(paths.embeddedChunks, result.embedded);
  await writeJsonl(paths.embedFailures, result.failed);
  return {
    chunks: records.length,
    invalidLines,
    embedded: result.embedded.length,
    failed: result.failed.length,
  };
}

export async function runUploadStage(
  ctx: StageContext,
  store: GraphStore,
): Promise<UploadStageSummary> {
  const { store: storeConfig, embedding } = ctx.config;
  const paths = resolvePaths(ctx);
  const { records, invalidLines } = await readArtifact(ctx, paths.embeddedChunks, embeddedChunkSchema);

  const uploader = new Uploader(
    store,
    {
      batchSize: storeConfig.batchSize,
      concurrency: storeConfig.concurrency,
      maxAttempts: storeConfig.maxAttempts,
      timeoutMs: storeConfig.timeoutMs,
      vectorDimension: embedding.vectorDimension,
      retry: ctx.config.retry,
    },
    ctx.logger.child("upload"),
  );
  const result = await uploader.upload(records);

  await writeJsonl(paths.uploadFailures, result.failed);
  return {
    records: records.length,
    invalidLines,
    created: result.created,
    updated: result.updated,
    failed: result.failed.length,
  };
}

function resolvePaths(ctx: StageContext): ArtifactPaths {
  return ctx.paths ?? resolveArtifactPaths(ctx.config.dataDir, ctx.config.artifactGzip);
}

async function readArtifact<T>(
  ctx: StageContext,
  filePath: string,
  schema: ZodType<T, ZodTypeDef, unknown>,
): Promise<{ records: T[]; invalidLines: number }> {
  const { records, invalid } = await readJsonl(filePath, schema);
  for (const line of invalid) {
    ctx.logger.warn(`Skipping ${filePath}:${line.line}: ${line.reason}`);
  }
  ctx.logger.info(`Read ${records.length} records from ${filePath}`);
  return { records, invalidLines: invalid.length };
}
