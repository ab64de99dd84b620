import { RetryConfig } from "../config/env.js";
import { FetchError, isTransientError, toFailureReason } from "../domain/errors.js";
import { PageRecord, ScrapeFailure } from "../domain/types.js";
import { PageFetcher } from "../infra/http/pageFetcher.js";
import { extractPage } from "../infra/parsers/htmlExtractor.js";
import { mapWithConcurrency } from "../utils/concurrency.js";
import { Logger } from "../utils/logger.js";
import { RetryExhaustedError, withRetry } from "../utils/retry.js";
import { hostOf, normalizeUrl } from "../utils/text.js";

export interface ScraperOptions {
  maxDepth: number;
  maxPages: number;
  concurrency: number;
  maxAttempts: number;
  excludePatterns: string[];
  retry: RetryConfig;
}

export interface ScrapeResult {
  pages: PageRecord[];
  failures: ScrapeFailure[];
  /** URLs dropped as duplicates after redirects or by exclude patterns. */
  skipped: string[];
}

type FetchOutcome =
  | { ok: true; page: PageRecord; attempts: number }
  | { ok: false; failure: ScrapeFailure };

export class Scraper {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly options: ScraperOptions,
    private readonly logger: Logger,
    private readonly now: () => Date = () => new Date(),
  ) {}

  /**
   * Breadth-first crawl from `seedUrls`, staying on the seed hosts. Each URL
   * is fetched at most once per run; a failed fetch is recorded and the crawl
   * goes on.
   */
  async crawl(seedUrls: string[]): Promise<ScrapeResult> {
    const pages: PageRecord[] = [];
    const failures: ScrapeFailure[] = [];
    const skipped: string[] = [];
    const scheduled = new Set<string>();
    const captured = new Set<string>();

    let frontier: string[] = [];
    for (const seed of seedUrls) {
      const normalized = normalizeUrl(seed.trim());
      if (!normalized) {
        failures.push({ url: seed, reason: "Invalid seed URL", attempts: 0 });
        continue;
      }
      if (scheduled.has(normalized)) {
        continue;
      }
      scheduled.add(normalized);
      if (this.isExcluded(normalized)) {
        skipped.push(normalized);
        continue;
      }
      frontier.push(normalized);
    }

    const allowedHosts = new Set(
      frontier.map((url) => hostOf(url)).filter((host): host is string => host !== null),
    );
    let fetchBudget = this.options.maxPages;

    for (let depth = 0; depth <= this.options.maxDepth && frontier.length > 0; depth += 1) {
      const batch = frontier.slice(0, Math.max(0, fetchBudget));
      fetchBudget -= batch.length;
      if (batch.length < frontier.length) {
        this.logger.warn(
          `Page limit ${this.options.maxPages} reached; ${frontier.length - batch.length} URLs at depth ${depth} not fetched.`,
        );
      }
      if (batch.length === 0) {
        break;
      }

      this.logger.info(`Depth ${depth}: fetching ${batch.length} URLs`);
      const outcomes = await mapWithConcurrency(batch, this.options.concurrency, (url) =>
        this.fetchOne(url),
      );

      const next: string[] = [];
      for (const outcome of outcomes) {
        if (!outcome.ok) {
          failures.push(outcome.failure);
          continue;
        }

        const { page } = outcome;
        if (captured.has(page.url)) {
          this.logger.debug(`Duplicate after redirect: ${page.url}`);
          skipped.push(page.url);
          continue;
        }
        captured.add(page.url);
        scheduled.add(page.url);
        pages.push(page);

        if (depth >= this.options.maxDepth) {
          continue;
        }
        for (const link of page.links) {
          if (scheduled.has(link)) {
            continue;
          }
          const host = hostOf(link);
          if (!host || !allowedHosts.has(host)) {
            continue;
          }
          scheduled.add(link);
          if (this.isExcluded(link)) {
            skipped.push(link);
            continue;
          }
          next.push(link);
        }
      }

      frontier = next;
    }

    this.logger.info(
      `Crawl finished: ${pages.length} pages, ${failures.length} failures, ${skipped.length} skipped`,
    );
    return { pages, failures, skipped };
  }

  private async fetchOne(url: string): Promise<FetchOutcome> {
    try {
      let attempts = 0;
      const fetched = await withRetry(
        (attempt) => {
          attempts = attempt;
          return this.fetcher.fetchPage(url);
        },
        {
          maxAttempts: this.options.maxAttempts,
          baseDelayMs: this.options.retry.baseDelayMs,
          maxDelayMs: this.options.retry.maxDelayMs,
          backoffMultiplier: 2,
          shouldRetry: isTransientError,
          onRetry: (error, attempt, delayMs) =>
            this.logger.warn(
              `Attempt ${attempt} for ${url} failed (${toFailureReason(error)}); retrying in ${delayMs}ms`,
            ),
        },
      );

      const finalUrl = normalizeUrl(fetched.url) ?? url;
      const extracted = extractPage(fetched.body, finalUrl);
      this.logger.debug(`Fetched ${finalUrl} (${extracted.text.length} chars)`);

      return {
        ok: true,
        attempts,
        page: {
          url: finalUrl,
          title: extracted.title,
          text: extracted.text,
          fetchedAt: this.now().toISOString(),
          status: fetched.status,
          links: extracted.links,
          images: extracted.images,
        },
      };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const attempts = error instanceof RetryExhaustedError ? error.attempts : 1;
      this.logger.warn(`Skipping ${url}: ${toFailureReason(cause)}`);
      return {
        ok: false,
        failure: {
          url,
          reason: toFailureReason(cause),
          status: cause instanceof FetchError ? cause.status : undefined,
          attempts,
        },
      };
    }
  }

  private isExcluded(url: string): boolean {
    return this.options.excludePatterns.some((pattern) => url.includes(pattern));
  }
}
