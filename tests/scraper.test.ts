import { describe, expect, it } from "vitest";
import { FetchError } from "../src/domain/errors.js";
import { Scraper, ScraperOptions } from "../src/pipelines/scraping.js";
import { silentLogger } from "../src/utils/logger.js";
import { FakePageFetcher, FakeRoute } from "./helpers/fakes.js";

const FETCHED_AT = new Date("2024-05-01T00:00:00Z");

const OPTIONS: ScraperOptions = {
  maxDepth: 1,
  maxPages: 100,
  concurrency: 2,
  maxAttempts: 3,
  excludePatterns: ["recipe_tags_filter", "/search"],
  retry: { baseDelayMs: 0, maxDelayMs: 0 },
};

function site(): Record<string, FakeRoute> {
  return {
    "https://example.com/": `
      <title>Home</title>
      <p>Welcome to the shop.</p>
      <a href="/products/a">A</a>
      <a href="/recipes/b">B</a>
      <a href="/broken">Broken</a>
      <a href="/search?q=kitkat">Search</a>
      <a href="/old">Old</a>
      <a href="https://other.com/page">Elsewhere</a>`,
    "https://example.com/products/a": `
      <title>Product A</title>
      <p>Milk chocolate with crispy wafer.</p>
      <a href="/products/c">C</a>`,
    "https://example.com/recipes/b": {
      failFirst: [new FetchError("https://example.com/recipes/b", "socket hang up")],
      body: "<title>Recipe B</title><p>Ingredients and directions.</p>",
    },
    "https://example.com/old": {
      redirectTo: "https://example.com/products/a/",
      body: "<title>Product A</title><p>Milk chocolate with crispy wafer.</p>",
    },
  };
}

function createScraper(fetcher: FakePageFetcher, overrides: Partial<ScraperOptions> = {}) {
  return new Scraper(fetcher, { ...OPTIONS, ...overrides }, silentLogger, () => FETCHED_AT);
}

describe("Scraper", () => {
  it("crawls same-host links breadth first and records failures", async () => {
    const fetcher = new FakePageFetcher(site());
    const result = await createScraper(fetcher).crawl(["https://example.com"]);

    expect(result.pages.map((page) => page.url)).toEqual([
      "https://example.com/",
      "https://example.com/products/a",
      "https://example.com/recipes/b",
    ]);
    expect(result.failures).toEqual([
      {
        url: "https://example.com/broken",
        reason: "HTTP 404 for https://example.com/broken",
        status: 404,
        attempts: 1,
      },
    ]);
    expect(result.skipped).toEqual(["https://example.com/search", "https://example.com/products/a"]);
    expect(fetcher.calls).not.toContain("https://other.com/page");
    expect(fetcher.calls).not.toContain("https://example.com/products/c");
  });

  it("retries transient fetch errors", async () => {
    const fetcher = new FakePageFetcher(site());
    const result = await createScraper(fetcher).crawl(["https://example.com/"]);

    expect(fetcher.calls.filter((url) => url === "https://example.com/recipes/b")).toHaveLength(2);
    expect(result.pages[2]).toEqual({
      url: "https://example.com/recipes/b",
      title: "Recipe B",
      text: "Ingredients and directions.",
      fetchedAt: "2024-05-01T00:00:00.000Z",
      status: 200,
      links: [],
      images: [],
    });
  });

  it("stops at the page limit", async () => {
    const fetcher = new FakePageFetcher(site());
    const result = await createScraper(fetcher, { maxPages: 2 }).crawl(["https://example.com/"]);

    expect(result.pages.map((page) => page.url)).toEqual([
      "https://example.com/",
      "https://example.com/products/a",
    ]);
    expect(fetcher.calls).toHaveLength(2);
  });

  it("only fetches seeds at depth 0", async () => {
    const fetcher = new FakePageFetcher(site());
    const result = await createScraper(fetcher, { maxDepth: 0 }).crawl([
      "https://example.com/",
      "https://example.com/",
      "ftp://example.com/file",
    ]);

    expect(result.pages).toHaveLength(1);
    expect(result.failures).toEqual([
      { url: "ftp://example.com/file", reason: "Invalid seed URL", attempts: 0 },
    ]);
    expect(fetcher.calls).toEqual(["https://example.com/"]);
  });
});
