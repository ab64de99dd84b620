import { FetchError } from "../../src/domain/errors.js";
import { Category, EmbeddedChunkRecord } from "../../src/domain/types.js";
import { ChatCompletionClient, ChatMessage, EmbeddingClient } from "../../src/infra/ai/types.js";
import { FetchedPage, PageFetcher } from "../../src/infra/http/pageFetcher.js";
import { createChunkId } from "../../src/utils/text.js";

export type FakeRoute =
  | string
  | Error
  | { redirectTo: string; body: string }
  | { failFirst: Error[]; body: string };

/**
 * Serves HTML from a map keyed by URL; unknown URLs answer 404. A `failFirst`
 * route throws its errors one per call before serving the body.
 */
export class FakePageFetcher implements PageFetcher {
  readonly calls: string[] = [];

  constructor(private readonly routes: Record<string, FakeRoute>) {}

  async fetchPage(url: string): Promise<FetchedPage> {
    this.calls.push(url);
    const route = this.routes[url];

    if (route === undefined) {
      throw new FetchError(url, `HTTP 404 for ${url}`, 404);
    }
    if (route instanceof Error) {
      throw route;
    }
    if (typeof route === "string") {
      return { url, status: 200, contentType: "text/html", body: route };
    }
    if ("redirectTo" in route) {
      return { url: route.redirectTo, status: 200, contentType: "text/html", body: route.body };
    }
    const failure = route.failFirst.shift();
    if (failure) {
      throw failure;
    }
    return { url, status: 200, contentType: "text/html", body: route.body };
  }
}

export const KEYWORDS = ["chocolate", "wafer", "cookie"];

/**
 * Counts keyword occurrences, plus a constant last component so no vector is
 * all zeros. Dimension is KEYWORDS.length + 1.
 */
export function keywordVector(text: string): number[] {
  const lower = text.toLowerCase();
  return [...KEYWORDS.map((keyword) => lower.split(keyword).length - 1), 1];
}

export class KeywordEmbeddingClient implements EmbeddingClient {
  readonly modelId = "keyword-test";

  readonly calls: string[][] = [];

  constructor(private readonly failWhen: (text: string) => Error | null = () => null) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    this.calls.push([...texts]);
    for (const text of texts) {
      const error = this.failWhen(text);
      if (error) {
        throw error;
      }
    }
    return texts.map(keywordVector);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [vector] = await this.embedTexts([query]);
    return vector;
  }
}

export class FakeChatClient implements ChatCompletionClient {
  readonly requests: ChatMessage[][] = [];

  constructor(private readonly reply = "fake answer") {}

  async complete(messages: ChatMessage[]): Promise<string> {
    this.requests.push(messages);
    return this.reply;
  }
}

export function embeddedChunk(
  overrides: Partial<EmbeddedChunkRecord> & { sourceUrl?: string; startOffset?: number } = {},
): EmbeddedChunkRecord {
  const sourceUrl = overrides.sourceUrl ?? "https://example.com/products/kitkat";
  const startOffset = overrides.startOffset ?? 0;
  const text = overrides.text ?? "Milk chocolate with crispy wafer";
  const category: Category = overrides.category ?? "product";
  return {
    id: createChunkId(sourceUrl, startOffset),
    sourceUrl,
    title: "KitKat",
    index: 0,
    text,
    startOffset,
    endOffset: startOffset + text.length,
    category,
    vector: keywordVector(text),
    embeddingModelId: "keyword-test",
    ...overrides,
  };
}
