import { describe, expect, it } from "vitest";
import { EmbeddingClient } from "../src/infra/ai/types.js";
import { InMemoryGraphStore } from "../src/infra/store/inMemoryGraphStore.js";
import { buildGroundedMessages, isSmallTalk } from "../src/pipelines/answering.js";
import { SearchService } from "../src/services/searchService.js";
import { Logger, silentLogger } from "../src/utils/logger.js";
import { embeddedChunk, FakeChatClient } from "./helpers/fakes.js";

class FixedQueryEmbedding implements EmbeddingClient {
  readonly modelId = "fixed";

  readonly queries: string[] = [];

  constructor(private readonly vector: number[]) {}

  async embedTexts(texts: string[]): Promise<number[][]> {
    return texts.map(() => this.vector);
  }

  async embedQuery(query: string): Promise<number[]> {
    this.queries.push(query);
    return this.vector;
  }
}

const C1 = embeddedChunk({ startOffset: 0, text: "Milk chocolate wafer", vector: [1, 0, 0] });
const C2 = embeddedChunk({
  sourceUrl: "https://example.com/about",
  startOffset: 0,
  text: "About us",
  category: "other",
  vector: [0, 1, 0],
});
const C3 = embeddedChunk({
  sourceUrl: "https://example.com/recipes/brownies",
  startOffset: 0,
  text: "Brownie recipe",
  category: "recipe",
  vector: [0.9, 0.1, 0],
});

async function seededStore() {
  const store = new InMemoryGraphStore();
  await store.upsertChunks([C1, C2, C3]);
  return store;
}

const OPTIONS = { defaultTopK: 5, greeting: "Hello from the test shop" };

describe("SearchService", () => {
  it("returns the nearest chunks with rounded scores", async () => {
    const embedding = new FixedQueryEmbedding([1, 0, 0]);
    const service = new SearchService(await seededStore(), embedding, null, OPTIONS, silentLogger);

    const response = await service.search("  chocolate wafer  ");

    expect(embedding.queries).toEqual(["chocolate wafer"]);
    expect(response).toEqual({
      results: [
        {
          content: "Milk chocolate wafer",
          score: 1,
          source_url: "https://example.com/products/kitkat",
          title: "KitKat",
          category: "product",
        },
        {
          content: "Brownie recipe",
          score: 0.9939,
          source_url: "https://example.com/recipes/brownies",
          title: "KitKat",
          category: "recipe",
        },
      ],
    });
  });

  it("applies topK and category filters", async () => {
    const service = new SearchService(
      await seededStore(),
      new FixedQueryEmbedding([1, 0, 0]),
      null,
      OPTIONS,
      silentLogger,
    );

    expect((await service.search("wafer", { topK: 1 })).results.map((item) => item.content)).toEqual([
      "Milk chocolate wafer",
    ]);
    expect(
      (await service.search("wafer", { categories: ["recipe"] })).results.map((item) => item.content),
    ).toEqual(["Brownie recipe"]);
  });

  it("clamps topK into the allowed range", async () => {
    const service = new SearchService(
      await seededStore(),
      new FixedQueryEmbedding([1, 0, 0]),
      null,
      OPTIONS,
      silentLogger,
    );
    expect((await service.search("wafer", { topK: 0 })).results).toHaveLength(1);
  });

  it("adds a grounded answer when a chat client is configured", async () => {
    const chat = new FakeChatClient("Try the KitKat.");
    const service = new SearchService(
      await seededStore(),
      new FixedQueryEmbedding([1, 0, 0]),
      chat,
      OPTIONS,
      silentLogger,
    );

    const response = await service.search("Which bar has wafer?");

    expect(response.answer).toBe("Try the KitKat.");
    expect(response.results).toHaveLength(2);
    expect(chat.requests[0][1].content).toBe(
      [
        "Context:",
        "[1] KitKat (https://example.com/products/kitkat)",
        "Milk chocolate wafer",
        "",
        "[2] KitKat (https://example.com/recipes/brownies)",
        "Brownie recipe",
        "",
        "Question: Which bar has wafer?",
      ].join("\n"),
    );
  });

  it("answers small talk without touching the store", async () => {
    const embedding = new FixedQueryEmbedding([1, 0, 0]);
    const chat = new FakeChatClient("Hi there!");
    const service = new SearchService(await seededStore(), embedding, chat, OPTIONS, silentLogger);

    await expect(service.search("Hello!")).resolves.toEqual({ results: [], answer: "Hi there!" });
    expect(embedding.queries).toEqual([]);
    expect(chat.requests[0][1]).toEqual({ role: "user", content: "Hello!" });
  });

  it("retrieves for small talk when no chat client is configured", async () => {
    const embedding = new FixedQueryEmbedding([1, 0, 0]);
    const service = new SearchService(await seededStore(), embedding, null, OPTIONS, silentLogger);

    const response = await service.search("hello");
    expect(response.answer).toBeUndefined();
    expect(embedding.queries).toEqual(["hello"]);
  });

  it("warns when stored vectors come from another model", async () => {
    const warnings: string[] = [];
    const logger = new Logger("warn", (_level, message) => {
      warnings.push(message);
    });
    const service = new SearchService(await seededStore(), new FixedQueryEmbedding([1, 0, 0]), null, OPTIONS, logger);

    await service.search("wafer");

    expect(warnings).toEqual([
      "Query embedded with fixed but hits were embedded with keyword-test; scores are not comparable. Re-run the embed and upload stages with the same model.",
    ]);
  });

  it("stays quiet when the models match", async () => {
    const warnings: string[] = [];
    const logger = new Logger("warn", (_level, message) => {
      warnings.push(message);
    });
    const store = new InMemoryGraphStore();
    await store.upsertChunks([{ ...C1, embeddingModelId: "fixed" }]);
    const service = new SearchService(store, new FixedQueryEmbedding([1, 0, 0]), null, OPTIONS, logger);

    await service.search("wafer");

    expect(warnings).toEqual([]);
  });

  it("returns the configured greeting", async () => {
    const service = new SearchService(
      new InMemoryGraphStore(),
      new FixedQueryEmbedding([1]),
      null,
      OPTIONS,
      silentLogger,
    );
    expect(service.greet()).toBe("Hello from the test shop");
  });
});

describe("answering helpers", () => {
  it("detects short greetings only", () => {
    expect(isSmallTalk("Hi!")).toBe(true);
    expect(isSmallTalk("good morning, who are you?")).toBe(true);
    expect(isSmallTalk("Thank you")).toBe(true);
    expect(isSmallTalk("hi, which KitKat flavours contain peanuts and are sold in Japan?")).toBe(false);
    expect(isSmallTalk("history of the chocolate wafer")).toBe(false);
    expect(isSmallTalk("")).toBe(false);
  });

  it("uses only the top hits as context and labels untitled pages", () => {
    const hits = [1, 2, 3, 4].map((n) => ({
      chunkId: `pg_${n}:0`,
      content: `Chunk ${n}`,
      score: 1 / n,
      sourceUrl: `https://example.com/p/${n}`,
      title: n === 1 ? "" : `Page ${n}`,
      category: "product" as const,
      embeddingModelId: "fixed",
    }));

    const [, user] = buildGroundedMessages("q", hits);
    expect(user.content).toBe(
      [
        "Context:",
        "[1] Untitled (https://example.com/p/1)",
        "Chunk 1",
        "",
        "[2] Page 2 (https://example.com/p/2)",
        "Chunk 2",
        "",
        "[3] Page 3 (https://example.com/p/3)",
        "Chunk 3",
        "",
        "Question: q",
      ].join("\n"),
    );
  });
});
