import { describe, expect, it } from "vitest";
import { InMemoryGraphStore } from "../src/infra/store/inMemoryGraphStore.js";
import { embeddedChunk } from "./helpers/fakes.js";

const PRODUCT = embeddedChunk({
  startOffset: 0,
  text: "Milk chocolate wafer",
  vector: [1, 0, 0],
});
const RECIPE = embeddedChunk({
  sourceUrl: "https://example.com/recipes/brownies",
  startOffset: 0,
  text: "Brownie recipe",
  category: "recipe",
  vector: [0.9, 0.1, 0],
});
const OFF_TOPIC = embeddedChunk({
  sourceUrl: "https://example.com/about",
  startOffset: 0,
  text: "About us",
  category: "other",
  vector: [0, 1, 0],
});

describe("InMemoryGraphStore", () => {
  it("reports created then updated per chunk id", async () => {
    const store = new InMemoryGraphStore();
    await expect(store.upsertChunks([PRODUCT, RECIPE])).resolves.toEqual([
      { id: PRODUCT.id, outcome: "created" },
      { id: RECIPE.id, outcome: "created" },
    ]);
    await expect(store.upsertChunks([PRODUCT])).resolves.toEqual([{ id: PRODUCT.id, outcome: "updated" }]);
    await expect(store.stats()).resolves.toEqual({ pages: 2, chunks: 2, categories: 2, belongsToEdges: 2 });
  });

  it("ranks by cosine similarity and drops non-positive scores", async () => {
    const store = new InMemoryGraphStore();
    await store.upsertChunks([PRODUCT, RECIPE, OFF_TOPIC]);

    const hits = await store.search({ queryEmbedding: [1, 0, 0], topK: 5 });

    expect(hits.map((hit) => hit.chunkId)).toEqual([PRODUCT.id, RECIPE.id]);
    expect(hits[0]).toEqual({
      chunkId: PRODUCT.id,
      content: "Milk chocolate wafer",
      score: 1,
      sourceUrl: "https://example.com/products/kitkat",
      title: "KitKat",
      category: "product",
      embeddingModelId: "keyword-test",
    });
    expect(hits[1].score).toBeCloseTo(0.9 / Math.sqrt(0.82), 10);
  });

  it("limits results to topK and filters by category", async () => {
    const store = new InMemoryGraphStore();
    await store.upsertChunks([PRODUCT, RECIPE, OFF_TOPIC]);

    expect(await store.search({ queryEmbedding: [1, 0, 0], topK: 1 })).toHaveLength(1);
    const recipes = await store.search({ queryEmbedding: [1, 0, 0], topK: 5, categories: ["recipe"] });
    expect(recipes.map((hit) => hit.chunkId)).toEqual([RECIPE.id]);
  });

  it("moves a page to its latest category", async () => {
    const store = new InMemoryGraphStore();
    await store.upsertChunks([PRODUCT]);
    await store.upsertChunks([{ ...PRODUCT, category: "article", title: "KitKat story" }]);

    expect(store.getPage(PRODUCT.sourceUrl)).toEqual({
      url: PRODUCT.sourceUrl,
      title: "KitKat story",
      category: "article",
    });
    expect(store.getChunk(PRODUCT.id)?.category).toBe("article");
  });
});
