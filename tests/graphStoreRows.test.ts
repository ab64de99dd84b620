import { describe, expect, it } from "vitest";
import { toNeo4jChunkRow, toSearchHit as neo4jSearchHit } from "../src/infra/store/neo4jGraphStore.js";
import { toSearchHit as pgSearchHit } from "../src/infra/store/pgVectorGraphStore.js";
import { createPageId } from "../src/utils/text.js";
import { embeddedChunk } from "./helpers/fakes.js";

describe("Neo4j row mapping", () => {
  it("flattens a record into upsert parameters", () => {
    const record = embeddedChunk({ startOffset: 12, text: "Crispy wafer" });

    expect(toNeo4jChunkRow(record)).toEqual({
      id: record.id,
      pageId: createPageId("https://example.com/products/kitkat"),
      sourceUrl: "https://example.com/products/kitkat",
      title: "KitKat",
      category: "product",
      index: 0,
      text: "Crispy wafer",
      startOffset: 12,
      endOffset: 24,
      embedding: [0, 1, 0, 1],
      embeddingModelId: "keyword-test",
    });
  });

  it("maps search rows and tolerates missing titles and odd categories", () => {
    expect(
      neo4jSearchHit({
        chunkId: "pg_1:0",
        content: "Crispy wafer",
        score: 0.87,
        sourceUrl: "https://example.com/products/kitkat",
        title: null,
        category: "snacks",
        embeddingModelId: "text-embedding-3-small",
      }),
    ).toEqual({
      chunkId: "pg_1:0",
      content: "Crispy wafer",
      score: 0.87,
      sourceUrl: "https://example.com/products/kitkat",
      title: "",
      category: "unknown",
      embeddingModelId: "text-embedding-3-small",
    });
  });

  it("maps nodes without a recorded model to an empty model id", () => {
    const hit = neo4jSearchHit({
      chunkId: "pg_1:0",
      content: "Crispy wafer",
      score: 0.5,
      sourceUrl: "https://example.com/products/kitkat",
      title: "KitKat",
      category: "product",
    });
    expect(hit.embeddingModelId).toBe("");
  });

  it("throws on rows missing required fields", () => {
    expect(() => neo4jSearchHit({ chunkId: "pg_1:0" })).toThrow();
  });
});

describe("pgvector row mapping", () => {
  it("converts numeric scores returned as strings", () => {
    expect(
      pgSearchHit({
        chunk_id: "pg_1:0",
        content: "Brownie recipe",
        page_url: "https://example.com/recipes/brownies",
        title: "Brownies",
        category: "recipe",
        embedding_model_id: "text-embedding-3-small",
        score: "0.5",
      }),
    ).toEqual({
      chunkId: "pg_1:0",
      content: "Brownie recipe",
      score: 0.5,
      sourceUrl: "https://example.com/recipes/brownies",
      title: "Brownies",
      category: "recipe",
      embeddingModelId: "text-embedding-3-small",
    });
  });
});
