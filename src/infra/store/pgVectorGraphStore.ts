import { Pool } from "pg";
import {
  GraphStore,
  GraphStoreStats,
  UpsertResult,
  VectorSearchInput,
} from "../../domain/graphStore.js";
import { parseCategory } from "../../domain/schemas.js";
import { EmbeddedChunkRecord, SearchHit } from "../../domain/types.js";
import { createPageId } from "../../utils/text.js";
import { toVectorLiteral } from "../../utils/vector.js";

export interface PgSearchRow {
  chunk_id: string;
  content: string;
  page_url: string;
  title: string;
  category: string;
  embedding_model_id: string;
  score: number | string;
}

/**
 * The same graph in relational form: `categories <- pages <- chunks`, where
 * the foreign keys play the part of IN_CATEGORY and BELONGS_TO.
 */
export class PgVectorGraphStore implements GraphStore {
  private initialized = false;

  constructor(
    private readonly pool: Pool,
    private readonly vectorDimension: number,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.pool.query(`CREATE EXTENSION IF NOT EXISTS vector`);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS categories (
        name TEXT PRIMARY KEY
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS pages (
        url TEXT PRIMARY KEY,
        id TEXT NOT NULL UNIQUE,
        title TEXT NOT NULL,
        category TEXT NOT NULL REFERENCES categories(name),
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`
      CREATE TABLE IF NOT EXISTS chunks (
        id TEXT PRIMARY KEY,
        page_url TEXT NOT NULL REFERENCES pages(url) ON DELETE CASCADE,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        start_offset INTEGER NOT NULL,
        end_offset INTEGER NOT NULL,
        category TEXT NOT NULL,
        embedding VECTOR(${this.vectorDimension}) NOT NULL,
        embedding_model_id TEXT NOT NULL,
        updated_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )
    `);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS idx_chunks_page_url ON chunks(page_url)`);
    await this.pool.query(`CREATE INDEX IF NOT EXISTS idx_chunks_category ON chunks(category)`);
    await this.pool.query(`
      CREATE INDEX IF NOT EXISTS idx_chunks_embedding
      ON chunks USING ivfflat (embedding vector_cosine_ops)
      WITH (lists = 100)
    `);

    this.initialized = true;
  }

  async upsertChunks(records: EmbeddedChunkRecord[]): Promise<UpsertResult[]> {
    await this.initialize();
    if (records.length === 0) {
      return [];
    }

    const client = await this.pool.connect();
    try {
      await client.query("BEGIN");

      const results: UpsertResult[] = [];
      for (const record of records) {
        await client.query(
          `INSERT INTO categories (name) VALUES ($1) ON CONFLICT (name) DO NOTHING`,
          [record.category],
        );
        await client.query(
          `
            INSERT INTO pages (url, id, title, category, updated_at)
            VALUES ($1, $2, $3, $4, NOW())
            ON CONFLICT (url)
            DO UPDATE SET title = EXCLUDED.title, category = EXCLUDED.category, updated_at = NOW()
          `,
          [record.sourceUrl, createPageId(record.sourceUrl), record.title, record.category],
        );
        const chunkResult = await client.query<{ inserted: boolean }>(
          `
            INSERT INTO chunks (
              id, page_url, chunk_index, content, start_offset, end_offset,
              category, embedding, embedding_model_id, updated_at
            )
            VALUES ($1, $2, $3, $4, $5, $6, $7, $8::vector, $9, NOW())
            ON CONFLICT (id)
            DO UPDATE SET
              chunk_index = EXCLUDED.chunk_index,
              content = EXCLUDED.content,
              start_offset = EXCLUDED.start_offset,
              end_offset = EXCLUDED.end_offset,
              category = EXCLUDED.category,
              embedding = EXCLUDED.embedding,
              embedding_model_id = EXCLUDED.embedding_model_id,
              updated_at = NOW()
            RETURNING (xmax = 0) AS inserted
          `,
          [
            record.id,
            record.sourceUrl,
            record.index,
            record.text,
            record.startOffset,
            record.endOffset,
            record.category,
            toVectorLiteral(record.vector),
            record.embeddingModelId,
          ],
        );
        results.push({
          id: record.id,
          outcome: chunkResult.rows[0]?.inserted ? "created" : "updated",
        });
      }

      await client.query("COMMIT");
      return results;
    } catch (error) {
      await client.query("ROLLBACK");
      throw error;
    } finally {
      client.release();
    }
  }

  async search(input: VectorSearchInput): Promise<SearchHit[]> {
    await this.initialize();

    const result = await this.pool.query<PgSearchRow>(
      `
        SELECT
          c.id AS chunk_id,
          c.content,
          p.url AS page_url,
          p.title,
          c.category,
          c.embedding_model_id,
          (1 - (c.embedding <=> $1::vector)) AS score
        FROM chunks c
        JOIN pages p ON p.url = c.page_url
        WHERE ($2::text[] IS NULL OR c.category = ANY($2::text[]))
        ORDER BY c.embedding <=> $1::vector
        LIMIT $3
      `,
      [
        toVectorLiteral(input.queryEmbedding),
        input.categories?.length ? input.categories : null,
        input.topK,
      ],
    );

    return result.rows.map(toSearchHit);
  }

  async stats(): Promise<GraphStoreStats> {
    await this.initialize();
    const result = await this.pool.query<{ pages: string; chunks: string; categories: string }>(`
      SELECT
        (SELECT COUNT(*) FROM pages)::text AS pages,
        (SELECT COUNT(*) FROM chunks)::text AS chunks,
        (SELECT COUNT(*) FROM categories)::text AS categories
    `);
    const row = result.rows[0];
    const chunks = Number(row?.chunks ?? 0);
    return {
      pages: Number(row?.pages ?? 0),
      chunks,
      categories: Number(row?.categories ?? 0),
      belongsToEdges: chunks,
    };
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

export function toSearchHit(row: PgSearchRow): SearchHit {
  return {
    chunkId: row.chunk_id,
    content: row.content,
    score: Number(row.score),
    sourceUrl: row.page_url,
    title: row.title,
    category: parseCategory(row.category),
    embeddingModelId: row.embedding_model_id,
  };
}
