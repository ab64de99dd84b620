import neo4j, { Driver } from "neo4j-driver";
import { z } from "zod";
import {
  GraphStore,
  GraphStoreStats,
  UpsertResult,
  VectorSearchInput,
} from "../../domain/graphStore.js";
import { parseCategory } from "../../domain/schemas.js";
import { EmbeddedChunkRecord, SearchHit } from "../../domain/types.js";
import { createPageId } from "../../utils/text.js";

export const VECTOR_INDEX_NAME = "chunk_embedding";

// The vector index is queried before the category filter applies, so filtered
// searches over-fetch by this factor.
const FILTERED_SEARCH_OVERFETCH = 10;

const CONSTRAINTS = [
  "CREATE CONSTRAINT chunk_id IF NOT EXISTS FOR (c:Chunk) REQUIRE c.id IS UNIQUE",
  "CREATE CONSTRAINT page_url IF NOT EXISTS FOR (p:Page) REQUIRE p.url IS UNIQUE",
  "CREATE CONSTRAINT category_name IF NOT EXISTS FOR (c:Category) REQUIRE c.name IS UNIQUE",
];

const UPSERT_QUERY = `
UNWIND $batch AS row
OPTIONAL MATCH (existing:Chunk {id: row.id})
WITH row, existing IS NOT NULL AS existed
MERGE (cat:Category {name: row.category})
MERGE (p:Page {url: row.sourceUrl})
SET p.id = row.pageId, p.title = row.title, p.category = row.category
FOREACH (stale IN [(p)-[r:IN_CATEGORY]->(other:Category) WHERE other.name <> row.category | r] |
  DELETE stale
)
MERGE (p)-[:IN_CATEGORY]->(cat)
MERGE (c:Chunk {id: row.id})
SET c.text = row.text,
    c.title = row.title,
    c.sourceUrl = row.sourceUrl,
    c.category = row.category,
    c.index = row.index,
    c.startOffset = row.startOffset,
    c.endOffset = row.endOffset,
    c.embedding = row.embedding,
    c.embeddingModelId = row.embeddingModelId
MERGE (c)-[:BELONGS_TO]->(p)
RETURN row.id AS id, existed
`;

const SEARCH_QUERY = `
CALL db.index.vector.queryNodes($indexName, $candidates, $embedding) YIELD node, score
WHERE $categories IS NULL OR node.category IN $categories
MATCH (node)-[:BELONGS_TO]->(p:Page)
RETURN node.id AS chunkId, node.text AS content, score, p.url AS sourceUrl, p.title AS title,
       node.category AS category, node.embeddingModelId AS embeddingModelId
ORDER BY score DESC
LIMIT $topK
`;

const STATS_QUERY = `
CALL { MATCH (p:Page) RETURN count(p) AS pages }
CALL { MATCH (c:Chunk) RETURN count(c) AS chunks }
CALL { MATCH (c:Category) RETURN count(c) AS categories }
CALL { MATCH (:Chunk)-[r:BELONGS_TO]->(:Page) RETURN count(r) AS belongsToEdges }
RETURN pages, chunks, categories, belongsToEdges
`;

const upsertRowSchema = z.object({ id: z.string(), existed: z.boolean() });

const searchRowSchema = z.object({
  chunkId: z.string(),
  content: z.string(),
  score: z.number(),
  sourceUrl: z.string(),
  title: z.string().nullable(),
  category: z.string().nullable(),
  embeddingModelId: z.string().nullable().default(null),
});

const statsRowSchema = z.object({
  pages: z.number(),
  chunks: z.number(),
  categories: z.number(),
  belongsToEdges: z.number(),
});

export interface Neo4jConnectionOptions {
  uri: string;
  user: string;
  password: string;
  database: string | null;
  timeoutMs: number;
}

export interface Neo4jChunkRow {
  id: string;
  pageId: string;
  sourceUrl: string;
  title: string;
  category: string;
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  embedding: number[];
  embeddingModelId: string;
}

export function createNeo4jDriver(options: Neo4jConnectionOptions): Driver {
  // Plain JS numbers in results; counts and offsets stay far below 2^53.
  return neo4j.driver(options.uri, neo4j.auth.basic(options.user, options.password), {
    disableLosslessIntegers: true,
    connectionTimeout: options.timeoutMs,
    connectionAcquisitionTimeout: options.timeoutMs,
  });
}

export class Neo4jGraphStore implements GraphStore {
  private initialized = false;

  constructor(
    private readonly driver: Driver,
    private readonly vectorDimension: number,
    private readonly database: string | null = null,
    private readonly timeoutMs: number | null = null,
  ) {}

  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.driver.verifyConnectivity();
    for (const statement of CONSTRAINTS) {
      await this.run(statement);
    }
    await this.run(
      `CREATE VECTOR INDEX ${VECTOR_INDEX_NAME} IF NOT EXISTS
       FOR (c:Chunk) ON (c.embedding)
       OPTIONS {indexConfig: {\`vector.dimensions\`: ${Math.floor(this.vectorDimension)}, \`vector.similarity_function\`: 'cosine'}}`,
    );

    this.initialized = true;
  }

  async upsertChunks(records: EmbeddedChunkRecord[]): Promise<UpsertResult[]> {
    await this.initialize();
    if (records.length === 0) {
      return [];
    }

    const rows = await this.run(UPSERT_QUERY, { batch: records.map(toNeo4jChunkRow) });
    return rows.map((row): UpsertResult => {
      const parsed = upsertRowSchema.parse(row);
      return { id: parsed.id, outcome: parsed.existed ? "updated" : "created" };
    });
  }

  async search(input: VectorSearchInput): Promise<SearchHit[]> {
    await this.initialize();

    const filtered = Boolean(input.categories && input.categories.length > 0);
    const candidates = filtered ? input.topK * FILTERED_SEARCH_OVERFETCH : input.topK;
    const rows = await this.run(SEARCH_QUERY, {
      indexName: VECTOR_INDEX_NAME,
      candidates: neo4j.int(candidates),
      embedding: input.queryEmbedding,
      categories: filtered ? input.categories : null,
      topK: neo4j.int(input.topK),
    });
    return rows.map(toSearchHit);
  }

  async stats(): Promise<GraphStoreStats> {
    await this.initialize();
    const [row] = await this.run(STATS_QUERY);
    return statsRowSchema.parse(row ?? { pages: 0, chunks: 0, categories: 0, belongsToEdges: 0 });
  }

  async close(): Promise<void> {
    await this.driver.close();
  }

  private async run(query: string, parameters: Record<string, unknown> = {}): Promise<Array<Record<string, unknown>>> {
    const { records } = await this.driver.executeQuery(query, parameters, {
      database: this.database ?? undefined,
      transactionConfig: this.timeoutMs === null ? undefined : { timeout: this.timeoutMs },
    });
    return records.map((record) => record.toObject());
  }
}

export function toNeo4jChunkRow(record: EmbeddedChunkRecord): Neo4jChunkRow {
  return {
    id: record.id,
    pageId: createPageId(record.sourceUrl),
    sourceUrl: record.sourceUrl,
    title: record.title,
    category: record.category,
    index: record.index,
    text: record.text,
    startOffset: record.startOffset,
    endOffset: record.endOffset,
    embedding: record.vector,
    embeddingModelId: record.embeddingModelId,
  };
}

export function toSearchHit(row: Record<string, unknown>): SearchHit {
  const parsed = searchRowSchema.parse(row);
  return {
    chunkId: parsed.chunkId,
    content: parsed.content,
    score: parsed.score,
    sourceUrl: parsed.sourceUrl,
    title: parsed.title ?? "",
    category: parseCategory(parsed.category),
    embeddingModelId: parsed.embeddingModelId ?? "",
  };
}
