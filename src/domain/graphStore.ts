import { Category, EmbeddedChunkRecord, SearchHit } from "./types.js";

export type UpsertOutcome = "created" | "updated";

export interface UpsertResult {
  id: string;
  outcome: UpsertOutcome;
}

export interface VectorSearchInput {
  queryEmbedding: number[];
  topK: number;
  categories?: Category[];
}

export interface GraphStoreStats {
  pages: number;
  chunks: number;
  categories: number;
  belongsToEdges: number;
}

/**
 * Chunk/page/category graph with a vector property on chunks.
 * Every write is an upsert keyed by chunk id, page url and category name.
 */
export interface GraphStore {
  initialize(): Promise<void>;
  upsertChunks(records: EmbeddedChunkRecord[]): Promise<UpsertResult[]>;
  search(input: VectorSearchInput): Promise<SearchHit[]>;
  stats(): Promise<GraphStoreStats>;
  close(): Promise<void>;
}
