import {
  GraphStore,
  GraphStoreStats,
  UpsertResult,
  VectorSearchInput,
} from "../../domain/graphStore.js";
import { Category, EmbeddedChunkRecord, SearchHit } from "../../domain/types.js";
import { cosineSimilarity } from "../../utils/vector.js";

export interface StoredPage {
  url: string;
  title: string;
  category: Category;
}

export interface StoredChunk {
  id: string;
  sourceUrl: string;
  title: string;
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  category: Category;
  embedding: number[];
  embeddingModelId: string;
}

export interface InMemoryGraphSnapshot {
  pages: StoredPage[];
  chunks: StoredChunk[];
  categories: Category[];
}

/**
 * Graph kept in maps. Each chunk has one BELONGS_TO edge (its `sourceUrl`)
 * and each page one IN_CATEGORY edge (its `category`), so edges cannot be
 * duplicated by construction.
 */
export class InMemoryGraphStore implements GraphStore {
  protected pageByUrl = new Map<string, StoredPage>();

  protected chunkById = new Map<string, StoredChunk>();

  protected categoryNames = new Set<Category>();

  async initialize(): Promise<void> {}

  async upsertChunks(records: EmbeddedChunkRecord[]): Promise<UpsertResult[]> {
    return records.map((record): UpsertResult => {
      const outcome = this.chunkById.has(record.id) ? "updated" : "created";
      this.chunkById.set(record.id, toStoredChunk(record));
      this.pageByUrl.set(record.sourceUrl, {
        url: record.sourceUrl,
        title: record.title,
        category: record.category,
      });
      this.categoryNames.add(record.category);
      return { id: record.id, outcome };
    });
  }

  async search(input: VectorSearchInput): Promise<SearchHit[]> {
    const allowed = input.categories && input.categories.length > 0 ? new Set(input.categories) : null;
    const hits: SearchHit[] = [];

    for (const chunk of this.chunkById.values()) {
      if (allowed && !allowed.has(chunk.category)) {
        continue;
      }
      const score = cosineSimilarity(input.queryEmbedding, chunk.embedding);
      if (score <= 0) {
        continue;
      }
      hits.push({
        chunkId: chunk.id,
        content: chunk.text,
        score,
        sourceUrl: chunk.sourceUrl,
        title: chunk.title,
        category: chunk.category,
        embeddingModelId: chunk.embeddingModelId,
      });
    }

    return hits
      .sort((a, b) => b.score - a.score || a.chunkId.localeCompare(b.chunkId))
      .slice(0, input.topK);
  }

  async stats(): Promise<GraphStoreStats> {
    return {
      pages: this.pageByUrl.size,
      chunks: this.chunkById.size,
      categories: this.categoryNames.size,
      belongsToEdges: this.chunkById.size,
    };
  }

  async close(): Promise<void> {}

  getChunk(id: string): StoredChunk | undefined {
    return this.chunkById.get(id);
  }

  getPage(url: string): StoredPage | undefined {
    return this.pageByUrl.get(url);
  }

  protected exportSnapshot(): InMemoryGraphSnapshot {
    return {
      pages: [...this.pageByUrl.values()]
        .map((page) => ({ ...page }))
        .sort((a, b) => a.url.localeCompare(b.url)),
      chunks: [...this.chunkById.values()]
        .map((chunk) => ({ ...chunk, embedding: [...chunk.embedding] }))
        .sort((a, b) => a.id.localeCompare(b.id)),
      categories: [...this.categoryNames].sort(),
    };
  }

  protected importSnapshot(snapshot: InMemoryGraphSnapshot): void {
    this.pageByUrl.clear();
    this.chunkById.clear();
    this.categoryNames.clear();

    for (const page of snapshot.pages) {
      this.pageByUrl.set(page.url, { ...page });
    }
    for (const chunk of snapshot.chunks) {
      this.chunkById.set(chunk.id, { ...chunk, embedding: [...chunk.embedding] });
    }
    for (const category of snapshot.categories) {
      this.categoryNames.add(category);
    }
  }
}

function toStoredChunk(record: EmbeddedChunkRecord): StoredChunk {
  return {
    id: record.id,
    sourceUrl: record.sourceUrl,
    title: record.title,
    index: record.index,
    text: record.text,
    startOffset: record.startOffset,
    endOffset: record.endOffset,
    category: record.category,
    embedding: [...record.vector],
    embeddingModelId: record.embeddingModelId,
  };
}
