export const CATEGORIES = [
  "product",
  "recipe",
  "article",
  "navigation",
  "other",
  "unknown",
] as const;

export type Category = (typeof CATEGORIES)[number];

export interface PageImage {
  url: string;
  alt: string;
}

export interface PageRecord {
  url: string;
  title: string;
  text: string;
  fetchedAt: string;
  status: number;
  links: string[];
  images: PageImage[];
  category?: Category;
}

export interface ClassifiedPage extends PageRecord {
  category: Category;
}

export interface ChunkRecord {
  id: string;
  sourceUrl: string;
  title: string;
  index: number;
  text: string;
  startOffset: number;
  endOffset: number;
  category: Category;
}

export interface EmbeddedChunkRecord extends ChunkRecord {
  vector: number[];
  embeddingModelId: string;
}

export interface FailedItem {
  id: string;
  reason: string;
}

export interface ScrapeFailure {
  url: string;
  reason: string;
  status?: number;
  attempts: number;
}

export interface SearchHit {
  chunkId: string;
  content: string;
  score: number;
  sourceUrl: string;
  title: string;
  category: Category;
  /** Model that produced the stored vector; empty when the store has none recorded. */
  embeddingModelId: string;
}
