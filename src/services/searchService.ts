import { GraphStore } from "../domain/graphStore.js";
import { Category, SearchHit } from "../domain/types.js";
import { ChatCompletionClient, EmbeddingClient } from "../infra/ai/types.js";
import {
  buildGroundedMessages,
  buildSmallTalkMessages,
  isSmallTalk,
} from "../pipelines/answering.js";
import { Logger } from "../utils/logger.js";

export const MAX_TOP_K = 50;

export interface SearchOptions {
  topK?: number;
  categories?: Category[];
}

export interface SearchResultItem {
  content: string;
  score: number;
  source_url: string;
  title: string;
  category: Category;
}

export interface SearchResponse {
  results: SearchResultItem[];
  answer?: string;
}

export interface SearchServiceOptions {
  defaultTopK: number;
  greeting: string;
}

export class SearchService {
  constructor(
    private readonly store: GraphStore,
    private readonly embedding: EmbeddingClient,
    private readonly chat: ChatCompletionClient | null,
    private readonly options: SearchServiceOptions,
    private readonly logger: Logger,
  ) {}

  greet(): string {
    return this.options.greeting;
  }

  /**
   * Embeds the query with the ingestion model and returns the nearest chunks,
   * best first. With a chat client, small talk skips retrieval and other
   * queries also get an answer grounded on the top hits.
   */
  async search(query: string, options: SearchOptions = {}): Promise<SearchResponse> {
    const trimmed = query.trim();
    const startedAt = Date.now();

    if (this.chat && isSmallTalk(trimmed)) {
      const answer = await this.chat.complete(buildSmallTalkMessages(trimmed));
      this.logger.debug(`Small talk answered in ${Date.now() - startedAt}ms`);
      return { results: [], answer };
    }

    const topK = clampTopK(options.topK ?? this.options.defaultTopK);
    const queryEmbedding = await this.embedding.embedQuery(trimmed);
    const hits = await this.store.search({
      queryEmbedding,
      topK,
      categories: options.categories,
    });

    this.warnOnModelMismatch(hits);

    const response: SearchResponse = { results: hits.map(toSearchResultItem) };
    if (this.chat) {
      response.answer = await this.chat.complete(buildGroundedMessages(trimmed, hits));
    }

    this.logger.debug(
      `Search returned ${hits.length} hits in ${Date.now() - startedAt}ms${response.answer !== undefined ? " with answer" : ""}`,
    );
    return response;
  }

  private warnOnModelMismatch(hits: SearchHit[]): void {
    const queryModel = this.embedding.modelId;
    const foreign = new Set(
      hits
        .map((hit) => hit.embeddingModelId)
        .filter((modelId) => modelId !== "" && modelId !== queryModel),
    );
    if (foreign.size > 0) {
      this.logger.warn(
        `Query embedded with ${queryModel} but hits were embedded with ${[...foreign].join(", ")}; scores are not comparable. Re-run the embed and upload stages with the same model.`,
      );
    }
  }
}

export function toSearchResultItem(hit: SearchHit): SearchResultItem {
  return {
    content: hit.content,
    score: Number(hit.score.toFixed(4)),
    source_url: hit.sourceUrl,
    title: hit.title,
    category: hit.category,
  };
}

function clampTopK(value: number): number {
  return Math.min(Math.max(1, Math.floor(value)), MAX_TOP_K);
}
