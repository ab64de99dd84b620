import { z } from "zod";
import { EmbeddingError, ProviderHttpError } from "../../domain/errors.js";
import { fetchWithTimeout } from "../http/fetchWithTimeout.js";
import { ChatCompletionClient, ChatMessage, EmbeddingClient } from "./types.js";

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().int(),
    }),
  ),
});

const chatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({
        content: z.string().nullable(),
      }),
    }),
  ),
});

export interface OpenAiClientOptions {
  apiKey: string;
  baseUrl: string;
  embeddingModel: string;
  chatModel: string;
  timeoutMs: number;
  temperature?: number;
}

export class OpenAiClient implements EmbeddingClient, ChatCompletionClient {
  constructor(private readonly options: OpenAiClientOptions) {}

  get modelId(): string {
    return this.options.embeddingModel;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const body = await this.post(
      "/embeddings",
      { model: this.options.embeddingModel, input: texts },
      "OpenAI embeddings",
    );
    return parseEmbeddingResponse(body, texts.length);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    return embedding;
  }

  async complete(messages: ChatMessage[]): Promise<string> {
    const body = await this.post(
      "/chat/completions",
      {
        model: this.options.chatModel,
        temperature: this.options.temperature ?? 0.2,
        messages,
      },
      "OpenAI chat",
    );

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error("OpenAI chat returned an unexpected response shape.");
    }
    return parsed.data.choices[0]?.message.content?.trim() ?? "";
  }

  private async post(pathname: string, payload: unknown, label: string): Promise<unknown> {
    const url = `${this.options.baseUrl.replace(/\/+$/, "")}${pathname}`;
    return fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: {
          Authorization: `Bearer ${this.options.apiKey}`,
          "Content-Type": "application/json",
        },
        body: JSON.stringify(payload),
      },
      this.options.timeoutMs,
      async (response): Promise<unknown> => {
        if (!response.ok) {
          throw new ProviderHttpError(
            response.status,
            `${label} failed (${response.status}): ${await response.text()}`,
          );
        }
        return response.json();
      },
    );
  }
}

/**
 * Orders vectors by their `index` and checks there is exactly one per input.
 * Shared by every OpenAI-compatible provider.
 */
export function parseEmbeddingResponse(body: unknown, expectedCount: number): number[][] {
  const parsed = embeddingResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new EmbeddingError("Embedding provider returned an unexpected response shape.");
  }

  const items = [...parsed.data.data].sort((a, b) => a.index - b.index);
  if (items.length !== expectedCount) {
    throw new EmbeddingError(
      `Embedding provider returned ${items.length} vectors for ${expectedCount} inputs.`,
    );
  }
  return items.map((item) => item.embedding);
}
