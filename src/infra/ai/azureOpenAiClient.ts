import { ProviderHttpError } from "../../domain/errors.js";
import { fetchWithTimeout } from "../http/fetchWithTimeout.js";
import { parseEmbeddingResponse } from "./openAiClient.js";
import { EmbeddingClient } from "./types.js";

export interface AzureOpenAiClientOptions {
  endpoint: string;
  apiKey: string;
  deployment: string;
  apiVersion: string;
  timeoutMs: number;
}

/** Embeddings through an Azure OpenAI deployment (`api-key` auth). */
export class AzureOpenAiClient implements EmbeddingClient {
  constructor(private readonly options: AzureOpenAiClientOptions) {}

  get modelId(): string {
    return `azure:${this.options.deployment}`;
  }

  async embedTexts(texts: string[]): Promise<number[][]> {
    if (texts.length === 0) {
      return [];
    }

    const endpoint = this.options.endpoint.replace(/\/+$/, "");
    const url = `${endpoint}/openai/deployments/${encodeURIComponent(this.options.deployment)}/embeddings?api-version=${encodeURIComponent(this.options.apiVersion)}`;

    const body = await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: {
          "api-key": this.options.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ input: texts }),
      },
      this.options.timeoutMs,
      async (response): Promise<unknown> => {
        if (!response.ok) {
          throw new ProviderHttpError(
            response.status,
            `Azure OpenAI embeddings failed (${response.status}): ${await response.text()}`,
          );
        }
        return response.json();
      },
    );
    return parseEmbeddingResponse(body, texts.length);
  }

  async embedQuery(query: string): Promise<number[]> {
    const [embedding] = await this.embedTexts([query]);
    return embedding;
  }
}
