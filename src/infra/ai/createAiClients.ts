import { AppConfig } from "../../config/env.js";
import { ConfigError } from "../../domain/errors.js";
import { AzureOpenAiClient } from "./azureOpenAiClient.js";
import { OpenAiClient } from "./openAiClient.js";
import { ChatCompletionClient, EmbeddingClient } from "./types.js";

export interface AiClients {
  embedding: EmbeddingClient;
  /** null when ANSWER_MODE=none. */
  chat: ChatCompletionClient | null;
}

class DisabledEmbeddingClient implements EmbeddingClient {
  readonly modelId = "none";

  async embedTexts(): Promise<number[][]> {
    throw new ConfigError(
      "Embedding provider is disabled. Set EMBEDDING_PROVIDER to openai or azure.",
    );
  }

  async embedQuery(): Promise<number[]> {
    throw new ConfigError(
      "Embedding provider is disabled. Set EMBEDDING_PROVIDER to openai or azure.",
    );
  }
}

export function createAiClients(config: AppConfig): AiClients {
  const { embedding, server } = config;

  const openAi = embedding.openaiApiKey
    ? new OpenAiClient({
        apiKey: embedding.openaiApiKey,
        baseUrl: embedding.openaiBaseUrl,
        embeddingModel: embedding.model,
        chatModel: server.chatModel,
        timeoutMs: embedding.timeoutMs,
      })
    : null;

  return {
    embedding: createEmbeddingClient(config, openAi),
    chat: server.answerMode === "openai" ? openAi : null,
  };
}

function createEmbeddingClient(config: AppConfig, openAi: OpenAiClient | null): EmbeddingClient {
  const { embedding } = config;

  if (embedding.provider === "azure") {
    if (!embedding.azureEndpoint || !embedding.azureApiKey || !embedding.azureDeployment) {
      throw new ConfigError("Azure OpenAI embeddings need an endpoint, an API key and a deployment.");
    }
    return new AzureOpenAiClient({
      endpoint: embedding.azureEndpoint,
      apiKey: embedding.azureApiKey,
      deployment: embedding.azureDeployment,
      apiVersion: embedding.azureApiVersion,
      timeoutMs: embedding.timeoutMs,
    });
  }

  if (embedding.provider === "openai") {
    if (!openAi) {
      throw new ConfigError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
    }
    return openAi;
  }

  return new DisabledEmbeddingClient();
}
