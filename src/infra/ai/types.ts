export interface EmbeddingClient {
  /** Recorded on every embedded chunk so stores can tell vector spaces apart. */
  readonly modelId: string;
  /** One vector per input text, in input order. */
  embedTexts(texts: string[]): Promise<number[][]>;
  embedQuery(query: string): Promise<number[]>;
}

export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

export interface ChatCompletionClient {
  complete(messages: ChatMessage[]): Promise<string>;
}
