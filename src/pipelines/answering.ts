import { SearchHit } from "../domain/types.js";
import { ChatMessage } from "../infra/ai/types.js";
import { truncate } from "../utils/text.js";

/** Hits passed to the chat model as context. */
export const ANSWER_CONTEXT_SIZE = 3;

const MAX_CONTEXT_CHARS = 1_500;

// Longer queries that merely open with a greeting still go to retrieval.
const SMALL_TALK_MAX_WORDS = 6;

const SMALL_TALK_PHRASES = [
  "hello",
  "hi",
  "hey",
  "how are you",
  "what's up",
  "whats up",
  "who are you",
  "what are you",
  "tell me a joke",
  "good morning",
  "good afternoon",
  "good evening",
  "thanks",
  "thank you",
];

const SYSTEM_PROMPT = [
  "You are a friendly assistant that answers questions about the products, recipes and articles on this website.",
  "Answer only from the provided context. If the context is insufficient, say so clearly.",
  "When it helps, point to the relevant pages by their links and cite context entries like [1], [2].",
].join(" ");

const SMALL_TALK_PROMPT = [
  "You are a friendly assistant for a product website.",
  "Reply briefly to the greeting or small talk and invite the user to ask about products, recipes or articles.",
].join(" ");

export function isSmallTalk(query: string): boolean {
  const words = query
    .toLowerCase()
    .replace(/[^\p{L}\p{N}']+/gu, " ")
    .trim()
    .split(" ")
    .filter((word) => word.length > 0);
  if (words.length === 0 || words.length > SMALL_TALK_MAX_WORDS) {
    return false;
  }

  const padded = ` ${words.join(" ")} `;
  return SMALL_TALK_PHRASES.some((phrase) => padded.includes(` ${phrase} `));
}

export function buildGroundedMessages(query: string, hits: SearchHit[]): ChatMessage[] {
  const contextBlock = hits
    .slice(0, ANSWER_CONTEXT_SIZE)
    .map(
      (hit, idx) =>
        `[${idx + 1}] ${hit.title || "Untitled"} (${hit.sourceUrl})\n${truncate(hit.content, MAX_CONTEXT_CHARS)}`,
    )
    .join("\n\n");

  return [
    { role: "system", content: SYSTEM_PROMPT },
    {
      role: "user",
      content: `Context:\n${contextBlock}\n\nQuestion: ${query}`,
    },
  ];
}

export function buildSmallTalkMessages(query: string): ChatMessage[] {
  return [
    { role: "system", content: SMALL_TALK_PROMPT },
    { role: "user", content: query },
  ];
}
