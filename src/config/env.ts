import { z } from "zod";
import { ConfigError } from "../domain/errors.js";
import { CATEGORIES, Category } from "../domain/types.js";
import { LogLevel } from "../utils/logger.js";

const booleanFlag = z.enum(["true", "false"]).transform((value) => value === "true");

const csvList = z
  .string()
  .transform((value) =>
    value
      .split(",")
      .map((item) => item.trim())
      .filter((item) => item.length > 0),
  );

const envSchema = z.object({
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
  DATA_DIR: z.string().default("data"),
  ARTIFACT_GZIP: booleanFlag.default("true"),

  SCRAPE_SEED_URLS: csvList.default(""),
  SCRAPE_MAX_DEPTH: z.coerce.number().int().min(0).default(2),
  SCRAPE_MAX_PAGES: z.coerce.number().int().positive().default(500),
  SCRAPE_CONCURRENCY: z.coerce.number().int().positive().default(6),
  SCRAPE_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  SCRAPE_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  SCRAPE_EXCLUDE_PATTERNS: csvList.default("recipe_tags_filter,/search"),
  SCRAPE_USER_AGENT: z
    .string()
    .default("Mozilla/5.0 (compatible; product-qa-ingest/0.1; +https://example.com/bot)"),

  CLASSIFY_MIN_OTHER_CHARS: z.coerce.number().int().min(0).default(200),

  SPLIT_STRATEGY: z.enum(["fixed", "delimiter"]).default("delimiter"),
  SPLIT_MAX_CHUNK_SIZE: z.coerce.number().int().positive().default(1000),
  SPLIT_OVERLAP_SIZE: z.coerce.number().int().min(0).default(100),
  SPLIT_LOOKBACK: z.coerce.number().int().min(0).default(200),
  SPLIT_EXCLUDE_CATEGORIES: csvList.default("navigation"),

  EMBEDDING_PROVIDER: z.enum(["none", "openai", "azure"]).optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().default("https://api.openai.com/v1"),
  OPENAI_EMBEDDING_MODEL: z.string().default("text-embedding-3-small"),
  OPENAI_CHAT_MODEL: z.string().default("gpt-4o-mini"),
  AZURE_OPENAI_ENDPOINT: z.string().url().optional(),
  AZURE_OPENAI_API_KEY: z.string().optional(),
  AZURE_OPENAI_EMBEDDING_DEPLOYMENT: z.string().optional(),
  AZURE_OPENAI_API_VERSION: z.string().default("2024-02-01"),
  VECTOR_DIMENSION: z.coerce.number().int().positive().default(1536),
  EMBED_BATCH_SIZE: z.coerce.number().int().positive().default(16),
  EMBED_CONCURRENCY: z.coerce.number().int().positive().default(4),
  EMBED_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  EMBED_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  GRAPH_STORE: z.enum(["memory", "file", "neo4j", "pgvector"]).default("file"),
  GRAPH_STORE_PATH: z.string().default(".data/graph-store.json"),
  GRAPH_STORE_MAX_BYTES: z.coerce.number().int().positive().default(200 * 1024 * 1024),
  NEO4J_URI: z.string().optional(),
  NEO4J_USER: z.string().optional(),
  NEO4J_PASSWORD: z.string().optional(),
  NEO4J_DATABASE: z.string().optional(),
  DATABASE_URL: z.string().optional(),
  UPLOAD_BATCH_SIZE: z.coerce.number().int().positive().default(500),
  UPLOAD_CONCURRENCY: z.coerce.number().int().positive().default(2),
  UPLOAD_MAX_ATTEMPTS: z.coerce.number().int().positive().default(3),
  UPLOAD_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1000),
  RETRY_MAX_DELAY_MS: z.coerce.number().int().min(0).default(10_000),

  ANSWER_MODE: z.enum(["none", "openai"]).default("none"),
  SEARCH_TOP_K: z.coerce.number().int().positive().max(50).default(5),
  GREETING: z
    .string()
    .default(
      "Hi! I'm your product assistant. Ask me anything about our products and recipes and I'll search the site for you.",
    ),
  MCP_TRANSPORT: z.enum(["stdio", "http"]).default("http"),
  MCP_HOST: z.string().default("0.0.0.0"),
  MCP_PORT: z.coerce.number().int().positive().default(8000),
});

export type EmbeddingProviderName = "none" | "openai" | "azure";
export type GraphStoreKind = "memory" | "file" | "neo4j" | "pgvector";
export type SplitStrategyName = "fixed" | "delimiter";

export interface RetryConfig {
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  logLevel: LogLevel;
  dataDir: string;
  artifactGzip: boolean;
  retry: RetryConfig;
  scrape: {
    seedUrls: string[];
    maxDepth: number;
    maxPages: number;
    concurrency: number;
    timeoutMs: number;
    maxAttempts: number;
    excludePatterns: string[];
    userAgent: string;
  };
  classify: {
    minOtherChars: number;
  };
  split: {
    strategy: SplitStrategyName;
    maxChunkSize: number;
    overlapSize: number;
    lookback: number;
    excludeCategories: Category[];
  };
  embedding: {
    provider: EmbeddingProviderName;
    openaiApiKey: string | null;
    openaiBaseUrl: string;
    model: string;
    azureEndpoint: string | null;
    azureApiKey: string | null;
    azureDeployment: string | null;
    azureApiVersion: string;
    vectorDimension: number;
    batchSize: number;
    concurrency: number;
    maxAttempts: number;
    timeoutMs: number;
  };
  store: {
    kind: GraphStoreKind;
    filePath: string;
    maxFileBytes: number;
    neo4jUri: string | null;
    neo4jUser: string | null;
    neo4jPassword: string | null;
    neo4jDatabase: string | null;
    databaseUrl: string | null;
    batchSize: number;
    concurrency: number;
    maxAttempts: number;
    timeoutMs: number;
  };
  server: {
    answerMode: "none" | "openai";
    chatModel: string;
    topK: number;
    greeting: string;
    transport: "stdio" | "http";
    host: string;
    port: number;
  };
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = envSchema.safeParse(withoutBlankValues(env));
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const parsed = result.data;

  if (parsed.SPLIT_OVERLAP_SIZE >= parsed.SPLIT_MAX_CHUNK_SIZE) {
    throw new ConfigError("SPLIT_OVERLAP_SIZE must be smaller than SPLIT_MAX_CHUNK_SIZE.");
  }

  const excludeCategories = parsed.SPLIT_EXCLUDE_CATEGORIES.map((name) => {
    if (!isCategory(name)) {
      throw new ConfigError(
        `Unknown category in SPLIT_EXCLUDE_CATEGORIES: ${name}. Allowed: ${CATEGORIES.join(", ")}`,
      );
    }
    return name;
  });

  const embeddingProvider =
    parsed.EMBEDDING_PROVIDER ??
    (parsed.AZURE_OPENAI_ENDPOINT ? "azure" : parsed.OPENAI_API_KEY ? "openai" : "none");

  if (
    embeddingProvider === "azure" &&
    (!parsed.AZURE_OPENAI_ENDPOINT ||
      !parsed.AZURE_OPENAI_API_KEY ||
      !parsed.AZURE_OPENAI_EMBEDDING_DEPLOYMENT)
  ) {
    throw new ConfigError(
      "EMBEDDING_PROVIDER=azure requires AZURE_OPENAI_ENDPOINT, AZURE_OPENAI_API_KEY and AZURE_OPENAI_EMBEDDING_DEPLOYMENT.",
    );
  }

  if (embeddingProvider === "openai" && !parsed.OPENAI_API_KEY) {
    throw new ConfigError("EMBEDDING_PROVIDER=openai requires OPENAI_API_KEY.");
  }

  if (parsed.GRAPH_STORE === "neo4j" && (!parsed.NEO4J_URI || !parsed.NEO4J_USER || !parsed.NEO4J_PASSWORD)) {
    throw new ConfigError("GRAPH_STORE=neo4j requires NEO4J_URI, NEO4J_USER and NEO4J_PASSWORD.");
  }

  if (parsed.GRAPH_STORE === "pgvector" && !parsed.DATABASE_URL) {
    throw new ConfigError("GRAPH_STORE=pgvector requires DATABASE_URL.");
  }

  if (parsed.ANSWER_MODE === "openai" && !parsed.OPENAI_API_KEY) {
    throw new ConfigError("ANSWER_MODE=openai requires OPENAI_API_KEY.");
  }

  return {
    logLevel: parsed.LOG_LEVEL,
    dataDir: parsed.DATA_DIR,
    artifactGzip: parsed.ARTIFACT_GZIP,
    retry: {
      baseDelayMs: parsed.RETRY_BASE_DELAY_MS,
      maxDelayMs: parsed.RETRY_MAX_DELAY_MS,
    },
    scrape: {
      seedUrls: parsed.SCRAPE_SEED_URLS,
      maxDepth: parsed.SCRAPE_MAX_DEPTH,
      maxPages: parsed.SCRAPE_MAX_PAGES,
      concurrency: parsed.SCRAPE_CONCURRENCY,
      timeoutMs: parsed.SCRAPE_TIMEOUT_MS,
      maxAttempts: parsed.SCRAPE_MAX_ATTEMPTS,
      excludePatterns: parsed.SCRAPE_EXCLUDE_PATTERNS,
      userAgent: parsed.SCRAPE_USER_AGENT,
    },
    classify: {
      minOtherChars: parsed.CLASSIFY_MIN_OTHER_CHARS,
    },
    split: {
      strategy: parsed.SPLIT_STRATEGY,
      maxChunkSize: parsed.SPLIT_MAX_CHUNK_SIZE,
      overlapSize: parsed.SPLIT_OVERLAP_SIZE,
      lookback: parsed.SPLIT_LOOKBACK,
      excludeCategories,
    },
    embedding: {
      provider: embeddingProvider,
      openaiApiKey: parsed.OPENAI_API_KEY ?? null,
      openaiBaseUrl: parsed.OPENAI_BASE_URL,
      model:
        embeddingProvider === "azure"
          ? (parsed.AZURE_OPENAI_EMBEDDING_DEPLOYMENT ?? parsed.OPENAI_EMBEDDING_MODEL)
          : parsed.OPENAI_EMBEDDING_MODEL,
      azureEndpoint: parsed.AZURE_OPENAI_ENDPOINT ?? null,
      azureApiKey: parsed.AZURE_OPENAI_API_KEY ?? null,
      azureDeployment: parsed.AZURE_OPENAI_EMBEDDING_DEPLOYMENT ?? null,
      azureApiVersion: parsed.AZURE_OPENAI_API_VERSION,
      vectorDimension: parsed.VECTOR_DIMENSION,
      batchSize: parsed.EMBED_BATCH_SIZE,
      concurrency: parsed.EMBED_CONCURRENCY,
      maxAttempts: parsed.EMBED_MAX_ATTEMPTS,
      timeoutMs: parsed.EMBED_TIMEOUT_MS,
    },
    store: {
      kind: parsed.GRAPH_STORE,
      filePath: parsed.GRAPH_STORE_PATH,
      maxFileBytes: parsed.GRAPH_STORE_MAX_BYTES,
      neo4jUri: parsed.NEO4J_URI ?? null,
      neo4jUser: parsed.NEO4J_USER ?? null,
      neo4jPassword: parsed.NEO4J_PASSWORD ?? null,
      neo4jDatabase: parsed.NEO4J_DATABASE ?? null,
      databaseUrl: parsed.DATABASE_URL ?? null,
      batchSize: parsed.UPLOAD_BATCH_SIZE,
      concurrency: parsed.UPLOAD_CONCURRENCY,
      maxAttempts: parsed.UPLOAD_MAX_ATTEMPTS,
      timeoutMs: parsed.UPLOAD_TIMEOUT_MS,
    },
    server: {
      answerMode: parsed.ANSWER_MODE,
      chatModel: parsed.OPENAI_CHAT_MODEL,
      topK: parsed.SEARCH_TOP_K,
      greeting: parsed.GREETING,
      transport: parsed.MCP_TRANSPORT,
      host: parsed.MCP_HOST,
      port: parsed.MCP_PORT,
    },
  };
}

function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

// `.env` files commonly leave keys present but empty.
function withoutBlankValues(env: NodeJS.ProcessEnv): Record<string, string> {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      cleaned[key] = value;
    }
  }
  return cleaned;
}
