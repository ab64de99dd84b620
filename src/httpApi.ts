import { randomUUID } from "node:crypto";
import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { AddressInfo } from "node:net";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { isInitializeRequest } from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { toFailureReason } from "./domain/errors.js";
import { categorySchema } from "./domain/schemas.js";
import { MAX_TOP_K, SearchService } from "./services/searchService.js";
import { Logger } from "./utils/logger.js";

interface SessionEntry {
  server: McpServer;
  transport: StreamableHTTPServerTransport;
}

type SessionMap = Record<string, SessionEntry>;

export const MCP_PATH = "/mcp";

const MAX_BODY_BYTES = 1024 * 1024;

const CORS_HEADERS: Record<string, string> = {
  "Access-Control-Allow-Origin": "*",
  "Access-Control-Allow-Methods": "GET, POST, DELETE, OPTIONS",
  "Access-Control-Allow-Headers": "Content-Type, mcp-session-id, mcp-protocol-version",
  "Access-Control-Expose-Headers": "mcp-session-id",
};

const searchBodySchema = z.object({
  query: z.string().trim().min(1, "query must not be empty"),
  top_k: z.number().int().min(1).max(MAX_TOP_K).optional(),
  categories: z.array(categorySchema).optional(),
});

class HttpError extends Error {
  constructor(
    readonly status: number,
    message: string,
  ) {
    super(message);
    this.name = "HttpError";
  }
}

export interface HttpApiDependencies {
  searchService: SearchService;
  mcpServerFactory: () => McpServer;
  logger: Logger;
}

export interface HttpApi {
  handle(req: IncomingMessage, res: ServerResponse): Promise<void>;
  /** Closes open MCP sessions. */
  close(): Promise<void>;
}

export function createHttpApi({ searchService, mcpServerFactory, logger }: HttpApiDependencies): HttpApi {
  const sessions: SessionMap = {};

  const handle = async (req: IncomingMessage, res: ServerResponse): Promise<void> => {
    for (const [name, value] of Object.entries(CORS_HEADERS)) {
      res.setHeader(name, value);
    }

    try {
      const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);

      if (req.method === "OPTIONS") {
        res.writeHead(204);
        res.end();
        return;
      }

      if (url.pathname === MCP_PATH) {
        await handleMcp(req, res, sessions, mcpServerFactory);
        return;
      }

      if (url.pathname === "/healthz" || url.pathname === "/") {
        requireMethod(req, "GET");
        writeJson(res, 200, { ok: true });
        return;
      }

      if (url.pathname === "/greet") {
        requireMethod(req, "GET");
        writeJson(res, 200, { greeting: searchService.greet() });
        return;
      }

      if (url.pathname === "/search") {
        requireMethod(req, "POST");
        const parsed = searchBodySchema.safeParse(await readJsonBody(req));
        if (!parsed.success) {
          throw new HttpError(
            400,
            parsed.error.issues
              .map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`)
              .join("; "),
          );
        }

        const { query, top_k, categories } = parsed.data;
        try {
          const response = await searchService.search(query, { topK: top_k, categories });
          writeJson(res, 200, response);
        } catch (error) {
          logger.error(`Search failed: ${toFailureReason(error)}`);
          writeJson(res, 500, { error: "Search failed." });
        }
        return;
      }

      writeJson(res, 404, { error: "Not found" });
    } catch (error) {
      if (res.headersSent) {
        return;
      }
      if (error instanceof HttpError) {
        writeJson(res, error.status, { error: error.message });
        return;
      }
      logger.error(`Unhandled request error: ${toFailureReason(error)}`);
      writeJson(res, 500, { error: "Internal server error" });
    }
  };

  const close = async (): Promise<void> => {
    await Promise.all(
      Object.values(sessions).map(async (entry) => {
        await entry.transport.close();
        await entry.server.close();
      }),
    );
  };

  return { handle, close };
}

export interface RunningHttpServer {
  port: number;
  stop(): Promise<void>;
}

export async function startHttpServer(
  api: HttpApi,
  host: string,
  port: number,
): Promise<RunningHttpServer> {
  const httpServer: Server = createServer((req, res) => {
    void api.handle(req, res);
  });

  await new Promise<void>((resolve, reject) => {
    httpServer.once("error", reject);
    httpServer.listen(port, host, () => resolve());
  });

  const address = httpServer.address();
  const boundPort = isAddressInfo(address) ? address.port : port;

  return {
    port: boundPort,
    stop: async () => {
      await api.close();
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => {
          if (error) {
            reject(error);
            return;
          }
          resolve();
        });
      });
    },
  };
}

async function handleMcp(
  req: IncomingMessage,
  res: ServerResponse,
  sessions: SessionMap,
  serverFactory: () => McpServer,
): Promise<void> {
  if (req.method === "POST") {
    const body = await readJsonBody(req);
    await handleMcpPost(req, res, body, sessions, serverFactory);
    return;
  }

  if (req.method === "GET" || req.method === "DELETE") {
    const sessionId = getSessionId(req);
    const entry = sessionId ? sessions[sessionId] : undefined;
    if (!entry) {
      res.writeHead(400, { "Content-Type": "text/plain" });
      res.end("Missing or invalid mcp-session-id");
      return;
    }
    await entry.transport.handleRequest(req, res);
    return;
  }

  throw new HttpError(405, "Method not allowed");
}

async function handleMcpPost(
  req: IncomingMessage,
  res: ServerResponse,
  body: unknown,
  sessions: SessionMap,
  serverFactory: () => McpServer,
): Promise<void> {
  const sessionId = getSessionId(req);
  const existing = sessionId ? sessions[sessionId] : undefined;

  if (existing) {
    await existing.transport.handleRequest(req, res, body);
    return;
  }

  if (sessionId) {
    writeJsonRpcError(res, 404, -32001, "Session not found");
    return;
  }

  if (!isInitializeRequest(body)) {
    writeJsonRpcError(
      res,
      400,
      -32000,
      "Initialize request is required when session is not established",
    );
    return;
  }

  const server = serverFactory();
  const transport = new StreamableHTTPServerTransport({
    sessionIdGenerator: () => randomUUID(),
    onsessioninitialized: (newSessionId) => {
      sessions[newSessionId] = { server, transport };
    },
  });

  transport.onclose = () => {
    const closedSessionId = transport.sessionId;
    if (!closedSessionId) {
      return;
    }

    const entry = sessions[closedSessionId];
    if (!entry) {
      return;
    }

    delete sessions[closedSessionId];
    void entry.server.close();
  };

  await server.connect(transport);
  await transport.handleRequest(req, res, body);
}

function requireMethod(req: IncomingMessage, method: string): void {
  if (req.method !== method) {
    throw new HttpError(405, "Method not allowed");
  }
}

async function readJsonBody(req: IncomingMessage): Promise<unknown> {
  const chunks: Buffer[] = [];
  let size = 0;
  for await (const chunk of req) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    size += buffer.length;
    if (size > MAX_BODY_BYTES) {
      throw new HttpError(413, "Request body too large");
    }
    chunks.push(buffer);
  }

  const raw = Buffer.concat(chunks).toString("utf-8").trim();
  if (!raw) {
    return {};
  }

  try {
    return JSON.parse(raw);
  } catch {
    throw new HttpError(400, "Invalid JSON body");
  }
}

function getSessionId(req: IncomingMessage): string | null {
  const headerValue = req.headers["mcp-session-id"];
  if (!headerValue) {
    return null;
  }
  return Array.isArray(headerValue) ? headerValue[0] : headerValue;
}

function isAddressInfo(value: string | AddressInfo | null): value is AddressInfo {
  return value !== null && typeof value === "object";
}

function writeJson(res: ServerResponse, status: number, payload: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(payload));
}

function writeJsonRpcError(
  res: ServerResponse,
  httpCode: number,
  code: number,
  message: string,
) {
  res.writeHead(httpCode, { "Content-Type": "application/json" });
  res.end(
    JSON.stringify({
      jsonrpc: "2.0",
      error: { code, message },
      id: null,
    }),
  );
}
