import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import "dotenv/config";
import { loadConfig } from "./config/env.js";
import { createHttpApi, MCP_PATH, startHttpServer } from "./httpApi.js";
import { createAiClients } from "./infra/ai/createAiClients.js";
import { createGraphStore } from "./infra/store/createGraphStore.js";
import { createMcpServer } from "./mcpServer.js";
import { SearchService } from "./services/searchService.js";
import { Logger } from "./utils/logger.js";

async function main() {
  const config = loadConfig();
  const logger = new Logger(config.logLevel).child("server");

  if (config.embedding.provider === "none") {
    logger.warn("EMBEDDING_PROVIDER is none; /search will fail until a provider is configured.");
  }

  const store = createGraphStore(config);
  await store.initialize();
  const { embedding, chat } = createAiClients(config);
  const searchService = new SearchService(
    store,
    embedding,
    chat,
    { defaultTopK: config.server.topK, greeting: config.server.greeting },
    logger.child("search"),
  );

  const shutdownTasks: Array<() => Promise<void>> = [() => store.close()];

  if (config.server.transport === "http") {
    const api = createHttpApi({
      searchService,
      mcpServerFactory: () => createMcpServer(searchService),
      logger,
    });
    const running = await startHttpServer(api, config.server.host, config.server.port);
    shutdownTasks.unshift(running.stop);
    logger.info(
      `Listening on http://${config.server.host}:${running.port} (search at /search, MCP at ${MCP_PATH})`,
    );
  } else {
    const server = createMcpServer(searchService);
    await server.connect(new StdioServerTransport());
    shutdownTasks.unshift(() => server.close());
    logger.info("MCP stdio transport connected");
  }

  let shuttingDown = false;
  const shutdown = async () => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    for (const task of shutdownTasks) {
      await task();
    }
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed:", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((error) => {
  console.error("Failed to start server:", error);
  process.exit(1);
});
