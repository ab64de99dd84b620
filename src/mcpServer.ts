import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { SearchService } from "./services/searchService.js";
import { registerGreetTool } from "./tools/greet.js";
import { registerSearchChunksTool } from "./tools/searchChunks.js";

export const SERVER_NAME = "product-qa-ingest";
export const SERVER_VERSION = "0.1.0";

export function createMcpServer(searchService: SearchService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
  });

  server.registerTool(
    "health_check",
    {
      title: "Health Check",
      description: "Returns basic server status.",
      inputSchema: {
        name: z.string().optional().describe("Optional caller name"),
      },
    },
    async ({ name }) => {
      const who = name?.trim() || "anonymous";
      return {
        content: [
          {
            type: "text",
            text: `${SERVER_NAME} is running. hello ${who}`,
          },
        ],
      };
    },
  );

  registerGreetTool(server, searchService);
  registerSearchChunksTool(server, searchService);

  return server;
}
