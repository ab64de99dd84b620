import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { categorySchema } from "../domain/schemas.js";
import { MAX_TOP_K, SearchService } from "../services/searchService.js";

export function registerSearchChunksTool(server: McpServer, searchService: SearchService) {
  server.registerTool(
    "search_chunks",
    {
      title: "Search Chunks",
      description:
        "Retrieves the page chunks closest to a query, optionally limited to some categories.",
      inputSchema: {
        query: z.string().trim().min(1).describe("Search query"),
        top_k: z.number().int().min(1).max(MAX_TOP_K).optional().describe("Max hits"),
        categories: z
          .array(categorySchema)
          .optional()
          .describe("Only return chunks of these categories"),
      },
    },
    async ({ query, top_k, categories }) => {
      const response = await searchService.search(query, { topK: top_k, categories });

      return {
        content: [
          {
            type: "text",
            text: JSON.stringify({ query, ...response }, null, 2),
          },
        ],
      };
    },
  );
}
