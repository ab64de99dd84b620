import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { SearchService } from "../services/searchService.js";

export function registerGreetTool(server: McpServer, searchService: SearchService) {
  server.registerTool(
    "greet",
    {
      title: "Greet",
      description: "Returns the assistant's opening message.",
      inputSchema: {},
    },
    async () => ({
      content: [{ type: "text", text: searchService.greet() }],
    }),
  );
}
