import { Command } from "commander";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { createMcpServer } from "../transport/mcp/server.js";
import { createContext } from "./context.js";

export function createMcpCommand(): Command {
  return new Command("mcp")
    .description("Run the MCP tool server on stdio")
    .action(async (_options: object, command: Command) => {
      const { logger, catalog } = createContext(command);
      const server = createMcpServer({ catalog, logger });

      await server.connect(new StdioServerTransport());
      logger.info({ marketplacesDir: catalog.marketplacesDir }, "Plugin catalog MCP server running on stdio");
    });
}
