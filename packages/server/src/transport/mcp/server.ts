import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  type CallToolResult,
  type Tool,
} from "@modelcontextprotocol/sdk/types.js";
import { z } from "zod";
import { isPluginCatalogError, type Logger, type PluginCatalog } from "@plugin-catalog/core";
import { elementReferenceSchema } from "../rest/routes/plugins.js";
import { errorResponse } from "../rest/server.js";
import { serializePluginDetail, type LoadElementsResult } from "../serialize.js";

const describePluginArgs = z.object({
  name: z.string().min(1),
});

const loadElementsArgs = z.object({
  pluginName: z.string().min(1),
  elements: z.array(elementReferenceSchema),
});

const elementReferenceJsonSchema = {
  type: "object",
  properties: {
    category: {
      type: "string",
      description: "One of skills, agents, commands",
    },
    name: {
      type: "string",
      description: "Entry filename without extension, or the entry path as written",
    },
  },
  required: ["category", "name"],
};

export const TOOLS: Tool[] = [
  {
    name: "list_plugins",
    description: "List every plugin across all installed marketplaces",
    inputSchema: { type: "object", properties: {} },
  },
  {
    name: "describe_plugin",
    description: "Get a plugin's full definition and the marketplace it comes from",
    inputSchema: {
      type: "object",
      properties: {
        name: { type: "string", description: "Plugin name" },
      },
      required: ["name"],
    },
  },
  {
    name: "load_elements",
    description: "Read skills, agents or commands from a plugin. Missing elements are left out.",
    inputSchema: {
      type: "object",
      properties: {
        pluginName: { type: "string", description: "Plugin name" },
        elements: { type: "array", items: elementReferenceJsonSchema },
      },
      required: ["pluginName", "elements"],
    },
  },
];

function textResult(payload: unknown, isError = false): CallToolResult {
  return {
    content: [{ type: "text", text: JSON.stringify(payload, null, 2) }],
    ...(isError && { isError }),
  };
}

function errorResult(error: unknown, logger: Logger): CallToolResult {
  if (error instanceof z.ZodError) {
    return textResult(
      errorResponse(
        "Invalid tool arguments",
        "VALIDATION_ERROR",
        error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      ),
      true
    );
  }
  if (isPluginCatalogError(error)) {
    return textResult(errorResponse(error.message, error.code), true);
  }
  logger.error({ err: error }, "Tool call failed");
  return textResult(errorResponse("Internal server error", "INTERNAL_ERROR"), true);
}

async function runTool(
  catalog: PluginCatalog,
  name: string,
  args: Record<string, unknown>
): Promise<unknown> {
  switch (name) {
    case "list_plugins":
      return catalog.listPlugins();
    case "describe_plugin": {
      const { name: pluginName } = describePluginArgs.parse(args);
      return serializePluginDetail(await catalog.describePlugin(pluginName));
    }
    case "load_elements": {
      const { pluginName, elements } = loadElementsArgs.parse(args);
      const result: LoadElementsResult = {
        pluginName,
        elements: await catalog.loadElements(pluginName, elements),
      };
      return result;
    }
    default:
      throw new Error(`Unknown tool: ${name}`);
  }
}

/**
 * MCP server exposing the catalog as tools. Connect it to a transport
 * (stdio for the CLI, in-memory in tests).
 */
export function createMcpServer({
  catalog,
  logger,
  version = "0.1.0",
}: {
  catalog: PluginCatalog;
  logger: Logger;
  version?: string;
}): Server {
  const server = new Server(
    {
      name: "plugin-catalog",
      version,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    if (!TOOLS.some((tool) => tool.name === name)) {
      throw new Error(`Unknown tool: ${name}`);
    }

    logger.debug({ tool: name }, "Tool call");
    try {
      return textResult(await runTool(catalog, name, args));
    } catch (error) {
      return errorResult(error, logger);
    }
  });

  return server;
}
