import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { realpath } from "node:fs/promises";
import { join } from "node:path";
import { Client } from "@modelcontextprotocol/sdk/client/index.js";
import { InMemoryTransport } from "@modelcontextprotocol/sdk/inMemory.js";
import { CallToolResultSchema } from "@modelcontextprotocol/sdk/types.js";
import { PluginCatalog } from "@plugin-catalog/core";
import {
  createTempDir,
  removeDir,
  silentLogger,
  writeFileAt,
  writeMarketplace,
} from "@plugin-catalog/core/testing";
import { createMcpServer } from "./server.js";

describe("MCP server", () => {
  let root: string;
  let marketplaceDir: string;
  let client: Client;

  beforeEach(async () => {
    root = await realpath(await createTempDir());
    marketplaceDir = await writeMarketplace(root, "acme", {
      metadata: { version: "2.0.0" },
      plugins: [
        {
          name: "demo",
          description: "Demo plugin",
          source: "./plugins/demo",
          commands: ["./commands/deploy.md"],
        },
      ],
    });
    await writeFileAt(join(marketplaceDir, "plugins", "demo", "commands", "deploy.md"), "Deploy it");

    const catalog = new PluginCatalog({ marketplacesDir: root, logger: silentLogger });
    const server = createMcpServer({ catalog, logger: silentLogger });
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();

    client = new Client({ name: "test-client", version: "1.0.0" });
    await Promise.all([server.connect(serverTransport), client.connect(clientTransport)]);
  });

  afterEach(async () => {
    await client.close();
    await removeDir(root);
  });

  async function callTool(name: string, args: Record<string, unknown> = {}) {
    const result = await client.request(
      { method: "tools/call", params: { name, arguments: args } },
      CallToolResultSchema
    );
    const [first] = result.content;
    if (first?.type !== "text") {
      throw new Error("Expected text content");
    }
    const body: unknown = JSON.parse(first.text);
    return { isError: result.isError ?? false, body };
  }

  it("lists the three tools", async () => {
    const { tools } = await client.listTools();

    expect(tools.map((tool) => tool.name)).toEqual([
      "list_plugins",
      "describe_plugin",
      "load_elements",
    ]);
  });

  it("lists plugins", async () => {
    await expect(callTool("list_plugins")).resolves.toEqual({
      isError: false,
      body: [
        { name: "demo", description: "Demo plugin", agents: [], commands: ["deploy"], skills: [] },
      ],
    });
  });

  it("describes a plugin with the marketplace metadata", async () => {
    const { isError, body } = await callTool("describe_plugin", { name: "demo" });

    expect(isError).toBe(false);
    expect(body).toMatchObject({
      name: "demo",
      commands: ["./commands/deploy.md"],
      metadata: { version: "2.0.0" },
      marketplace: "acme",
      marketplaceDir,
    });
  });

  it("loads elements", async () => {
    const { isError, body } = await callTool("load_elements", {
      pluginName: "demo",
      elements: [
        { category: "commands", name: "deploy" },
        { category: "commands", name: "rollback" },
      ],
    });

    expect(isError).toBe(false);
    expect(body).toEqual({
      pluginName: "demo",
      elements: [
        {
          category: "commands",
          name: "deploy",
          path: join(marketplaceDir, "plugins", "demo", "commands", "deploy.md"),
          content: "Deploy it",
          frontmatter: {},
        },
      ],
    });
  });

  it("reports unknown plugins as tool errors", async () => {
    await expect(callTool("describe_plugin", { name: "ghost" })).resolves.toEqual({
      isError: true,
      body: {
        error: "Plugin 'ghost' not found in any marketplace",
        code: "PLUGIN_NOT_FOUND",
      },
    });
  });

  it("reports invalid categories as tool errors", async () => {
    const { isError, body } = await callTool("load_elements", {
      pluginName: "demo",
      elements: [{ category: "scripts", name: "build" }],
    });

    expect(isError).toBe(true);
    expect(body).toMatchObject({ code: "INVALID_CATEGORY" });
  });

  it("validates tool arguments", async () => {
    const { isError, body } = await callTool("describe_plugin", {});

    expect(isError).toBe(true);
    expect(body).toMatchObject({ error: "Invalid tool arguments", code: "VALIDATION_ERROR" });
  });

  it("rejects unknown tools", async () => {
    await expect(callTool("delete_plugin")).rejects.toThrow("Unknown tool: delete_plugin");
  });
});
