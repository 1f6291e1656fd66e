import { Command } from "commander";
import { parsePositiveInt } from "./commands/context.js";
import { createDescribeCommand } from "./commands/describe.js";
import { createListCommand } from "./commands/list.js";
import { createLoadCommand } from "./commands/load.js";
import { createMcpCommand } from "./commands/mcp.js";
import { createServeCommand } from "./commands/serve.js";

export function createProgram(): Command {
  const program = new Command();

  program
    .name("plugin-catalog")
    .description("Browse Claude plugin marketplaces and load plugin elements")
    .version("0.1.0")
    .option("--marketplaces-dir <dir>", "Marketplaces directory (default: PLUGIN_MARKETPLACES_DIR or <claude dir>/plugins/marketplaces)")
    .option("--cache-capacity <n>", "Plugin directory cache size (default: PLUGIN_CACHE_CAPACITY or 128)", parsePositiveInt);

  // Register all commands
  program.addCommand(createServeCommand());
  program.addCommand(createMcpCommand());
  program.addCommand(createListCommand());
  program.addCommand(createDescribeCommand());
  program.addCommand(createLoadCommand());

  return program;
}
