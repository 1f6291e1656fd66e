#!/usr/bin/env node
/**
 * plugin-catalog CLI
 *
 * Commands:
 *   serve      Serve the REST API
 *   mcp        Run the MCP tool server on stdio
 *   list       List plugins
 *   describe   Show one plugin
 *   load       Load plugin elements
 */

import { isPluginCatalogError } from "@plugin-catalog/core";
import { ConfigError, loadEnvFile } from "./config/env.js";
import { createProgram } from "./program.js";

loadEnvFile();

createProgram()
  .parseAsync()
  .catch((error: unknown) => {
    if (isPluginCatalogError(error)) {
      console.error(`Error [${error.code}]: ${error.message}`);
    } else if (error instanceof ConfigError) {
      console.error(error.message);
    } else {
      console.error("Error:", error);
    }
    process.exitCode = 1;
  });
