/**
 * Plugin catalog front ends
 *
 * @example
 * ```typescript
 * import { serve } from '@hono/node-server';
 * import { PluginCatalog, createLogger } from '@plugin-catalog/core';
 * import { createRestServer } from '@plugin-catalog/server';
 *
 * const logger = createLogger();
 * const app = createRestServer({ catalog: new PluginCatalog({ logger }), logger });
 * serve({ fetch: app.fetch, port: 8000 });
 * ```
 */

export { loadConfig, loadEnvFile, ConfigError, type ServerConfig, type Env } from "./config/env.js";
export { createRestServer, errorResponse, type ErrorBody } from "./transport/rest/server.js";
export {
  createPluginRoutes,
  elementReferenceSchema,
  loadElementsBodySchema,
} from "./transport/rest/routes/plugins.js";
export { createMcpServer, TOOLS } from "./transport/mcp/server.js";
export {
  serializePluginDetail,
  type SerializedPluginDetail,
  type LoadElementsResult,
} from "./transport/serialize.js";
export { createProgram } from "./program.js";
