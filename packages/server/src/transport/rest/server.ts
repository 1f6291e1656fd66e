import { Hono } from "hono";
import { logger as requestLogger } from "hono/logger";
import { HTTPException } from "hono/http-exception";
import {
  isPluginCatalogError,
  type Logger,
  type PluginCatalog,
  type PluginCatalogError,
} from "@plugin-catalog/core";
import { createPluginRoutes } from "./routes/plugins.js";

export interface ErrorBody {
  error: string;
  code?: string;
  details?: unknown;
}

/**
 * Error response helper
 */
export function errorResponse(message: string, code?: string, details?: unknown): ErrorBody {
  return {
    error: message,
    ...(code && { code }),
    ...(details !== undefined && { details }),
  };
}

function statusFor(error: PluginCatalogError): 400 | 404 | null {
  switch (error.code) {
    case "PLUGIN_NOT_FOUND":
      return 404;
    case "INVALID_CATEGORY":
      return 400;
    default:
      return null;
  }
}

export const createRestServer = ({
  catalog,
  logger,
}: {
  catalog: PluginCatalog;
  logger: Logger;
}) => {
  const app = new Hono()

  // Middleware
  .use("*", requestLogger((message) => logger.info(message)))

  // Global error handler
  .onError((err, c) => {
    if (err instanceof HTTPException) {
      return c.json(errorResponse(err.message || "Request failed"), err.status);
    }

    if (isPluginCatalogError(err)) {
      const status = statusFor(err);
      if (status !== null) {
        return c.json(errorResponse(err.message, err.code), status);
      }
    }

    logger.error({ err, path: c.req.path }, "Unexpected error");
    return c.json(errorResponse("Internal server error", "INTERNAL_ERROR"), 500);
  })

  .get("/health", (c) => c.json({ status: "ok" }))

  .route("/plugins", createPluginRoutes(catalog));

  return app;
};
