import { Hono } from "hono";
import { zValidator } from "@hono/zod-validator";
import { z } from "zod";
import type { PluginCatalog } from "@plugin-catalog/core";
import { serializePluginDetail, type LoadElementsResult } from "../../serialize.js";
import { errorResponse } from "../server.js";

export const elementReferenceSchema = z.object({
  category: z.string().min(1).max(64),
  name: z.string().min(1).max(256),
});

export const loadElementsBodySchema = z.object({
  elements: z.array(elementReferenceSchema),
});

export function createPluginRoutes(catalog: PluginCatalog) {
  const app = new Hono()

  /**
   * GET /plugins
   * Summaries of every plugin in every marketplace
   */
  .get("/", async (c) => {
    return c.json(await catalog.listPlugins());
  })

  /**
   * GET /plugins/:name
   * Full definition of the first plugin with this name
   */
  .get("/:name", async (c) => {
    const detail = await catalog.describePlugin(c.req.param("name"));
    return c.json(serializePluginDetail(detail));
  })

  /**
   * POST /plugins/:name/load-elements
   * Load the requested elements, dropping any that can't be found
   */
  .post(
    "/:name/load-elements",
    zValidator("json", loadElementsBodySchema, (result, c) => {
      if (!result.success) {
        return c.json(
          errorResponse(
            "Invalid request body",
            "VALIDATION_ERROR",
            result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          ),
          400
        );
      }
    }),
    async (c) => {
      const pluginName = c.req.param("name");
      const { elements } = c.req.valid("json");

      const result: LoadElementsResult = {
        pluginName,
        elements: await catalog.loadElements(pluginName, elements),
      };
      return c.json(result);
    }
  );

  return app;
}
