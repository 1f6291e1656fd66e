import { Command } from "commander";
import { serve } from "@hono/node-server";
import { createRestServer } from "../transport/rest/server.js";
import { createContext, parsePositiveInt } from "./context.js";

interface ServeOptions {
  port?: number;
  host?: string;
}

export function createServeCommand(): Command {
  return new Command("serve")
    .description("Serve the REST API")
    .option("-p, --port <port>", "Port to listen on (default: PORT or 8000)", parsePositiveInt)
    .option("--host <host>", "Interface to bind (default: HOST or 127.0.0.1)")
    .action((options: ServeOptions, command: Command) => {
      const { config, logger, catalog } = createContext(command);
      const port = options.port ?? config.port;
      const hostname = options.host ?? config.host;

      const app = createRestServer({ catalog, logger });
      const server = serve({ fetch: app.fetch, port, hostname }, (info) => {
        logger.info(
          { port: info.port, host: hostname, marketplacesDir: catalog.marketplacesDir },
          "Plugin catalog REST API listening"
        );
      });

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down");
        server.close((error) => {
          if (error) {
            logger.error({ err: error }, "Error while closing server");
            process.exitCode = 1;
          }
        });
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });
}
