import { Command, InvalidArgumentError } from "commander";
import { PluginCatalog, createLogger, type Logger } from "@plugin-catalog/core";
import { loadConfig, type ServerConfig } from "../config/env.js";

export type GlobalOptions = {
  marketplacesDir?: string;
  cacheCapacity?: number;
};

export interface CommandContext {
  config: ServerConfig;
  logger: Logger;
  catalog: PluginCatalog;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("Expected a positive integer.");
  }
  return parsed;
}

/**
 * Build the catalog from env config, with global CLI flags taking precedence
 */
export function createContext(command: Command): CommandContext {
  const options = command.optsWithGlobals<GlobalOptions>();
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });

  const catalog = new PluginCatalog({
    marketplacesDir: options.marketplacesDir ?? config.marketplacesDir,
    claudeDir: config.claudeDir,
    cacheCapacity: options.cacheCapacity ?? config.cacheCapacity,
    logger,
  });

  return { config, logger, catalog };
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}
