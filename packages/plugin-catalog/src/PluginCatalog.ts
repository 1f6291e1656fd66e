import { resolve } from "path";
import type {
  ElementReference,
  LoadedElement,
  PluginDetail,
  PluginSummary,
} from "@plugin-catalog/shared-types";
import { MarketplaceScanner } from "./discovery/MarketplaceScanner.js";
import { ElementLoader } from "./loaders/ElementLoader.js";
import { ElementResolver } from "./loaders/ElementResolver.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import {
  DEFAULT_CACHE_CAPACITY,
  MarketplaceDirectoryCache,
  type CacheStats,
} from "./registry/MarketplaceDirectoryCache.js";
import { PluginIndex } from "./registry/PluginIndex.js";
import { getClaudeDir, getMarketplacesDir } from "./utils/paths.js";

export interface PluginCatalogOptions {
  /** Marketplaces directory. Defaults to <claudeDir>/plugins/marketplaces */
  marketplacesDir?: string;
  /** Claude config directory, used only when marketplacesDir is not given */
  claudeDir?: string;
  /** Max plugin names kept in the directory cache (default 128) */
  cacheCapacity?: number;
  logger?: Logger;
}

/**
 * Entry point for listing plugins and loading their elements.
 * Create one per process; the directory cache lives as long as it does.
 */
export class PluginCatalog {
  readonly marketplacesDir: string;

  private cache: MarketplaceDirectoryCache;
  private index: PluginIndex;
  private loader: ElementLoader;

  constructor(options: PluginCatalogOptions = {}) {
    this.marketplacesDir = resolve(
      options.marketplacesDir ?? getMarketplacesDir(getClaudeDir(options.claudeDir))
    );

    const logger = options.logger ?? defaultLogger;
    this.cache = new MarketplaceDirectoryCache(options.cacheCapacity ?? DEFAULT_CACHE_CAPACITY);

    const scanner = new MarketplaceScanner(logger.child({ component: "scanner" }));
    this.index = new PluginIndex(
      this.marketplacesDir,
      scanner,
      this.cache,
      logger.child({ component: "index" })
    );
    this.loader = new ElementLoader(
      this.index,
      new ElementResolver(logger.child({ component: "resolver" })),
      logger.child({ component: "loader" })
    );
  }

  /**
   * Summaries of every plugin in every marketplace.
   * Returns [] when the marketplaces directory doesn't exist.
   */
  async listPlugins(): Promise<PluginSummary[]> {
    return this.index.listAll();
  }

  /**
   * @throws PluginNotFoundError
   */
  async describePlugin(name: string): Promise<PluginDetail> {
    return this.index.describe(name);
  }

  /**
   * @throws InvalidCategoryError
   */
  async loadElements(pluginName: string, elements: ElementReference[]): Promise<LoadedElement[]> {
    return this.loader.loadMany(pluginName, elements);
  }

  /**
   * @throws InvalidCategoryError
   */
  async loadElement(
    pluginName: string,
    category: string,
    name: string
  ): Promise<LoadedElement | null> {
    return this.loader.loadOne(pluginName, category, name);
  }

  async locateMarketplaceDirectory(pluginName: string): Promise<string | null> {
    return this.index.locateDirectory(pluginName);
  }

  cacheStats(): CacheStats {
    return this.cache.stats();
  }
}
