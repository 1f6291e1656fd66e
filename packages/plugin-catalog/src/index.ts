// Main exports
export { PluginCatalog, type PluginCatalogOptions } from "./PluginCatalog.js";

// Errors
export {
  PluginCatalogError,
  PathEscapeError,
  PluginNotFoundError,
  InvalidCategoryError,
  isPluginCatalogError,
  type PluginCatalogErrorCode,
} from "./errors.js";

// Components for advanced usage
export { MarketplaceScanner } from "./discovery/MarketplaceScanner.js";
export { PluginIndex, summarizePlugin } from "./registry/PluginIndex.js";
export {
  MarketplaceDirectoryCache,
  DEFAULT_CACHE_CAPACITY,
  type CacheStats,
  type CacheLookup,
} from "./registry/MarketplaceDirectoryCache.js";
export { ElementResolver, matchesEntry } from "./loaders/ElementResolver.js";
export { ElementLoader, assertCategory } from "./loaders/ElementLoader.js";
export { toElementEntry, toManifestEntry, extractElementNames } from "./manifest/entries.js";

// Logging
export { createLogger, logger, LOG_LEVELS, type Logger, type LogLevel } from "./logger.js";

// Utility exports
export * from "./utils/paths.js";
export * from "./utils/path-guard.js";
export * from "./utils/frontmatter.js";

export * from "@plugin-catalog/shared-types";
