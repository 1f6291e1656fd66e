import type {
  ManifestRecord,
  PluginDefinition,
  PluginDetail,
  PluginSummary,
} from "@plugin-catalog/shared-types";
import type { MarketplaceScanner } from "../discovery/MarketplaceScanner.js";
import type { Logger } from "../logger.js";
import { PluginNotFoundError } from "../errors.js";
import { extractElementNames } from "../manifest/entries.js";
import type { MarketplaceDirectoryCache } from "./MarketplaceDirectoryCache.js";

export function summarizePlugin(plugin: PluginDefinition): PluginSummary {
  return {
    name: plugin.name,
    description: plugin.description,
    agents: extractElementNames(plugin.agents),
    commands: extractElementNames(plugin.commands),
    skills: extractElementNames(plugin.skills),
  };
}

/**
 * `own` unless it is missing or an empty object
 */
function presentOr(
  own: ManifestRecord | undefined,
  fallback: ManifestRecord | undefined
): ManifestRecord | undefined {
  return own && Object.keys(own).length > 0 ? own : fallback;
}

/**
 * Plugin lookups across all marketplaces.
 *
 * listAll/describe always rescan so listings reflect what is on disk.
 * locateDirectory goes through the directory cache, since it runs before
 * every element load.
 */
export class PluginIndex {
  constructor(
    private marketplacesDir: string,
    private scanner: MarketplaceScanner,
    private cache: MarketplaceDirectoryCache,
    private logger: Logger
  ) {}

  /**
   * Summaries of every plugin in every marketplace, duplicates included
   */
  async listAll(): Promise<PluginSummary[]> {
    const marketplaces = await this.scanner.scan(this.marketplacesDir);
    return marketplaces.flatMap((marketplace) => marketplace.plugins.map(summarizePlugin));
  }

  /**
   * Full definition of the first plugin named `name`
   * @throws PluginNotFoundError
   */
  async describe(name: string): Promise<PluginDetail> {
    for await (const marketplace of this.scanner.iterate(this.marketplacesDir)) {
      const plugin = marketplace.plugins.find((p) => p.name === name);
      if (plugin) {
        return {
          ...plugin,
          owner: presentOr(plugin.owner, marketplace.owner),
          metadata: presentOr(plugin.metadata, marketplace.metadata),
          marketplace: marketplace.name,
          marketplaceDir: marketplace.directory,
        };
      }
    }
    throw new PluginNotFoundError(name);
  }

  /**
   * Directory of the first marketplace declaring `name`, or null.
   * Both outcomes are cached.
   */
  async locateDirectory(name: string): Promise<string | null> {
    const cached = this.cache.get(name);
    if (cached.hit) {
      this.logger.debug({ plugin: name, directory: cached.directory }, "Marketplace directory (cached)");
      return cached.directory;
    }

    let directory: string | null = null;
    for await (const marketplace of this.scanner.iterate(this.marketplacesDir)) {
      if (marketplace.plugins.some((p) => p.name === name)) {
        directory = marketplace.directory;
        break;
      }
    }

    this.cache.set(name, directory);
    if (directory === null) {
      this.logger.debug({ plugin: name }, "Plugin marketplace directory not found");
    }
    return directory;
  }

  /**
   * Re-read one marketplace's manifest and return the plugin named `name`
   */
  async definitionIn(marketplaceDir: string, name: string): Promise<PluginDefinition | null> {
    const marketplace = await this.scanner.readMarketplace(marketplaceDir);
    return marketplace?.plugins.find((p) => p.name === name) ?? null;
  }
}
