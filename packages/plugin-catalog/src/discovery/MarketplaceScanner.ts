import { readFile, readdir, stat } from "fs/promises";
import { basename, join } from "path";
import type { Marketplace, PluginDefinition } from "@plugin-catalog/shared-types";
import type { Logger } from "../logger.js";
import { hasErrorCode } from "../errors.js";
import { marketplaceManifestSchema, pluginEntrySchema } from "../manifest/schema.js";
import { getMarketplaceManifestPath } from "../utils/paths.js";

/**
 * Reads every marketplace manifest under a marketplaces directory.
 *
 * Layout: `<marketplacesDir>/<marketplace>/.claude-plugin/marketplace.json`.
 * Nothing is cached here; every call goes back to disk.
 */
export class MarketplaceScanner {
  constructor(private logger: Logger) {}

  /**
   * Read all marketplaces. A missing marketplaces directory yields [].
   */
  async scan(marketplacesDir: string): Promise<Marketplace[]> {
    const marketplaces: Marketplace[] = [];
    for await (const marketplace of this.iterate(marketplacesDir)) {
      marketplaces.push(marketplace);
    }
    return marketplaces;
  }

  /**
   * Yield marketplaces one at a time so lookups can stop at the first hit.
   * Directories are visited in name order; that order is only meant to be
   * stable within a run, not a tie-break callers can rely on.
   */
  async *iterate(marketplacesDir: string): AsyncGenerator<Marketplace> {
    const directories = await this.listMarketplaceDirectories(marketplacesDir);
    for (const directory of directories) {
      const marketplace = await this.readMarketplace(directory);
      if (marketplace) {
        yield marketplace;
      }
    }
  }

  /**
   * Immediate subdirectories of the marketplaces directory (symlinks followed)
   */
  async listMarketplaceDirectories(marketplacesDir: string): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(marketplacesDir);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        this.logger.debug({ marketplacesDir }, "Marketplaces directory not found");
        return [];
      }
      throw error;
    }

    const directories: string[] = [];
    for (const entry of entries.sort()) {
      const candidate = join(marketplacesDir, entry);
      if (await isDirectory(candidate)) {
        directories.push(candidate);
      }
    }
    return directories;
  }

  /**
   * Read one marketplace directory's manifest.
   * Returns null when there is no manifest or it can't be used.
   */
  async readMarketplace(directory: string): Promise<Marketplace | null> {
    const manifestPath = getMarketplaceManifestPath(directory);

    let raw: string;
    try {
      raw = await readFile(manifestPath, "utf-8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT") || hasErrorCode(error, "ENOTDIR")) {
        return null;
      }
      this.logger.warn({ err: error, manifestPath }, "Skipping unreadable marketplace file");
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      this.logger.warn({ err: error, manifestPath }, "Skipping invalid marketplace file");
      return null;
    }

    const manifest = marketplaceManifestSchema.safeParse(json);
    if (!manifest.success) {
      this.logger.warn(
        { manifestPath, issues: manifest.error.issues },
        "Skipping marketplace file with unexpected shape"
      );
      return null;
    }

    const plugins: PluginDefinition[] = [];
    manifest.data.plugins.forEach((entry, index) => {
      const plugin = pluginEntrySchema.safeParse(entry);
      if (plugin.success) {
        plugins.push(plugin.data);
      } else {
        this.logger.warn(
          { manifestPath, index, issues: plugin.error.issues },
          "Skipping plugin entry without a name"
        );
      }
    });

    return {
      name: basename(directory),
      directory,
      owner: manifest.data.owner,
      metadata: manifest.data.metadata,
      plugins,
    };
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    // Broken symlink or entry removed mid-scan
    return false;
  }
}
