import { stat } from "fs/promises";
import type { Stats } from "fs";
import { join, resolve as resolvePath } from "path";
import type { ElementCategory, ElementEntry } from "@plugin-catalog/shared-types";
import type { Logger } from "../logger.js";
import { PathEscapeError } from "../errors.js";
import { entryStem } from "../manifest/entries.js";
import { canonicalize, resolveWithin } from "../utils/path-guard.js";
import { SKILL_MANIFEST_FILE } from "../utils/paths.js";

/**
 * Whether a manifest path entry is the element the caller asked for.
 * "./skills/review.md" matches both "review" and "./skills/review.md".
 */
export function matchesEntry(entryPath: string, requestedName: string): boolean {
  return requestedName === entryStem(entryPath) || requestedName === entryPath;
}

/**
 * Turns (plugin, category, element name) into the file to read
 */
export class ElementResolver {
  constructor(private logger: Logger) {}

  /**
   * @param marketplaceDir - Marketplace directory the plugin was found in
   * @param pluginSource - Plugin `source`, relative to the marketplace directory
   * @param entries - The plugin's manifest entries for `category`, in order
   * @returns Absolute path of the first matching entry that exists, or null
   */
  async resolve(
    marketplaceDir: string,
    pluginSource: string,
    category: ElementCategory,
    entries: ElementEntry[],
    requestedName: string
  ): Promise<string | null> {
    // Entries are held inside the plugin root; the source itself may be a
    // symlink or a sibling directory of the marketplace
    let pluginRoot: string;
    try {
      pluginRoot = await canonicalize(resolvePath(marketplaceDir, pluginSource));
    } catch (error) {
      this.logger.warn({ err: error, marketplaceDir, pluginSource }, "Failed to resolve plugin source");
      return null;
    }

    for (const entry of entries) {
      // Object entries don't name a file
      if (entry.kind !== "path") continue;
      if (!matchesEntry(entry.path, requestedName)) continue;

      const target = await this.resolveEntry(pluginRoot, category, entry.path);
      if (target) {
        return target;
      }
    }

    return null;
  }

  private async resolveEntry(
    pluginRoot: string,
    category: ElementCategory,
    entryPath: string
  ): Promise<string | null> {
    const fullPath = await this.guard(pluginRoot, entryPath);
    if (!fullPath) return null;

    const stats = await statOrNull(fullPath);
    if (!stats) return null;

    if (category === "skills" && stats.isDirectory()) {
      const skillFile = await this.guard(pluginRoot, join(entryPath, SKILL_MANIFEST_FILE));
      if (!skillFile) return null;
      return (await statOrNull(skillFile))?.isFile() ? skillFile : null;
    }

    return stats.isFile() ? fullPath : null;
  }

  private async guard(root: string, relativePath: string): Promise<string | null> {
    try {
      return await resolveWithin(root, relativePath);
    } catch (error) {
      if (error instanceof PathEscapeError) {
        this.logger.warn({ root, path: relativePath }, "Rejected element path outside plugin directory");
      } else {
        this.logger.warn({ err: error, root, path: relativePath }, "Failed to resolve element path");
      }
      return null;
    }
  }
}

async function statOrNull(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch {
    return null;
  }
}
