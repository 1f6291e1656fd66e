import { readFile } from "fs/promises";
import {
  isElementCategory,
  type ElementCategory,
  type ElementReference,
  type LoadedElement,
} from "@plugin-catalog/shared-types";
import type { Logger } from "../logger.js";
import { InvalidCategoryError } from "../errors.js";
import type { PluginIndex } from "../registry/PluginIndex.js";
import { parseFrontmatter } from "../utils/frontmatter.js";
import type { ElementResolver } from "./ElementResolver.js";

/**
 * @throws InvalidCategoryError when `category` is not skills, agents or commands
 */
export function assertCategory(category: string): ElementCategory {
  if (!isElementCategory(category)) {
    throw new InvalidCategoryError(category);
  }
  return category;
}

/**
 * Loader for plugin element contents (skills, agents, commands).
 *
 * Anything missing along the way (plugin, source, entry, file) yields
 * "nothing loaded" rather than an error.
 */
export class ElementLoader {
  constructor(
    private index: PluginIndex,
    private resolver: ElementResolver,
    private logger: Logger
  ) {}

  /**
   * Load a single element
   * @throws InvalidCategoryError before touching the filesystem
   */
  async loadOne(
    pluginName: string,
    category: string,
    elementName: string
  ): Promise<LoadedElement | null> {
    return this.load(pluginName, assertCategory(category), elementName);
  }

  /**
   * Load several elements of one plugin. Output keeps input order and
   * omits whatever could not be loaded.
   * @throws InvalidCategoryError if any reference has an unknown category
   */
  async loadMany(pluginName: string, references: ElementReference[]): Promise<LoadedElement[]> {
    // Validate every category up front so a bad batch fails before any reads
    const requests = references.map((ref) => ({
      category: assertCategory(ref.category),
      name: ref.name,
    }));

    const loaded: LoadedElement[] = [];
    for (const request of requests) {
      if (!request.name) continue;

      const element = await this.load(pluginName, request.category, request.name);
      if (element) {
        loaded.push(element);
      }
    }
    return loaded;
  }

  private async load(
    pluginName: string,
    category: ElementCategory,
    elementName: string
  ): Promise<LoadedElement | null> {
    const marketplaceDir = await this.index.locateDirectory(pluginName);
    if (!marketplaceDir) {
      return null;
    }

    // Read the definition from the same manifest the directory came from
    const plugin = await this.index.definitionIn(marketplaceDir, pluginName);
    if (!plugin?.source) {
      return null;
    }

    const entries = plugin[category];
    if (entries.length === 0) {
      return null;
    }

    const path = await this.resolver.resolve(
      marketplaceDir,
      plugin.source,
      category,
      entries,
      elementName
    );
    if (!path) {
      this.logger.debug(
        { plugin: pluginName, category, element: elementName },
        "Element not found in plugin"
      );
      return null;
    }

    let content: string;
    try {
      content = await readFile(path, "utf-8");
    } catch (error) {
      this.logger.warn({ err: error, path }, "Failed to read element file");
      return null;
    }

    this.logger.info(
      { plugin: pluginName, category, element: elementName },
      "Loaded plugin element"
    );

    return {
      category,
      name: elementName,
      path,
      content,
      frontmatter: parseFrontmatter(content).data,
    };
  }
}
