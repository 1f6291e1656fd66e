/**
 * Plugin element types (skills, agents, commands)
 */

export const ELEMENT_CATEGORIES = ["skills", "agents", "commands"] as const;

export type ElementCategory = (typeof ELEMENT_CATEGORIES)[number];

export function isElementCategory(value: string): value is ElementCategory {
  return (ELEMENT_CATEGORIES as readonly string[]).includes(value);
}

/**
 * Manifest entry given as a path relative to the plugin source
 * (e.g. "./agents/reviewer.md")
 */
export interface PathEntry {
  kind: "path";
  path: string;
}

/**
 * Manifest entry given as an object. Not resolvable to a file.
 */
export interface NamedEntry {
  kind: "named";
  /** Value of the object's `name` field, when it is a string */
  name?: string;
  /** The object as written in the manifest */
  fields: Record<string, unknown>;
}

export type ElementEntry = PathEntry | NamedEntry;

/**
 * What a caller asks to load
 */
export interface ElementReference {
  category: string;
  name: string;
}

/**
 * An element resolved on disk and read
 */
export interface LoadedElement {
  category: ElementCategory;
  /** The name the caller asked for */
  name: string;
  /** Absolute path of the file that was read */
  path: string;
  /** Raw file text */
  content: string;
  /** YAML front matter, empty when the file has none */
  frontmatter: Record<string, unknown>;
}
