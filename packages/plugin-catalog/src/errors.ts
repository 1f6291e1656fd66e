import { ELEMENT_CATEGORIES } from "@plugin-catalog/shared-types";

export type PluginCatalogErrorCode =
  | "PATH_ESCAPE"
  | "PLUGIN_NOT_FOUND"
  | "INVALID_CATEGORY";

/**
 * Base class for errors the catalog surfaces to its callers
 */
export class PluginCatalogError extends Error {
  constructor(
    message: string,
    readonly code: PluginCatalogErrorCode
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A path resolved outside the root it was supposed to stay in
 */
export class PathEscapeError extends PluginCatalogError {
  constructor(
    readonly root: string,
    readonly relativePath: string
  ) {
    super(
      `Invalid path: ${relativePath} attempts to access outside ${root}`,
      "PATH_ESCAPE"
    );
  }
}

export class PluginNotFoundError extends PluginCatalogError {
  constructor(readonly pluginName: string) {
    super(`Plugin '${pluginName}' not found in any marketplace`, "PLUGIN_NOT_FOUND");
  }
}

export class InvalidCategoryError extends PluginCatalogError {
  constructor(readonly category: string) {
    super(
      `Invalid element category '${category}'. Must be one of ${ELEMENT_CATEGORIES.join(", ")}`,
      "INVALID_CATEGORY"
    );
  }
}

export function isPluginCatalogError(error: unknown): error is PluginCatalogError {
  return error instanceof PluginCatalogError;
}

/**
 * True for Node filesystem errors carrying the given errno code
 */
export function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}
