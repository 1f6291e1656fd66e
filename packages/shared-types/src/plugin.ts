/**
 * Plugin-related types
 */

import type { ElementEntry } from "./entities/element.js";

/**
 * Open key/value map as found in marketplace manifests (owner, metadata)
 */
export type ManifestRecord = Record<string, unknown>;

/**
 * A plugin as declared in a marketplace manifest
 */
export interface PluginDefinition {
  /** Identity key within a marketplace */
  name: string;
  /** Plugin description (empty string when the manifest has none) */
  description: string;
  /** Plugin root relative to the marketplace directory */
  source?: string;
  agents: ElementEntry[];
  commands: ElementEntry[];
  skills: ElementEntry[];
  metadata?: ManifestRecord;
  owner?: ManifestRecord;
  /** Any other keys the manifest carries (version, author, category, ...) */
  extra: ManifestRecord;
}

/**
 * A marketplace directory and the plugins its manifest declares
 */
export interface Marketplace {
  /** Directory basename */
  name: string;
  /** Absolute path to the marketplace directory */
  directory: string;
  owner?: ManifestRecord;
  metadata?: ManifestRecord;
  plugins: PluginDefinition[];
}

/**
 * Listing projection of a plugin definition
 */
export interface PluginSummary {
  name: string;
  description: string;
  agents: string[];
  commands: string[];
  skills: string[];
}

/**
 * Full plugin definition as returned by describe, with marketplace-level
 * owner/metadata filled in when the plugin has none of its own
 */
export interface PluginDetail extends PluginDefinition {
  /** Name of the marketplace the plugin was found in */
  marketplace: string;
  /** Absolute path to that marketplace's directory */
  marketplaceDir: string;
}
