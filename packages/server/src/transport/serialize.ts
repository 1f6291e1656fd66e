import {
  toManifestEntry,
  type LoadedElement,
  type PluginDetail,
} from "@plugin-catalog/core";

type ManifestEntry = ReturnType<typeof toManifestEntry>;

export interface SerializedPluginDetail {
  [key: string]: unknown;
  name: string;
  description: string;
  agents: ManifestEntry[];
  commands: ManifestEntry[];
  skills: ManifestEntry[];
  owner?: Record<string, unknown>;
  metadata?: Record<string, unknown>;
  marketplace: string;
  marketplaceDir: string;
}

/**
 * Plugin detail in the shape its manifest entry was written in: extra keys
 * inline, element entries as plain strings or objects
 */
export function serializePluginDetail(detail: PluginDetail): SerializedPluginDetail {
  const { extra, agents, commands, skills, source, ...rest } = detail;
  return {
    ...extra,
    ...rest,
    // A non-string source lives in extra
    ...(source !== undefined && { source }),
    agents: agents.map(toManifestEntry),
    commands: commands.map(toManifestEntry),
    skills: skills.map(toManifestEntry),
  };
}

export interface LoadElementsResult {
  pluginName: string;
  elements: LoadedElement[];
}
