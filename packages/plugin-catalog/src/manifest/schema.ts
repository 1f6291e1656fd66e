import { z } from "zod";
import type {
  ElementEntry,
  ManifestRecord,
  PluginDefinition,
} from "@plugin-catalog/shared-types";
import { isRecord, toElementEntry } from "./entries.js";

/** Keep objects, drop anything else (strings, arrays, null) */
const optionalRecord = z
  .unknown()
  .transform((value): ManifestRecord | undefined => (isRecord(value) ? value : undefined));

/** Element lists: anything that isn't an array counts as empty */
const elementList = z.unknown().transform((value): ElementEntry[] => {
  if (!Array.isArray(value)) return [];
  const entries: ElementEntry[] = [];
  for (const item of value) {
    const entry = toElementEntry(item);
    if (entry) entries.push(entry);
  }
  return entries;
});

/**
 * Top level of `.claude-plugin/marketplace.json`
 */
export const marketplaceManifestSchema = z
  .object({
    owner: optionalRecord,
    metadata: optionalRecord,
    plugins: z.array(z.unknown()).default([]),
  })
  .passthrough();

export type MarketplaceManifest = z.infer<typeof marketplaceManifestSchema>;

const KNOWN_PLUGIN_KEYS = new Set([
  "name",
  "description",
  "source",
  "agents",
  "commands",
  "skills",
  "metadata",
  "owner",
]);

/**
 * One entry of the manifest's `plugins` array
 */
export const pluginEntrySchema = z
  .object({
    name: z.string().min(1),
    description: z.string().catch(""),
    source: z.unknown(),
    agents: elementList,
    commands: elementList,
    skills: elementList,
    metadata: optionalRecord,
    owner: optionalRecord,
  })
  .passthrough()
  .transform((plugin): PluginDefinition => {
    const extra: ManifestRecord = {};
    for (const [key, value] of Object.entries(plugin)) {
      if (!KNOWN_PLUGIN_KEYS.has(key)) extra[key] = value;
    }
    // Non-string sources (e.g. { source: "url", ... }) have no local
    // directory; keep them visible but unresolvable.
    let source: string | undefined;
    if (typeof plugin.source === "string") {
      source = plugin.source;
    } else if (plugin.source !== undefined) {
      extra.source = plugin.source;
    }

    return {
      name: plugin.name,
      description: plugin.description,
      ...(source !== undefined && { source }),
      agents: plugin.agents,
      commands: plugin.commands,
      skills: plugin.skills,
      metadata: plugin.metadata,
      owner: plugin.owner,
      extra,
    };
  });
