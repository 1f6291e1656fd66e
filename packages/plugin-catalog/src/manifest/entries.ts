import { parse } from "path";
import type { ElementEntry } from "@plugin-catalog/shared-types";

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Classify a raw manifest element entry. Returns null for values that are
 * neither a path string nor an object.
 */
export function toElementEntry(value: unknown): ElementEntry | null {
  if (typeof value === "string") {
    return { kind: "path", path: value };
  }
  if (isRecord(value)) {
    return {
      kind: "named",
      name: typeof value.name === "string" ? value.name : undefined,
      fields: value,
    };
  }
  return null;
}

/**
 * Inverse of toElementEntry, for reporting entries as they were written
 */
export function toManifestEntry(entry: ElementEntry): string | Record<string, unknown> {
  return entry.kind === "path" ? entry.path : entry.fields;
}

/**
 * Filename without extension, e.g. "./agents/reviewer.md" -> "reviewer"
 */
export function entryStem(path: string): string {
  return parse(path).name;
}

/**
 * Names shown for a plugin's elements in listings
 */
export function extractElementNames(entries: ElementEntry[]): string[] {
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.kind === "path") {
      names.push(entryStem(entry.path));
    } else if (entry.name !== undefined) {
      names.push(entry.name);
    }
  }
  return names;
}
