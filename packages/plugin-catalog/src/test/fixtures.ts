import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { createLogger } from "../logger.js";
import { getMarketplaceManifestPath } from "../utils/paths.js";

export const silentLogger = createLogger({ level: "silent" });

export async function createTempDir(prefix = "plugin-catalog-"): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Write a file, creating parent directories
 */
export async function writeFileAt(path: string, content: string): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, "utf-8");
  return path;
}

/**
 * Create `<marketplacesDir>/<name>/.claude-plugin/marketplace.json`.
 * Strings are written verbatim, anything else as JSON.
 */
export async function writeMarketplace(
  marketplacesDir: string,
  name: string,
  manifest: unknown
): Promise<string> {
  const directory = join(marketplacesDir, name);
  const body = typeof manifest === "string" ? manifest : JSON.stringify(manifest, null, 2);
  await writeFileAt(getMarketplaceManifestPath(directory), body);
  return directory;
}
