import { homedir } from "os";
import { join } from "path";

export const MARKETPLACE_MANIFEST_DIR = ".claude-plugin";
export const MARKETPLACE_MANIFEST_FILE = "marketplace.json";
export const SKILL_MANIFEST_FILE = "SKILL.md";

/**
 * Get the Claude config directory
 * @param customDir - Custom directory path (overrides default)
 *
 * Resolution order:
 * 1. customDir parameter (if provided)
 * 2. CLAUDE_CONFIG_DIR environment variable (if set)
 * 3. Default: ~/.claude
 */
export function getClaudeDir(customDir?: string): string {
  return customDir || process.env.CLAUDE_CONFIG_DIR || join(homedir(), ".claude");
}

/**
 * Get the marketplaces directory
 */
export function getMarketplacesDir(claudeDir: string): string {
  return join(claudeDir, "plugins", "marketplaces");
}

/**
 * Get the marketplace manifest path
 */
export function getMarketplaceManifestPath(marketplaceDir: string): string {
  return join(marketplaceDir, MARKETPLACE_MANIFEST_DIR, MARKETPLACE_MANIFEST_FILE);
}

