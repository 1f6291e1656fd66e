import matter from "gray-matter";

/**
 * Result of parsing frontmatter from a file
 */
export interface ParsedFrontmatter {
  /** Parsed frontmatter data */
  data: Record<string, unknown>;
  /** Markdown content after frontmatter */
  content: string;
}

/**
 * Parse frontmatter from markdown content
 * @param content - Raw markdown content with optional YAML frontmatter
 */
export function parseFrontmatter(content: string): ParsedFrontmatter {
  try {
    // Options object disables gray-matter's per-string cache
    const { data, content: body } = matter(content, {});
    return { data: { ...data }, content: body.trim() };
  } catch {
    // On YAML error, extract what we can
    return extractFrontmatterFallback(content);
  }
}

const FALLBACK_FIELDS = ["name", "description", "model", "color", "version"];

/**
 * Fallback parser for malformed YAML frontmatter
 * Extracts single-line fields and body when gray-matter fails
 */
function extractFrontmatterFallback(content: string): ParsedFrontmatter {
  const fmMatch = content.match(/^---\r?\n([\s\S]*?)\r?\n---\r?\n?([\s\S]*)$/);
  if (!fmMatch) {
    return { data: {}, content: content.trim() };
  }

  const [, frontmatter = "", body = ""] = fmMatch;
  const data: Record<string, unknown> = {};

  for (const field of FALLBACK_FIELDS) {
    const match = frontmatter.match(new RegExp(`^${field}:[ \\t]*(.+)$`, "m"));
    if (match?.[1]) data[field] = match[1].trim();
  }

  return { data, content: body.trim() };
}
