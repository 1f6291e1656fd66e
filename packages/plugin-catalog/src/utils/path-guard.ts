import { realpath } from "fs/promises";
import { basename, dirname, isAbsolute, join, relative, resolve, sep } from "path";
import { PathEscapeError, hasErrorCode } from "../errors.js";

/**
 * Resolve symlinks for the longest existing prefix of `path`, then append
 * the components that don't exist (yet) unchanged.
 */
export async function canonicalize(path: string): Promise<string> {
  const absolute = resolve(path);
  try {
    return await realpath(absolute);
  } catch (error) {
    if (!hasErrorCode(error, "ENOENT") && !hasErrorCode(error, "ENOTDIR")) {
      throw error;
    }
    const parent = dirname(absolute);
    if (parent === absolute) {
      return absolute;
    }
    return join(await canonicalize(parent), basename(absolute));
  }
}

/**
 * Whether `candidate` is `root` itself or somewhere below it.
 * Both paths must already be canonical.
 */
export function isWithin(root: string, candidate: string): boolean {
  const rel = relative(root, candidate);
  if (rel === "") return true;
  return rel !== ".." && !rel.startsWith(`..${sep}`) && !isAbsolute(rel);
}

/**
 * Join `relativePath` onto `root` and make sure the canonical result does
 * not leave `root`. Runs before any read of a manifest-supplied path.
 *
 * @returns The canonical absolute path
 * @throws PathEscapeError when the path resolves outside `root`
 */
export async function resolveWithin(root: string, relativePath: string): Promise<string> {
  const canonicalRoot = await canonicalize(root);
  const candidate = await canonicalize(resolve(root, relativePath));

  if (!isWithin(canonicalRoot, candidate)) {
    throw new PathEscapeError(root, relativePath);
  }
  return candidate;
}
