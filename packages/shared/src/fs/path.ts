import path from 'node:path';

/**
 * Normalizes a path to use forward slashes.
 * Relative directories in digest records and filenames are always `/`-separated.
 *
 * @param p The path to normalize.
 * @returns The normalized path with forward slashes.
 */
export function normalizePath(p: string): string {
  return p.replace(/\\/g, '/');
}

/**
 * Joins all given path segments together using the platform-specific separator as a delimiter,
 * then normalizes the resulting path to use forward slashes.
 *
 * @param paths A sequence of path segments.
 * @returns The normalized joined path.
 */
export function join(...paths: string[]): string {
  return normalizePath(path.join(...paths));
}

/**
 * Checks whether `child` is `parent` itself or lies somewhere beneath it.
 * Both paths are resolved against the current directory first.
 */
export function isInside(parent: string, child: string): boolean {
  const rel = path.relative(path.resolve(parent), path.resolve(child));
  return rel === '' || (!rel.startsWith('..') && !path.isAbsolute(rel));
}
