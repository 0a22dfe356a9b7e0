const GLOBSTAR = '**';

/**
 * Derives the exclude patterns that still make sense when `dirName` is
 * ingested as a root of its own.
 *
 * Every non-final segment that names the directory, or is a globstar, yields
 * the remainder of the pattern after it. A globstar hit also keeps the
 * original pattern, since it may match deeper still. Single-segment patterns
 * contribute nothing. Order follows the input and duplicates are kept.
 *
 * @example
 * localizePatterns(['sub/*.md'], 'sub');      // ['*.md']
 * localizePatterns(['**\/sub/*.md'], 'sub');  // ['**\/sub/*.md', 'sub/*.md', '*.md']
 */
export function localizePatterns(excludePatterns: readonly string[], dirName: string): string[] {
  const localPatterns: string[] = [];

  for (const pattern of excludePatterns) {
    const segments = pattern.split('/');
    for (let i = 0; i < segments.length - 1; i++) {
      const segment = segments[i];
      if (segment !== dirName && segment !== GLOBSTAR) {
        continue;
      }
      if (segment === GLOBSTAR) {
        localPatterns.push(pattern);
      }
      localPatterns.push(segments.slice(i + 1).join('/'));
    }
  }

  return localPatterns;
}
