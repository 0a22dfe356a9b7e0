import { randomUUID } from 'crypto';

/** Relative directory recorded for the run root */
export const ROOT_REL_DIR = '.';

export type TempKind = 'whole' | 'local';

function segmentsOf(relDir: string): string[] {
  return relDir.split(/[\\/]/).filter((part) => part !== '' && part !== '.');
}

/**
 * Stable digest filename for a directory.
 *
 * @example
 * digestFilename('my-repo', '.');       // 'digest-my-repo.txt'
 * digestFilename('my-repo', 'foo/bar'); // 'digest-my-repo-foo-bar.txt'
 */
export function digestFilename(rootName: string, relDir: string): string {
  const parts = segmentsOf(relDir);
  if (parts.length === 0) {
    return `digest-${rootName}.txt`;
  }
  return `digest-${rootName}-${parts.join('-')}.txt`;
}

export function indexFilename(rootName: string): string {
  return `digest-${rootName}-index.txt`;
}

/**
 * Unique name for an in-progress digest, so concurrent runs into the same
 * output directory never collide.
 */
export function tempFilename(rootName: string, kind: TempKind): string {
  const hex = randomUUID().replace(/-/g, '');
  return kind === 'local' ? `.tmp-local-${rootName}-${hex}.txt` : `.tmp-${rootName}-${hex}.txt`;
}

export function childRelDir(relDir: string, childName: string): string {
  return relDir === ROOT_REL_DIR ? childName : `${relDir}/${childName}`;
}
