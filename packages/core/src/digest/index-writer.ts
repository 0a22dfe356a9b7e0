import { atomicWrite, IndexError, join, type DigestRecord } from '@treedigest/shared';
import { indexFilename } from './naming';

const DIR_COLUMN_WIDTH = 30;

export interface IndexInput {
  rootDir: string;
  rootName: string;
  outputDir: string;
  maxLines: number;
  maxDepth: number;
  /** Executable named in the closing note */
  ingestBin: string;
  digests: readonly DigestRecord[];
}

/**
 * Orders records shallowest first, then by relative directory in code unit order.
 */
export function sortDigests(digests: readonly DigestRecord[]): DigestRecord[] {
  return [...digests].sort((a, b) => {
    if (a.depth !== b.depth) {
      return a.depth - b.depth;
    }
    if (a.relDir < b.relDir) return -1;
    if (a.relDir > b.relDir) return 1;
    return 0;
  });
}

export function formatDigestLine(record: DigestRecord): string {
  const splitNote = record.split ? ' (split into subdirs)' : '';
  return (
    `- depth=${record.depth}  dir=${record.relDir.padEnd(DIR_COLUMN_WIDTH)} -> ${record.digestFile}  ` +
    `(${record.lineCount} lines)${splitNote}`
  );
}

export function renderIndex(input: IndexInput): string {
  const lines = [
    `Digest index for repository: ${input.rootDir}`,
    '',
    `Max lines per digest: ${input.maxLines}`,
    `Max recursion depth: ${input.maxDepth}`,
    '',
    'Generated digests:',
    '',
    ...sortDigests(input.digests).map(formatDigestLine),
    '',
    `Note: Each digest file is produced by ${input.ingestBin} for that directory.`,
    "Directories marked '(split into subdirs)' also have digests for each",
    'of their immediate subdirectories, subject to the configured depth.',
  ];
  return lines.join('\n');
}

/**
 * Writes the index manifest into the output directory and returns its path.
 */
export async function writeIndex(input: IndexInput): Promise<string> {
  const indexPath = join(input.outputDir, indexFilename(input.rootName));
  try {
    await atomicWrite(indexPath, renderIndex(input));
  } catch (err) {
    throw new IndexError(`Failed to write digest index: ${indexPath}`, { cause: err });
  }
  return indexPath;
}
