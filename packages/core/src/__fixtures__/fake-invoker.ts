import { promises as fs } from 'fs';
import path from 'path';
import { fnmatch, type DigestInvoker, type IngestRequest } from '@treedigest/shared';

export const FILE_HEADER = 'FILE: ';

function isExcluded(relPath: string, isDir: boolean, patterns: readonly string[]): boolean {
  const names = relPath.split('/');
  return patterns.some(
    (pattern) =>
      fnmatch(relPath, pattern) ||
      (isDir && fnmatch(`${relPath}/`, pattern)) ||
      names.some((name) => fnmatch(name, pattern)),
  );
}

async function listFiles(root: string, patterns: readonly string[], rel = ''): Promise<string[]> {
  const entries = await fs.readdir(path.join(root, rel), { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const files: string[] = [];
  for (const entry of entries) {
    const entryRel = rel ? `${rel}/${entry.name}` : entry.name;
    if (isExcluded(entryRel, entry.isDirectory(), patterns)) {
      continue;
    }
    if (entry.isDirectory()) {
      files.push(...(await listFiles(root, patterns, entryRel)));
    } else if (entry.isFile()) {
      files.push(entryRel);
    }
  }
  return files;
}

/**
 * Stands in for gitingest: writes one `FILE: <path>` header per non-excluded
 * file under the source, followed by the file's content.
 */
export class TreeListingInvoker implements DigestInvoker {
  readonly requests: IngestRequest[] = [];

  constructor(private readonly failWhen?: (request: IngestRequest, call: number) => Error | undefined) {}

  async ingest(request: IngestRequest): Promise<void> {
    this.requests.push(request);
    const failure = this.failWhen?.(request, this.requests.length);
    if (failure) {
      await fs.writeFile(request.outputPath, 'partial output\n');
      throw failure;
    }

    const files = await listFiles(request.source, request.excludePatterns);
    let digest = '';
    for (const file of files) {
      digest += `${FILE_HEADER}${file}\n`;
      digest += await fs.readFile(path.join(request.source, file), 'utf8');
    }
    await fs.writeFile(request.outputPath, digest);
  }
}

/** `count` newline-terminated lines of filler text */
export function textLines(count: number): string {
  return Array.from({ length: count }, (_, i) => `line ${i + 1}\n`).join('');
}

/**
 * Creates files under `root` from a map of relative paths to contents.
 */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [rel, content] of Object.entries(files)) {
    const target = path.join(root, rel);
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content);
  }
}
