import type { IngestRequest } from '@treedigest/shared';

/**
 * Builds the gitingest argument vector for one request.
 *
 * @example
 * buildIngestArgs({ source: 'repo', outputPath: 'out.txt', excludePatterns: ['dist'], includePatterns: [] });
 * // => ['repo', '-o', 'out.txt', '-e', 'dist']
 */
export function buildIngestArgs(request: IngestRequest): string[] {
  const args = [request.source, '-o', request.outputPath];

  if (request.maxSize !== undefined) {
    args.push('-s', String(request.maxSize));
  }

  for (const pattern of request.excludePatterns) {
    args.push('-e', pattern);
  }

  for (const pattern of request.includePatterns) {
    args.push('-i', pattern);
  }

  if (request.branch) {
    args.push('-b', request.branch);
  }

  return args;
}

// Quotes arguments for display only; the process itself is spawned without a shell.
export function formatCommand(bin: string, args: readonly string[]): string {
  return [bin, ...args].map((arg) => (/[\s"'*?]/.test(arg) ? JSON.stringify(arg) : arg)).join(' ');
}
