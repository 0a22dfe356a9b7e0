import { promises as fs } from 'fs';
import path from 'path';
import {
  eventBase,
  isExcludedName,
  join,
  type DigestInvoker,
  type DigestRecord,
  type Logger,
} from '@treedigest/shared';
import { countLines } from './lines';
import { localizePatterns } from './localize';
import { childRelDir, digestFilename, tempFilename, ROOT_REL_DIR, type TempKind } from './naming';

export interface SplitterSettings {
  /** Basename of the run root, used in every digest filename */
  rootName: string;
  outputDir: string;
  maxLines: number;
  maxDepth: number;
  excludePatterns: readonly string[];
  includePatterns: readonly string[];
  maxSize?: number;
  branch?: string;
}

export interface SplitterDeps {
  invoker: DigestInvoker;
  logger: Logger;
  runId: string;
}

interface TempDigest {
  path: string;
  lineCount: number;
}

function compareNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

async function isDirectory(p: string): Promise<boolean> {
  // Broken symlinks are not directories.
  return fs.stat(p).then(
    (stats) => stats.isDirectory(),
    () => false,
  );
}

/**
 * Immediate child directories of `dirPath`, symlinked directories included, sorted by name.
 */
export async function listChildDirs(dirPath: string): Promise<string[]> {
  const entries = await fs.readdir(dirPath, { withFileTypes: true });
  const names: string[] = [];
  for (const entry of entries) {
    if (entry.isDirectory()) {
      names.push(entry.name);
    } else if (entry.isSymbolicLink() && (await isDirectory(path.join(dirPath, entry.name)))) {
      names.push(entry.name);
    }
  }
  return names.sort(compareNames);
}

/**
 * Exclude set for a local-only digest of `dirName`: the global patterns, their
 * localized forms, and one `<child>/**` per child directory so that content
 * owned by a child digest is never counted twice.
 */
export function buildLocalExcludes(
  globalExcludes: readonly string[],
  dirName: string,
  childDirs: readonly string[],
): string[] {
  return [
    ...globalExcludes,
    ...localizePatterns(globalExcludes, dirName),
    ...childDirs.map((child) => `${child}/**`),
  ];
}

/**
 * Walks a tree depth-first, keeping a directory's digest whole while it fits
 * the line budget and otherwise splitting it into a local-only digest plus
 * one digest per child directory.
 *
 * Ingestion calls run strictly one after another.
 */
export class DigestSplitter {
  constructor(
    private readonly settings: SplitterSettings,
    private readonly deps: SplitterDeps,
  ) {}

  async run(rootDir: string): Promise<DigestRecord[]> {
    const index: DigestRecord[] = [];
    await this.ingestDir(rootDir, ROOT_REL_DIR, 0, index);
    return index;
  }

  async ingestDir(
    dirPath: string,
    relDir: string,
    depth: number,
    index: DigestRecord[],
  ): Promise<void> {
    const { settings } = this;
    const { logger, runId } = this.deps;

    // Only the opening line of each directory carries its depth.
    await logger.child({ depth }).info(`Analyzing ${dirPath} as a whole...`);
    const whole = await this.digestTo(dirPath, settings.excludePatterns, 'whole');
    await logger.trace(
      {
        ...eventBase(runId),
        type: 'DirectoryAnalyzed',
        payload: { relDir, depth, lineCount: whole.lineCount },
      },
      `  -> ${whole.lineCount} lines`,
    );

    if (whole.lineCount <= settings.maxLines || depth >= settings.maxDepth) {
      const digestFile = await this.finalize(whole, relDir);
      index.push({ relDir, digestFile, lineCount: whole.lineCount, depth, split: false });
      await logger.trace(
        {
          ...eventBase(runId),
          type: 'DigestKept',
          payload: {
            relDir,
            depth,
            digestFile,
            lineCount: whole.lineCount,
            depthLimited: whole.lineCount > settings.maxLines,
          },
        },
        `  -> Keeping whole-dir digest: ${digestFile}`,
      );
      return;
    }

    await logger.info('  -> Too big and depth < max depth, splitting into subdirectories...');
    await discard(whole.path);

    const childDirs = await listChildDirs(dirPath);
    const localExcludes = buildLocalExcludes(
      settings.excludePatterns,
      path.basename(dirPath),
      childDirs,
    );

    await logger.info(`  -> Generating digest for local files in ${dirPath} (excluding subdirs)...`);
    const local = await this.digestTo(dirPath, localExcludes, 'local');
    const digestFile = await this.finalize(local, relDir);
    index.push({ relDir, digestFile, lineCount: local.lineCount, depth, split: true });
    await logger.trace(
      {
        ...eventBase(runId),
        type: 'DirectorySplit',
        payload: {
          relDir,
          depth,
          digestFile,
          totalLineCount: whole.lineCount,
          localLineCount: local.lineCount,
          childDirs,
        },
      },
      `  -> Created local-files digest: ${digestFile} (${local.lineCount} lines)`,
    );

    for (const child of childDirs) {
      const childRel = childRelDir(relDir, child);
      if (isExcludedName(child, settings.excludePatterns)) {
        await logger.trace(
          {
            ...eventBase(runId),
            type: 'DirectorySkipped',
            payload: { relDir: childRel, depth: depth + 1 },
          },
          `  -> Skipping excluded directory: ${child}`,
        );
        continue;
      }
      await this.ingestDir(path.join(dirPath, child), childRel, depth + 1, index);
    }
  }

  /**
   * Produces a digest of `dirPath` into a fresh temporary file and measures it.
   * The temporary file is removed if either step fails.
   */
  private async digestTo(
    dirPath: string,
    excludePatterns: readonly string[],
    kind: TempKind,
  ): Promise<TempDigest> {
    const { settings } = this;
    const tmpPath = join(settings.outputDir, tempFilename(settings.rootName, kind));
    try {
      await this.deps.invoker.ingest({
        source: dirPath,
        outputPath: tmpPath,
        excludePatterns: [...excludePatterns],
        includePatterns: [...settings.includePatterns],
        maxSize: settings.maxSize,
        branch: settings.branch,
      });
      const lineCount = await countLines(tmpPath);
      return { path: tmpPath, lineCount };
    } catch (err) {
      await discard(tmpPath);
      throw err;
    }
  }

  private async finalize(temp: TempDigest, relDir: string): Promise<string> {
    const digestFile = digestFilename(this.settings.rootName, relDir);
    try {
      await fs.rename(temp.path, join(this.settings.outputDir, digestFile));
    } catch (err) {
      await discard(temp.path);
      throw err;
    }
    return digestFile;
  }
}

async function discard(tmpPath: string): Promise<void> {
  await fs.rm(tmpPath, { force: true });
}
