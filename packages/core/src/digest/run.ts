import { promises as fs } from 'fs';
import path from 'path';
import { ensureDir } from 'fs-extra';
import {
  ConfigError,
  eventBase,
  isInside,
  type DigestConfig,
  type DigestInvoker,
  type DigestRecord,
  type Logger,
} from '@treedigest/shared';
import { DigestSplitter } from './splitter';
import { writeIndex } from './index-writer';

export interface RunSettings {
  rootDir: string;
  rootName: string;
  outputDir: string;
  maxLines: number;
  maxDepth: number;
  excludePatterns: string[];
  includePatterns: string[];
  maxSize?: number;
  branch?: string;
  gitingestBin: string;
}

export interface RunDeps {
  invoker: DigestInvoker;
  logger: Logger;
  runId?: string;
  cwd?: string;
}

export interface DigestRunResult {
  runId: string;
  rootDir: string;
  outputDir: string;
  indexPath: string;
  digests: DigestRecord[];
}

/**
 * Resolves paths in a loaded config and checks that the root is a directory.
 * Nothing is created on disk.
 */
export async function resolveRunSettings(config: DigestConfig, cwd = process.cwd()): Promise<RunSettings> {
  const rootDir = path.resolve(cwd, config.root);
  const isDir = await fs.stat(rootDir).then(
    (stats) => stats.isDirectory(),
    () => false,
  );
  if (!isDir) {
    throw new ConfigError(`Root directory does not exist: ${rootDir}`);
  }

  const rootName = path.basename(rootDir);
  const outputDir = config.digestDir
    ? path.resolve(cwd, config.digestDir)
    : path.join(path.dirname(rootDir), `${rootName}-digest`);

  return {
    rootDir,
    rootName,
    outputDir,
    maxLines: config.maxLines,
    maxDepth: config.maxDepth,
    excludePatterns: config.excludePatterns,
    includePatterns: config.includePatterns,
    maxSize: config.maxSize,
    branch: config.branch,
    gitingestBin: config.gitingestBin,
  };
}

/**
 * Digests a whole tree: splits directories as needed, then writes the index.
 * The index is only written once every directory has been ingested.
 */
export async function runDigest(config: DigestConfig, deps: RunDeps): Promise<DigestRunResult> {
  const { logger, invoker } = deps;
  const runId = deps.runId ?? Date.now().toString();
  const settings = await resolveRunSettings(config, deps.cwd);
  const startTime = Date.now();

  await ensureDir(settings.outputDir);

  await logger.info(`Root directory: ${settings.rootDir}`);
  await logger.info(`Digest directory: ${settings.outputDir}`);
  await logger.info(`Max lines per digest: ${settings.maxLines}`);
  await logger.info(`Max depth: ${settings.maxDepth}`);
  await logger.info(`Global exclude patterns: ${JSON.stringify(settings.excludePatterns)}`);
  await logger.info(`Global include patterns: ${JSON.stringify(settings.includePatterns)}`);
  if (isInside(settings.rootDir, settings.outputDir)) {
    await logger.warn(
      `Digest directory is inside the root; exclude it (e.g. -e ${path.basename(settings.outputDir)}) so later runs do not ingest old digests.`,
    );
  }
  await logger.log({
    ...eventBase(runId),
    type: 'RunStarted',
    payload: {
      rootDir: settings.rootDir,
      outputDir: settings.outputDir,
      maxLines: settings.maxLines,
      maxDepth: settings.maxDepth,
      excludePatterns: settings.excludePatterns,
      includePatterns: settings.includePatterns,
    },
  });

  const splitter = new DigestSplitter(settings, { invoker, logger, runId });
  const digests = await splitter.run(settings.rootDir);

  const indexPath = await writeIndex({
    rootDir: settings.rootDir,
    rootName: settings.rootName,
    outputDir: settings.outputDir,
    maxLines: settings.maxLines,
    maxDepth: settings.maxDepth,
    ingestBin: settings.gitingestBin,
    digests,
  });
  await logger.trace(
    {
      ...eventBase(runId),
      type: 'IndexWritten',
      payload: { indexPath, digestCount: digests.length },
    },
    `Wrote digest index: ${indexPath}`,
  );

  await logger.log({
    ...eventBase(runId),
    type: 'RunFinished',
    payload: {
      durationMs: Date.now() - startTime,
      digestCount: digests.length,
      splitCount: digests.filter((d) => d.split).length,
    },
  });

  return {
    runId,
    rootDir: settings.rootDir,
    outputDir: settings.outputDir,
    indexPath,
    digests,
  };
}
