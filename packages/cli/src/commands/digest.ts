import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader, runDigest } from '@treedigest/core';
import { GitingestInvoker } from '@treedigest/exec';
import { ConsoleLogger, JsonlLogger, type DigestConfigInput, type Logger } from '@treedigest/shared';
import { OutputRenderer } from '../output/renderer';
import type { GlobalOptions } from '../options';

export interface DigestCommandOptions {
  digestDir?: string;
  maxLines?: number;
  maxDepth?: number;
  excludePattern?: string[];
  includePattern?: string[];
  maxSize?: number;
  branch?: string;
  gitingestBin?: string;
  traceFile?: string;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function parseNonNegativeInt(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }
  return Number.parseInt(value, 10);
}

export function parsePositiveInt(value: string): number {
  const parsed = parseNonNegativeInt(value);
  if (parsed === 0) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return parsed;
}

/**
 * Maps command options onto config keys. Unset options stay undefined so
 * that values from config files survive the merge.
 */
export function toConfigFlags(root: string, options: DigestCommandOptions): Partial<DigestConfigInput> {
  return {
    root,
    digestDir: options.digestDir,
    maxLines: options.maxLines,
    maxDepth: options.maxDepth,
    excludePatterns: options.excludePattern,
    includePatterns: options.includePattern,
    maxSize: options.maxSize,
    branch: options.branch,
    gitingestBin: options.gitingestBin,
    traceFile: options.traceFile,
  };
}

export function createLogger(traceFile: string | undefined, verbose: boolean): Logger {
  return traceFile ? new JsonlLogger(traceFile, { verbose }) : new ConsoleLogger({ verbose });
}

export function registerDigestCommand(program: Command) {
  program
    .command('digest', { isDefault: true })
    .argument('<root>', 'Root directory of the repository')
    .description('Digest a repository, splitting directories whose digest is too long')
    .option('--digest-dir <dir>', 'Directory for digest files (default: <root>-digest beside the root)')
    .option('--max-lines <n>', 'Maximum lines per digest before splitting', parseNonNegativeInt)
    .option('--max-depth <n>', 'Maximum directory depth to split into', parseNonNegativeInt)
    .option('-e, --exclude-pattern <pattern>', 'Exclude pattern (repeatable)', collect)
    .option('-i, --include-pattern <pattern>', 'Include pattern (repeatable)', collect)
    .option('-s, --max-size <bytes>', 'Skip files larger than this many bytes', parsePositiveInt)
    .option('-b, --branch <name>', 'Branch to ingest')
    .option('--gitingest-bin <path>', 'Name or path of the gitingest executable')
    .option('--trace-file <path>', 'Append run events as JSON lines to this file')
    .action(async (root: string, options: DigestCommandOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const verbose = !!globalOpts.verbose;
      const renderer = new OutputRenderer(!!globalOpts.json);

      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        flags: toConfigFlags(root, options),
      });
      if (verbose) renderer.log(`Using gitingest executable: ${config.gitingestBin}`);

      const logger = createLogger(config.traceFile, verbose);
      const invoker = new GitingestInvoker({ bin: config.gitingestBin, logger });
      const result = await runDigest(config, { invoker, logger });

      renderer.renderDigest(result);
    });
}
