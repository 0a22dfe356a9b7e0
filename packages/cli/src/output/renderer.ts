import pc from 'picocolors';
import { AppError } from '@treedigest/shared';
import { sortDigests, type DigestRunResult } from '@treedigest/core';
import { renderTable } from './table';

export interface ErrorOutput {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

export function toErrorOutput(e: unknown): ErrorOutput {
  if (e instanceof AppError) {
    return { error: { code: e.code, message: e.message, details: e.details } };
  }
  return {
    error: {
      code: 'UnknownError',
      message: e instanceof Error ? e.message : String(e),
    },
  };
}

export class OutputRenderer {
  constructor(private isJson: boolean) {}

  renderDigest(result: DigestRunResult): void {
    const digests = sortDigests(result.digests);
    if (this.isJson) {
      console.log(JSON.stringify({ ...result, digests }, null, 2));
      return;
    }

    console.log(`\n${pc.green('✅ Digest complete.')}`);
    console.log(
      renderTable(
        digests.map((d) => [d.depth, d.relDir, d.digestFile, d.lineCount, d.split ? 'yes' : '']),
        { head: ['Depth', 'Directory', 'Digest', 'Lines', 'Split'] },
      ),
    );

    const splitCount = digests.filter((d) => d.split).length;
    console.log(
      `  ${digests.length} digest(s), ${splitCount} split director${splitCount === 1 ? 'y' : 'ies'}.`,
    );
    console.log(pc.bold('\nOutput:'));
    console.log(`  Digests: ${result.outputDir}`);
    console.log(`  Index: ${result.indexPath}`);
  }

  renderError(e: unknown, verbose: boolean): void {
    if (this.isJson) {
      console.log(JSON.stringify(toErrorOutput(e)));
      return;
    }

    console.error(`❌ Error: ${(e instanceof Error && e.message) || String(e)}`);
    if (e instanceof AppError && e.details) {
      console.error(
        `  Details: ${typeof e.details === 'string' ? e.details : JSON.stringify(e.details, null, 2)}`,
      );
    }
    if (verbose && e instanceof Error && e.stack) {
      console.error(`\nStack Trace:\n${e.stack}`);
    } else {
      console.error(`\nFor more details, run with the --verbose flag.`);
    }
  }

  log(message: string): void {
    if (!this.isJson) {
      console.log(pc.gray(message));
    }
  }
}
