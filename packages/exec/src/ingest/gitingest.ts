import { spawn } from 'child_process';
import which from 'which';
import {
  MissingToolError,
  ProcessError,
  type DigestInvoker,
  type IngestRequest,
  type Logger,
} from '@treedigest/shared';
import { buildIngestArgs, formatCommand } from './args';

export const INSTALL_HINT = 'Install it with: pip install gitingest';

const STDERR_TAIL_BYTES = 4096;

export interface GitingestInvokerOptions {
  /** Name or path of the gitingest executable */
  bin: string;
  logger: Logger;
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err;
}

/**
 * Runs the gitingest CLI once per request, waiting for it to exit.
 * Output from the tool is forwarded to the logger at debug level.
 */
export class GitingestInvoker implements DigestInvoker {
  private resolvedBin: string | undefined;

  constructor(private readonly options: GitingestInvokerOptions) {}

  async ingest(request: IngestRequest): Promise<void> {
    const bin = await this.resolveBin();
    const args = buildIngestArgs(request);
    const command = formatCommand(this.options.bin, args);
    await this.exec(bin, args, command);
  }

  /**
   * Locates the executable on PATH once per invoker.
   */
  async resolveBin(): Promise<string> {
    if (this.resolvedBin) {
      return this.resolvedBin;
    }
    try {
      this.resolvedBin = await which(this.options.bin);
    } catch (err) {
      throw new MissingToolError(this.options.bin, { cause: err, details: INSTALL_HINT });
    }
    return this.resolvedBin;
  }

  protected exec(bin: string, args: string[], command: string): Promise<void> {
    const { logger } = this.options;
    logger.debug(`Running: ${command}`);

    return new Promise<void>((resolve, reject) => {
      let stderrTail = '';
      const child = spawn(bin, args, {
        stdio: ['ignore', 'pipe', 'pipe'],
        shell: false,
      });

      child.stdout?.on('data', (chunk: Buffer) => {
        const text = chunk.toString('utf8').trimEnd();
        if (text) {
          logger.debug(text);
        }
      });

      child.stderr?.on('data', (chunk: Buffer) => {
        stderrTail = (stderrTail + chunk.toString('utf8')).slice(-STDERR_TAIL_BYTES);
      });

      child.on('error', (err) => {
        if (isErrnoException(err) && err.code === 'ENOENT') {
          reject(new MissingToolError(this.options.bin, { cause: err, details: INSTALL_HINT }));
          return;
        }
        reject(
          new ProcessError(`Failed to start ${this.options.bin}: ${err.message}`, {
            cause: err,
            details: { command },
          }),
        );
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve();
          return;
        }
        const reason = code === null ? `was killed by ${signal ?? 'a signal'}` : `exited with code ${code}`;
        reject(
          new ProcessError(`${this.options.bin} ${reason}`, {
            exitCode: code ?? undefined,
            details: { command, stderr: stderrTail.trim() },
          }),
        );
      });
    });
  }
}
