import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import { join } from '../fs/path';
import { JsonlLogger } from './jsonlLogger';
import type { DirectorySkipped, RunStarted } from '../types/events';

const started: RunStarted = {
  schemaVersion: 1,
  timestamp: '2026-01-01T00:00:00.000Z',
  runId: 'run-1',
  type: 'RunStarted',
  payload: {
    rootDir: '/work/repo',
    outputDir: '/work/repo-digest',
    maxLines: 20000,
    maxDepth: 1,
    excludePatterns: ['node_modules'],
    includePatterns: [],
  },
};

const skipped: DirectorySkipped = {
  schemaVersion: 1,
  timestamp: '2026-01-01T00:00:01.000Z',
  runId: 'run-1',
  type: 'DirectorySkipped',
  payload: { relDir: 'node_modules', depth: 1 },
};

describe('JsonlLogger', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    vi.restoreAllMocks();
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('appends events to file in JSONL format', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const logger = new JsonlLogger(logPath);

    await logger.log(started);
    await logger.log(skipped);

    const content = await fs.readFile(logPath, 'utf8');
    const lines = content.trim().split('\n');
    expect(lines.length).toBe(2);
    expect(JSON.parse(lines[0])).toEqual(started);
    expect(JSON.parse(lines[1])).toEqual(skipped);
  });

  it('writes the event and prints the message on trace', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-logger-test-'));
    const logPath = join(tmpDir, 'trace.jsonl');
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const logger = new JsonlLogger(logPath);

    await logger.child({ depth: 1 }).trace(skipped, 'Skipping excluded directory: node_modules');

    const content = await fs.readFile(logPath, 'utf8');
    expect(content).toBe(JSON.stringify(skipped) + '\n');
    expect(infoSpy).toHaveBeenCalledWith('[depth=1] Skipping excluded directory: node_modules');
  });

  it('only prints debug messages when verbose', () => {
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    new JsonlLogger('/dev/null').debug('quiet');
    new JsonlLogger('/dev/null', { verbose: true }).debug('loud');

    expect(debugSpy).toHaveBeenCalledTimes(1);
    expect(debugSpy).toHaveBeenCalledWith('loud');
  });

  it('does not throw if appending to the file fails', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-logger-test-'));
    // Use a directory path so appendFile fails deterministically (EISDIR).
    const logPath = tmpDir;
    const logger = new JsonlLogger(logPath);

    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    await expect(logger.log(started)).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledWith(
      `Failed to write to log file at ${logPath}`,
      expect.any(Error),
    );
  });
});
