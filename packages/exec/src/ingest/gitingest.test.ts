import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import { MissingToolError, ProcessError, ConsoleLogger } from '@treedigest/shared';
import { GitingestInvoker, INSTALL_HINT } from './gitingest';

const { spawnMock, whichMock } = vi.hoisted(() => ({
  spawnMock: vi.fn(),
  whichMock: vi.fn<(cmd: string) => Promise<string>>(),
}));

vi.mock('child_process', () => ({
  spawn: spawnMock,
  default: { spawn: spawnMock },
}));

vi.mock('which', () => ({
  default: whichMock,
}));

class FakeChild extends EventEmitter {
  stdout = new EventEmitter();
  stderr = new EventEmitter();
}

function childThat(script: (child: FakeChild) => void): () => FakeChild {
  return () => {
    const child = new FakeChild();
    setImmediate(() => script(child));
    return child;
  };
}

const request = {
  source: '/work/repo',
  outputPath: '/work/repo-digest/.tmp-repo-1.txt',
  excludePatterns: ['dist'],
  includePatterns: [],
};

describe('GitingestInvoker', () => {
  const logger = new ConsoleLogger();

  beforeEach(() => {
    vi.clearAllMocks();
    whichMock.mockResolvedValue('/usr/local/bin/gitingest');
  });

  it('spawns the resolved executable without a shell', async () => {
    spawnMock.mockImplementation(childThat((child) => child.emit('close', 0, null)));

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    await invoker.ingest(request);

    expect(whichMock).toHaveBeenCalledWith('gitingest');
    expect(spawnMock).toHaveBeenCalledWith(
      '/usr/local/bin/gitingest',
      ['/work/repo', '-o', '/work/repo-digest/.tmp-repo-1.txt', '-e', 'dist'],
      expect.objectContaining({ shell: false }),
    );
  });

  it('looks the executable up only once', async () => {
    spawnMock.mockImplementation(childThat((child) => child.emit('close', 0, null)));

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    await invoker.ingest(request);
    await invoker.ingest(request);

    expect(whichMock).toHaveBeenCalledTimes(1);
    expect(spawnMock).toHaveBeenCalledTimes(2);
  });

  it('reports a missing executable with an install hint', async () => {
    whichMock.mockRejectedValue(new Error('not found: gitingest'));

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    const error = await invoker.ingest(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(MissingToolError);
    expect(error).toMatchObject({ executable: 'gitingest', details: INSTALL_HINT });
    expect(spawnMock).not.toHaveBeenCalled();
  });

  it('treats ENOENT from spawn as a missing executable', async () => {
    spawnMock.mockImplementation(
      childThat((child) =>
        child.emit('error', Object.assign(new Error('spawn gitingest ENOENT'), { code: 'ENOENT' })),
      ),
    );

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    await expect(invoker.ingest(request)).rejects.toBeInstanceOf(MissingToolError);
  });

  it('reports other spawn failures as process errors', async () => {
    spawnMock.mockImplementation(
      childThat((child) =>
        child.emit('error', Object.assign(new Error('permission denied'), { code: 'EACCES' })),
      ),
    );

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    await expect(invoker.ingest(request)).rejects.toThrow('Failed to start gitingest: permission denied');
  });

  it('rejects with the exit code and stderr tail on failure', async () => {
    spawnMock.mockImplementation(
      childThat((child) => {
        child.stderr.emit('data', Buffer.from('Error: invalid pattern\n'));
        child.emit('close', 3, null);
      }),
    );

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    const error = await invoker.ingest(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({
      message: 'gitingest exited with code 3',
      exitCode: 3,
      details: {
        command: 'gitingest /work/repo -o /work/repo-digest/.tmp-repo-1.txt -e dist',
        stderr: 'Error: invalid pattern',
      },
    });
  });

  it('reports termination by signal', async () => {
    spawnMock.mockImplementation(childThat((child) => child.emit('close', null, 'SIGKILL')));

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    const error = await invoker.ingest(request).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProcessError);
    expect(error).toMatchObject({ message: 'gitingest was killed by SIGKILL', exitCode: undefined });
  });

  it('forwards tool output to debug logging', async () => {
    const debugSpy = vi.spyOn(logger, 'debug').mockImplementation(() => {});
    spawnMock.mockImplementation(
      childThat((child) => {
        child.stdout.emit('data', Buffer.from('Analysis complete!\n'));
        child.emit('close', 0, null);
      }),
    );

    const invoker = new GitingestInvoker({ bin: 'gitingest', logger });
    await invoker.ingest(request);

    expect(debugSpy).toHaveBeenCalledWith('Analysis complete!');
    debugSpy.mockRestore();
  });
});
