import { describe, it, expect, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import * as os from 'os';
import { join } from '@treedigest/shared';
import { countLines, LineTally } from './lines';

function tally(...chunks: Array<string | number[]>): number {
  const t = new LineTally();
  for (const chunk of chunks) {
    t.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : Uint8Array.from(chunk));
  }
  return t.total();
}

describe('LineTally', () => {
  it('counts nothing for empty input', () => {
    expect(tally('')).toBe(0);
  });

  it('counts terminated lines', () => {
    expect(tally('a\nb\n')).toBe(2);
  });

  it('counts a trailing unterminated line', () => {
    expect(tally('a\nb')).toBe(2);
    expect(tally('only')).toBe(1);
  });

  it('counts blank lines', () => {
    expect(tally('\n\n\n')).toBe(3);
  });

  it('treats CRLF and lone CR as single terminators', () => {
    expect(tally('a\r\nb\r\n')).toBe(2);
    expect(tally('a\rb\rc')).toBe(3);
  });

  it('does not double count CRLF split across chunks', () => {
    expect(tally('a\r', '\nb\r', '\n')).toBe(2);
  });

  it('counts multi-byte characters split across chunks', () => {
    expect(tally('a\n', [0xc3], [0xa9])).toBe(2);
    expect(tally('a\n', [0xf0, 0x9f], [0x98, 0x80])).toBe(2);
  });

  it('skips bytes that are not valid UTF-8', () => {
    expect(tally([0x61, 0x0a, 0xff])).toBe(1);
    expect(tally([0x61, 0x0a, 0xe2, 0x82])).toBe(1);
    expect(tally([0x61, 0x0a, 0xe0, 0x80, 0x80])).toBe(1);
    expect(tally([0x61, 0x0a, 0xc3, 0x28])).toBe(2);
  });

  it('counts an encoded replacement character as text', () => {
    expect(tally([0x61, 0x0a, 0xef, 0xbf, 0xbd])).toBe(2);
  });
});

describe('countLines', () => {
  let tmpDir: string | undefined;

  afterEach(async () => {
    if (tmpDir) {
      await fs.rm(tmpDir, { recursive: true, force: true });
      tmpDir = undefined;
    }
  });

  it('counts the lines of a file', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-lines-test-'));
    const file = join(tmpDir, 'digest.txt');
    await fs.writeFile(file, 'Directory structure:\n└── repo/\n    └── a.txt\n');

    expect(await countLines(file)).toBe(3);
  });

  it('tolerates bytes that are not valid UTF-8', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-lines-test-'));
    const file = join(tmpDir, 'digest.txt');
    await fs.writeFile(file, Buffer.from([0x61, 0xff, 0xfe, 0x0a, 0xc3, 0x28, 0x0a, 0x62]));

    expect(await countLines(file)).toBe(3);
  });

  it('does not count undecodable bytes after the last newline as a line', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-lines-test-'));
    const file = join(tmpDir, 'digest.txt');
    await fs.writeFile(file, Buffer.from([0x61, 0x0a, 0xff]));

    expect(await countLines(file)).toBe(1);
  });

  it('counts large files streamed in several chunks', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-lines-test-'));
    const file = join(tmpDir, 'digest.txt');
    await fs.writeFile(file, 'line of text\r\n'.repeat(20000));

    expect(await countLines(file)).toBe(20000);
  });

  it('rejects when the file does not exist', async () => {
    tmpDir = await fs.mkdtemp(join(os.tmpdir(), 'treedigest-lines-test-'));
    await expect(countLines(join(tmpDir, 'missing.txt'))).rejects.toThrow();
  });
});
