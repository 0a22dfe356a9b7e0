import { describe, it, expect } from 'vitest';
import { buildIngestArgs, formatCommand } from './args';

describe('buildIngestArgs', () => {
  it('passes source and output first', () => {
    expect(
      buildIngestArgs({
        source: '/work/repo',
        outputPath: '/work/out/.tmp-repo-abc.txt',
        excludePatterns: [],
        includePatterns: [],
      }),
    ).toEqual(['/work/repo', '-o', '/work/out/.tmp-repo-abc.txt']);
  });

  it('adds size, patterns and branch in order', () => {
    expect(
      buildIngestArgs({
        source: 'repo',
        outputPath: 'out.txt',
        excludePatterns: ['node_modules', 'data/**'],
        includePatterns: ['*.ts'],
        maxSize: 51200,
        branch: 'main',
      }),
    ).toEqual([
      'repo',
      '-o',
      'out.txt',
      '-s',
      '51200',
      '-e',
      'node_modules',
      '-e',
      'data/**',
      '-i',
      '*.ts',
      '-b',
      'main',
    ]);
  });

  it('omits an empty branch', () => {
    expect(
      buildIngestArgs({
        source: 'repo',
        outputPath: 'out.txt',
        excludePatterns: [],
        includePatterns: [],
        branch: '',
      }),
    ).toEqual(['repo', '-o', 'out.txt']);
  });
});

describe('formatCommand', () => {
  it('quotes arguments containing globs or spaces', () => {
    expect(formatCommand('gitingest', ['my repo', '-e', 'data/**', '-o', 'out.txt'])).toBe(
      'gitingest "my repo" -e "data/**" -o out.txt',
    );
  });
});
