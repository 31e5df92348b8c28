import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { buildProgram } from '../../src/index.js';
import { getLogLevel, setLogLevel } from '../../src/utils/logger.js';

let tempDir: string;
let sourceFile: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'pinsmith-cli-test-'));
  sourceFile = join(tempDir, 'pinsmith.lock');
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  setLogLevel('info');
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true }).catch(() => {});
});

function run(...args: string[]): Promise<unknown> {
  return buildProgram().parseAsync(['node', 'pinsmith', ...args]);
}

describe('pinsmith CLI', () => {
  it('runs init against --source-file', async () => {
    await run('--source-file', sourceFile, '--log-level', 'off', 'init');

    expect(await readFile(sourceFile, 'utf-8')).toBe('{}\n');
    expect(getLogLevel()).toBe('off');
  });

  it('adds a static source with an explicit hash', async () => {
    await writeFile(sourceFile, '{}\n');

    await run(
      '--source-file',
      sourceFile,
      '--log-level',
      'off',
      'add',
      'static',
      'https://x.example/{version}.tar.gz',
      '--name',
      'foo',
      '--initial-version',
      '1.0',
      '--hash',
      'abc',
      '--unpack',
    );

    expect(JSON.parse(await readFile(sourceFile, 'utf-8'))).toEqual({
      foo: {
        version: '1.0',
        hash: 'abc',
        latestCheckedVersion: '1.0',
        artifactUrlTemplate: 'https://x.example/{version}.tar.gz',
        pinned: false,
        unpack: true,
        updateScheme: { type: 'static' },
      },
    });
  });

  it('exits with status 1 when a command fails', async () => {
    await writeFile(sourceFile, '{}\n');
    const exit = vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(run('--source-file', sourceFile, 'delete', 'ghost')).rejects.toThrow(
      'process.exit',
    );
    expect(exit).toHaveBeenCalledWith(1);
    expect(String(vi.mocked(console.error).mock.calls[0][0])).toContain(
      'A source named "ghost" does not exist',
    );
  });

  it('rejects an invalid log level before running the command', async () => {
    vi.spyOn(process, 'exit').mockImplementation(() => {
      throw new Error('process.exit');
    });

    await expect(run('--source-file', sourceFile, '--log-level', 'loud', 'init')).rejects.toThrow(
      'process.exit',
    );
    await expect(readFile(sourceFile, 'utf-8')).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
