import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile, readFile, readdir } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import {
  parseSourceMap,
  serializeSourceMap,
  loadSourceMap,
  saveSourceMap,
  createSourceFile,
  sourceNames,
  SourceMapLoadError,
  SourceFileExistsError,
} from '../../src/core/source-map.js';
import type { SourceMap } from '../../src/types/source.js';

function sampleMap(): SourceMap {
  return {
    widget: {
      version: '2.0.0',
      hash: 'sha256-AAAA',
      latestCheckedVersion: '2.1.0',
      artifactUrlTemplate: 'https://github.com/acme/widget/archive/v{version}.tar.gz',
      pinned: false,
      updateScheme: { type: 'git-tags', repoUrl: null, tagPrefix: 'v' },
    },
    gadget: {
      version: 'main-abcdef',
      hash: 'sha256-BBBB',
      latestCheckedVersion: 'main-abcdef',
      artifactUrlTemplate: 'https://github.com/acme/gadget/archive/{branch}.tar.gz',
      pinned: true,
      unpack: true,
      updateScheme: {
        type: 'git-branch',
        repoUrl: 'https://github.com/acme/gadget',
        branch: 'main',
        shortHashLength: 6,
      },
    },
    blob: {
      version: '1.0',
      hash: 'sha256-CCCC',
      latestCheckedVersion: '1.0',
      artifactUrlTemplate: 'https://x.example/{version}.bin',
      pinned: false,
      updateScheme: { type: 'static' },
    },
  };
}

describe('serializeSourceMap / parseSourceMap', () => {
  it('round-trips one source of each scheme field for field', () => {
    const map = sampleMap();
    expect(parseSourceMap(serializeSourceMap(map))).toEqual(map);
  });

  it('is byte-stable across a parse and re-serialize', () => {
    const text = serializeSourceMap(sampleMap());
    expect(serializeSourceMap(parseSourceMap(text))).toBe(text);
  });

  it('sorts names and uses a fixed field order', () => {
    const text = serializeSourceMap({
      zeta: sampleMap().blob,
      alpha: {
        updateScheme: { type: 'static' },
        pinned: false,
        artifactUrlTemplate: 'https://x.example/{version}',
        latestCheckedVersion: '1',
        hash: 'h',
        version: '1',
      },
    });
    expect(Object.keys(JSON.parse(text))).toEqual(['alpha', 'zeta']);
    expect(text.split('\n').slice(1, 10)).toEqual([
      '  "alpha": {',
      '    "version": "1",',
      '    "hash": "h",',
      '    "latestCheckedVersion": "1",',
      '    "artifactUrlTemplate": "https://x.example/{version}",',
      '    "pinned": false,',
      '    "updateScheme": {',
      '      "type": "static"',
      '    }',
    ]);
  });

  it('serializes an empty map as {}', () => {
    expect(serializeSourceMap({})).toBe('{}\n');
  });

  it('reports malformed JSON with line and column', () => {
    try {
      parseSourceMap('{\n  "foo": \n}\n', 'pinsmith.lock');
      expect.unreachable('Expected SourceMapLoadError');
    } catch (err) {
      expect(err).toBeInstanceOf(SourceMapLoadError);
      const loadErr = err as SourceMapLoadError;
      expect(loadErr.kind).toBe('malformed-json');
      expect(loadErr.line).toBe(3);
      expect(loadErr.column).toBe(1);
    }
  });

  it('reports schema mismatches with the position of the offending key', () => {
    const text = JSON.stringify(
      {
        foo: {
          version: '1.0',
          hash: 'abc',
          latestCheckedVersion: '1.0',
          artifactUrlTemplate: 'https://x/{version}.tar.gz',
          pinned: 'yes',
          updateScheme: { type: 'static' },
        },
      },
      null,
      2,
    );

    try {
      parseSourceMap(text);
      expect.unreachable('Expected SourceMapLoadError');
    } catch (err) {
      const loadErr = err as SourceMapLoadError;
      expect(loadErr.kind).toBe('schema-mismatch');
      expect(loadErr.line).toBe(7);
      expect(loadErr.column).toBe(5);
      expect(loadErr.message).toContain('/foo/pinned must be boolean');
    }
  });

  it('rejects unknown properties instead of dropping them', () => {
    const map = sampleMap();
    const text = JSON.stringify({ blob: { ...map.blob, mirror: 'https://m.example' } }, null, 2);

    expect(() => parseSourceMap(text)).toThrow('must NOT have additional properties');
  });

  it('rejects an unknown update scheme', () => {
    const text = JSON.stringify({
      blob: { ...sampleMap().blob, updateScheme: { type: 'nightly' } },
    });

    try {
      parseSourceMap(text);
      expect.unreachable('Expected SourceMapLoadError');
    } catch (err) {
      expect((err as SourceMapLoadError).kind).toBe('schema-mismatch');
    }
  });

  it('rejects a git-branch scheme without a branch', () => {
    const text = JSON.stringify({
      gadget: {
        ...sampleMap().gadget,
        updateScheme: { type: 'git-branch', repoUrl: null, shortHashLength: 6 },
      },
    });

    expect(() => parseSourceMap(text)).toThrow(SourceMapLoadError);
  });

  it('rejects a source named __proto__', () => {
    const text = `{"__proto__": ${JSON.stringify(sampleMap().blob)}}`;

    try {
      parseSourceMap(text);
      expect.unreachable('Expected SourceMapLoadError');
    } catch (err) {
      expect((err as SourceMapLoadError).kind).toBe('schema-mismatch');
    }
  });

  it('rejects a non-object document and empty names', () => {
    expect(() => parseSourceMap('[]')).toThrow(SourceMapLoadError);
    expect(() => parseSourceMap(JSON.stringify({ '': sampleMap().blob }))).toThrow(
      SourceMapLoadError,
    );
  });
});

describe('sourceNames', () => {
  it('returns names in sorted order', () => {
    expect(sourceNames(sampleMap())).toEqual(['blob', 'gadget', 'widget']);
  });
});

describe('storage', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'pinsmith-source-map-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('loadSourceMap reports a missing file', async () => {
    await expect(loadSourceMap(join(tempDir, 'missing.lock'))).rejects.toMatchObject({
      name: 'SourceMapLoadError',
      kind: 'not-found',
    });
  });

  it('saveSourceMap writes the serialized document and leaves no temp file', async () => {
    const path = join(tempDir, 'pinsmith.lock');
    await saveSourceMap(path, sampleMap());

    expect(await readFile(path, 'utf-8')).toBe(serializeSourceMap(sampleMap()));
    expect(await readdir(tempDir)).toEqual(['pinsmith.lock']);
    expect(await loadSourceMap(path)).toEqual(sampleMap());
  });

  it('saveSourceMap replaces existing content', async () => {
    const path = join(tempDir, 'pinsmith.lock');
    await writeFile(path, serializeSourceMap(sampleMap()));

    await saveSourceMap(path, {});

    expect(await readFile(path, 'utf-8')).toBe('{}\n');
  });

  it('createSourceFile writes an empty map once', async () => {
    const path = join(tempDir, 'pinsmith.lock');
    await createSourceFile(path);

    expect(await readFile(path, 'utf-8')).toBe('{}\n');
    await expect(createSourceFile(path)).rejects.toBeInstanceOf(SourceFileExistsError);
  });
});
