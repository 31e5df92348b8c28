import { describe, it, expect } from 'vitest';
import { validateSourceMap } from '../../src/core/schema-validator.js';

const source = {
  version: '1.0',
  hash: 'abc',
  latestCheckedVersion: '1.0',
  artifactUrlTemplate: 'https://x.example/{version}.tar.gz',
  pinned: false,
  updateScheme: { type: 'static' },
};

describe('validateSourceMap', () => {
  it('accepts an empty map', () => {
    expect(validateSourceMap({})).toEqual({ valid: true, value: {} });
  });

  it('accepts every update scheme', () => {
    const result = validateSourceMap({
      a: source,
      b: { ...source, updateScheme: { type: 'git-tags', repoUrl: null, tagPrefix: 'v' } },
      c: {
        ...source,
        unpack: true,
        updateScheme: {
          type: 'git-branch',
          repoUrl: 'https://github.com/acme/c',
          branch: 'main',
          shortHashLength: 8,
        },
      },
    });
    expect(result.valid).toBe(true);
  });

  it('points at the missing field', () => {
    const { hash: _hash, ...withoutHash } = source;
    const result = validateSourceMap({ foo: withoutHash });

    expect(result).toEqual({
      valid: false,
      issues: [{ path: '/foo', message: "/foo must have required property 'hash'" }],
    });
  });

  it('points at an unexpected property', () => {
    const result = validateSourceMap({ foo: { ...source, extra: 1 } });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues[0].path).toBe('/foo/extra');
    }
  });

  it('reports errors inside the matching scheme variant', () => {
    const result = validateSourceMap({
      foo: {
        ...source,
        updateScheme: { type: 'git-branch', repoUrl: null, branch: 'main', shortHashLength: 0 },
      },
    });

    expect(result.valid).toBe(false);
    if (!result.valid) {
      expect(result.issues.map((i) => i.path)).toContain('/foo/updateScheme/shortHashLength');
    }
  });

  it('rejects a repository URL that is not a URI', () => {
    const result = validateSourceMap({
      foo: { ...source, updateScheme: { type: 'git-tags', repoUrl: 'not a uri', tagPrefix: null } },
    });
    expect(result.valid).toBe(false);
  });
});
