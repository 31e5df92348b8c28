import { readFile, writeFile, rename, rm } from 'node:fs/promises';
import { validateSourceMap } from './schema-validator.js';
import { locatePointer, locateSyntaxError } from '../utils/json.js';
import type { Source, SourceMap, UpdateScheme } from '../types/source.js';

// ── Error classes ──

export type SourceMapLoadErrorKind =
  | 'not-found'
  | 'permission-denied'
  | 'malformed-json'
  | 'schema-mismatch'
  | 'io';

export class SourceMapLoadError extends Error {
  constructor(
    message: string,
    public kind: SourceMapLoadErrorKind,
    public path: string,
    public line?: number,
    public column?: number,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SourceMapLoadError';
  }
}

export class SourceMapWriteError extends Error {
  constructor(
    message: string,
    public kind: 'permission-denied' | 'io',
    public path: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'SourceMapWriteError';
  }
}

export class SourceFileExistsError extends Error {
  constructor(public path: string) {
    super(`${path} already exists`);
    this.name = 'SourceFileExistsError';
  }
}

// ── Helpers ──

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

export function sourceNames(map: SourceMap): string[] {
  return Object.keys(map).sort();
}

function normalizeScheme(scheme: UpdateScheme): UpdateScheme {
  switch (scheme.type) {
    case 'git-tags':
      return { type: scheme.type, repoUrl: scheme.repoUrl, tagPrefix: scheme.tagPrefix };
    case 'git-branch':
      return {
        type: scheme.type,
        repoUrl: scheme.repoUrl,
        branch: scheme.branch,
        shortHashLength: scheme.shortHashLength,
      };
    case 'static':
      return { type: scheme.type };
  }
}

function normalizeSource(source: Source): Source {
  return {
    version: source.version,
    hash: source.hash,
    latestCheckedVersion: source.latestCheckedVersion,
    artifactUrlTemplate: source.artifactUrlTemplate,
    pinned: source.pinned,
    ...(source.unpack !== undefined ? { unpack: source.unpack } : {}),
    updateScheme: normalizeScheme(source.updateScheme),
  };
}

// ── (De)serialization ──

/** Sorted names, fixed field order: the same map always yields the same bytes. */
export function serializeSourceMap(map: SourceMap): string {
  const ordered: SourceMap = Object.fromEntries(
    sourceNames(map).map((name) => [name, normalizeSource(map[name])]),
  );
  return JSON.stringify(ordered, null, 2) + '\n';
}

export function parseSourceMap(text: string, path = '<input>'): SourceMap {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const { line, column } = locateSyntaxError(text, err);
    throw new SourceMapLoadError(
      `Source file ${path} is malformed JSON at line ${line}, column ${column}`,
      'malformed-json',
      path,
      line,
      column,
      err,
    );
  }

  const result = validateSourceMap(parsed);
  if (!result.valid) {
    const [first] = result.issues;
    const { line, column } = locatePointer(text, first?.path ?? '');
    throw new SourceMapLoadError(
      `Source file ${path} does not conform to the lockfile schema at line ${line}, column ${column}: ${first?.message ?? 'invalid document'}`,
      'schema-mismatch',
      path,
      line,
      column,
    );
  }

  return result.value;
}

// ── Storage ──

export async function loadSourceMap(path: string): Promise<SourceMap> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (err) {
    const code = errorCode(err);
    if (code === 'ENOENT') {
      throw new SourceMapLoadError(
        `Source file ${path} does not exist (run \`pinsmith init\` first)`,
        'not-found',
        path,
        undefined,
        undefined,
        err,
      );
    }
    if (code === 'EACCES' || code === 'EPERM') {
      throw new SourceMapLoadError(
        `Could not read source file ${path}: permission denied`,
        'permission-denied',
        path,
        undefined,
        undefined,
        err,
      );
    }
    throw new SourceMapLoadError(
      `Unexpected I/O error reading ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'io',
      path,
      undefined,
      undefined,
      err,
    );
  }

  return parseSourceMap(raw, path);
}

/**
 * Serialize fully, write beside the target, then rename over it, so a crash
 * leaves either the old or the new document.
 */
export async function saveSourceMap(path: string, map: SourceMap): Promise<void> {
  const content = serializeSourceMap(map);
  const tmpPath = `${path}.tmp-${process.pid}`;

  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, path);
  } catch (err) {
    await rm(tmpPath, { force: true }).catch(() => {});
    const code = errorCode(err);
    if (code === 'EACCES' || code === 'EPERM') {
      throw new SourceMapWriteError(
        `Could not write source file ${path}: permission denied`,
        'permission-denied',
        path,
        err,
      );
    }
    throw new SourceMapWriteError(
      `Unexpected I/O error writing ${path}: ${err instanceof Error ? err.message : String(err)}`,
      'io',
      path,
      err,
    );
  }
}

export async function createSourceFile(path: string): Promise<void> {
  try {
    await writeFile(path, serializeSourceMap({}), { encoding: 'utf-8', flag: 'wx' });
  } catch (err) {
    if (errorCode(err) === 'EEXIST') {
      throw new SourceFileExistsError(path);
    }
    throw new SourceMapWriteError(
      `Could not create source file ${path}: ${err instanceof Error ? err.message : String(err)}`,
      errorCode(err) === 'EACCES' ? 'permission-denied' : 'io',
      path,
      err,
    );
  }
}
