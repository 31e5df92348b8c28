import { resolveCandidateVersion, resolveRepoUrl } from './resolvers.js';
import { buildFullUrl } from './url-builder.js';
import { isSchemaUri } from './schema-validator.js';
import { DEFAULT_SHORT_HASH_LENGTH } from '../types/source.js';
import type { SourceTooling } from './source-tooling.js';
import type {
  Source,
  SourceMap,
  UpdateScheme,
  UpdateSchemeType,
} from '../types/source.js';

// ── Error classes ──

export class AddArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AddArgumentError';
  }
}

export class SourceExistsError extends Error {
  constructor(public sourceName: string) {
    super(`A source named "${sourceName}" already exists`);
    this.name = 'SourceExistsError';
  }
}

export class SourceNotFoundError extends Error {
  constructor(public sourceNames: string[]) {
    super(
      sourceNames.length === 1
        ? `A source named "${sourceNames[0]}" does not exist`
        : `Sources named ${sourceNames.map((n) => `"${n}"`).join(', ')} do not exist`,
    );
    this.name = 'SourceNotFoundError';
  }
}

export class EditValueError extends Error {
  constructor(
    public key: string,
    public value: string,
    reason: string,
  ) {
    super(`Invalid value \`${value}\` for key ${key} (${reason})`);
    this.name = 'EditValueError';
  }
}

// ── Construction ──

/** A fresh, unpinned source whose last checked version is its own version. */
export function createSource(
  version: string,
  artifactUrlTemplate: string,
  updateScheme: UpdateScheme,
): Source {
  return {
    version,
    hash: '',
    latestCheckedVersion: version,
    artifactUrlTemplate,
    pinned: false,
    updateScheme,
  };
}

function isUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

/**
 * WHATWG-normalised form of a repository URL, or null when it does not parse or
 * the normalised form would still fail the lockfile's `uri` format.
 */
export function normalizeRepoUrl(value: string): string | null {
  let href: string;
  try {
    href = new URL(value).href;
  } catch {
    return null;
  }
  return isSchemaUri(href) ? href : null;
}

/** Names that plain-object maps cannot hold as own properties. */
const RESERVED_SOURCE_NAMES: ReadonlySet<string> = new Set(['__proto__']);

// ── Add ──

export interface AddRequest {
  scheme: UpdateSchemeType;
  artifactUrlTemplate: string;
  name?: string;
  version?: string;
  /** Skips the prefetch when given. */
  hash?: string;
  unpack?: boolean;
  pinned?: boolean;
  repoUrl?: string;
  tagPrefix?: string;
  branch?: string;
  shortHashLength?: number;
}

export interface AddResult {
  name: string;
  source: Source;
}

const SCHEME_OPTIONS: Record<UpdateSchemeType, ReadonlyArray<keyof AddRequest>> = {
  'git-tags': ['repoUrl', 'tagPrefix'],
  'git-branch': ['repoUrl', 'branch', 'shortHashLength'],
  static: [],
};

const SCHEME_SPECIFIC_FLAGS = [
  ['repoUrl', '--repo-url'],
  ['tagPrefix', '--tag-prefix'],
  ['branch', '--branch'],
  ['shortHashLength', '--short-hash-length'],
] as const satisfies ReadonlyArray<readonly [keyof AddRequest, string]>;

export function buildUpdateScheme(request: AddRequest): UpdateScheme {
  const allowed = SCHEME_OPTIONS[request.scheme];
  for (const [option, flag] of SCHEME_SPECIFIC_FLAGS) {
    if (request[option] !== undefined && !allowed.includes(option)) {
      throw new AddArgumentError(`${flag} cannot be used with the ${request.scheme} scheme`);
    }
  }

  let repoUrl: string | null = null;
  if (request.repoUrl !== undefined) {
    repoUrl = normalizeRepoUrl(request.repoUrl);
    if (repoUrl === null) {
      throw new AddArgumentError(`--repo-url "${request.repoUrl}" is not a valid URL`);
    }
  }

  switch (request.scheme) {
    case 'git-tags':
      return {
        type: 'git-tags',
        repoUrl,
        tagPrefix: request.tagPrefix || null,
      };
    case 'git-branch': {
      if (!request.branch) {
        throw new AddArgumentError('--branch is required with the git-branch scheme');
      }
      const shortHashLength = request.shortHashLength ?? DEFAULT_SHORT_HASH_LENGTH;
      if (!Number.isInteger(shortHashLength) || shortHashLength < 1) {
        throw new AddArgumentError('--short-hash-length must be a positive integer');
      }
      return {
        type: 'git-branch',
        repoUrl,
        branch: request.branch,
        shortHashLength,
      };
    }
    case 'static':
      return { type: 'static' };
  }
}

/** Final path segment of the repository URL, without a `.git` suffix. */
export function inferSourceName(scheme: UpdateScheme, artifactUrlTemplate: string): string {
  if (scheme.type === 'static') {
    throw new AddArgumentError('A name is required for static sources');
  }

  const repoUrl = new URL(resolveRepoUrl(scheme, artifactUrlTemplate));
  const segments = repoUrl.pathname.split('/').filter((s) => s.length > 0);
  const last = segments.length > 0 ? segments[segments.length - 1] : '';
  const name = decodeURIComponent(last.replace(/\.git$/, ''));
  if (!name) {
    throw new AddArgumentError(`Cannot infer a source name from ${repoUrl.href}; pass --name`);
  }
  return name;
}

export function addSource(
  map: SourceMap,
  request: AddRequest,
  tooling: SourceTooling,
): AddResult {
  const updateScheme = buildUpdateScheme(request);

  if (request.name !== undefined && request.name.length === 0) {
    throw new AddArgumentError('Source name must not be empty');
  }
  const name = request.name ?? inferSourceName(updateScheme, request.artifactUrlTemplate);
  if (RESERVED_SOURCE_NAMES.has(name)) {
    throw new AddArgumentError(`"${name}" cannot be used as a source name; pass another --name`);
  }
  if (Object.hasOwn(map, name)) {
    throw new SourceExistsError(name);
  }

  if (request.version === undefined && updateScheme.type === 'static') {
    throw new AddArgumentError('An initial version is required for static sources');
  }

  const draft = createSource(request.version ?? '', request.artifactUrlTemplate, updateScheme);
  const version = request.version ?? resolveCandidateVersion(draft, tooling);

  const source = createSource(version, request.artifactUrlTemplate, updateScheme);
  source.pinned = request.pinned ?? false;
  if (request.unpack) {
    source.unpack = true;
  }

  const url = buildFullUrl(source, version);
  source.hash = request.hash ?? tooling.fetchHash(url.href, source.unpack ?? false);

  map[name] = source;
  return { name, source };
}

// ── Delete ──

/** All or nothing: if any name is missing, nothing is removed. */
export function deleteSources(map: SourceMap, names: string[]): string[] {
  const unique = [...new Set(names)];
  const missing = unique.filter((name) => !Object.hasOwn(map, name));
  if (missing.length > 0) {
    throw new SourceNotFoundError(missing);
  }

  for (const name of unique) {
    delete map[name];
  }
  return unique;
}

// ── Edit ──

export const EDITABLE_KEYS = [
  'pinned',
  'unpack',
  'artifact-url-template',
  'repo-url',
  'tag-prefix',
  'branch',
  'short-hash-length',
] as const;

export type EditableKey = (typeof EDITABLE_KEYS)[number];

const HASH_AFFECTING_KEYS: ReadonlySet<EditableKey> = new Set<EditableKey>([
  'unpack',
  'artifact-url-template',
  'repo-url',
  'tag-prefix',
  'branch',
]);

export function isEditableKey(key: string): key is EditableKey {
  return EDITABLE_KEYS.some((candidate) => candidate === key);
}

export interface EditResult {
  /** Set when the edit makes the stored hash possibly stale. */
  warning?: string;
}

function parseBoolean(key: EditableKey, value: string): boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;
  throw new EditValueError(key, value, 'must be `true` or `false`');
}

export function editSource(
  map: SourceMap,
  name: string,
  key: EditableKey,
  value: string,
): EditResult {
  if (!Object.hasOwn(map, name)) {
    throw new SourceNotFoundError([name]);
  }
  const source = map[name];
  const scheme = source.updateScheme;

  switch (key) {
    case 'pinned':
      source.pinned = parseBoolean(key, value);
      break;

    case 'unpack':
      source.unpack = parseBoolean(key, value);
      break;

    case 'artifact-url-template':
      if (!isUrl(value)) {
        throw new EditValueError(key, value, 'must be a valid URL');
      }
      source.artifactUrlTemplate = value;
      break;

    case 'repo-url': {
      if (scheme.type === 'static') {
        throw new EditValueError(key, value, 'static sources have no repository');
      }
      const repoUrl = value === '' ? null : normalizeRepoUrl(value);
      if (value !== '' && repoUrl === null) {
        throw new EditValueError(key, value, 'must be a valid URL or empty string');
      }
      scheme.repoUrl = repoUrl;
      break;
    }

    case 'tag-prefix':
      if (scheme.type !== 'git-tags') {
        throw new EditValueError(key, value, 'only git-tags sources have a tag prefix');
      }
      scheme.tagPrefix = value === '' ? null : value;
      break;

    case 'branch':
      if (scheme.type !== 'git-branch') {
        throw new EditValueError(key, value, 'only git-branch sources have a branch');
      }
      if (value === '') {
        throw new EditValueError(key, value, 'must not be empty');
      }
      scheme.branch = value;
      break;

    case 'short-hash-length': {
      if (scheme.type !== 'git-branch') {
        throw new EditValueError(key, value, 'only git-branch sources have a short hash length');
      }
      const length = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
      if (!(length >= 1)) {
        throw new EditValueError(key, value, 'must be a positive integer');
      }
      scheme.shortHashLength = length;
      break;
    }
  }

  if (HASH_AFFECTING_KEYS.has(key)) {
    return {
      warning: `The changed value could affect the hash; consider running \`pinsmith update --refetch ${name}\``,
    };
  }
  return {};
}
