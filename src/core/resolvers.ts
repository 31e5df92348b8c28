import { RemoteListError } from './source-tooling.js';
import type { RemoteRef, SourceTooling } from './source-tooling.js';
import type {
  GitBranchScheme,
  GitTagsScheme,
  Source,
  StaticScheme,
  UpdateScheme,
} from '../types/source.js';

// ── Error classes ──

export type InferRepoUrlReason =
  | 'unparseable-template'
  | 'artifact-url-no-base'
  | 'insufficient-path-segments';

export class InferRepoUrlError extends Error {
  constructor(
    public template: string,
    public reason: InferRepoUrlReason,
  ) {
    super(`Cannot infer repository URL from ${template}: ${describeInferReason(reason)}`);
    this.name = 'InferRepoUrlError';
  }
}

export class NoTagsFitFilterError extends Error {
  constructor(
    public repoUrl: string,
    public tagPrefix: string | null,
  ) {
    super(
      tagPrefix
        ? `No tag of ${repoUrl} fits the prefix "${tagPrefix}" followed by a digit`
        : `No tag of ${repoUrl} starts with a digit`,
    );
    this.name = 'NoTagsFitFilterError';
  }
}

export class BranchNotFoundError extends Error {
  constructor(
    public repoUrl: string,
    public branch: string,
  ) {
    super(`Branch "${branch}" not found in ${repoUrl}`);
    this.name = 'BranchNotFoundError';
  }
}

/**
 * Per-source resolution failures that leave the rest of a batch meaningful:
 * an uninferable repository, no fitting tag, or a remote that refused the
 * listing (gone, renamed, private). A git binary that cannot run at all, or a
 * missing branch, is not in this set.
 */
export function isRecoverableResolveError(err: unknown): boolean {
  return (
    err instanceof InferRepoUrlError ||
    err instanceof NoTagsFitFilterError ||
    err instanceof RemoteListError
  );
}

function describeInferReason(reason: InferRepoUrlReason): string {
  switch (reason) {
    case 'unparseable-template':
      return 'template is not a valid URL';
    case 'artifact-url-no-base':
      return 'artifact URL does not have a base';
    case 'insufficient-path-segments':
      return 'insufficient path segments to infer URL';
  }
}

// ── Repository URL ──

/** `https://host/owner/repo/...` → `https://host/owner/repo` */
export function inferRepoUrl(template: string): string {
  let url: URL;
  try {
    url = new URL(template);
  } catch {
    throw new InferRepoUrlError(template, 'unparseable-template');
  }

  if (!url.pathname.startsWith('/')) {
    throw new InferRepoUrlError(template, 'artifact-url-no-base');
  }

  const [owner, repo] = url.pathname.slice(1).split('/');
  if (!owner || !repo) {
    throw new InferRepoUrlError(template, 'insufficient-path-segments');
  }

  url.pathname = `/${owner}/${repo}`;
  url.search = '';
  url.hash = '';
  return url.href;
}

/** An explicit repository URL always wins over the inferred one. */
export function resolveRepoUrl(
  scheme: GitTagsScheme | GitBranchScheme,
  artifactUrlTemplate: string,
): string {
  return scheme.repoUrl ?? inferRepoUrl(artifactUrlTemplate);
}

// ── Tag filtering ──

function lastSegment(ref: string): string {
  return ref.slice(ref.lastIndexOf('/') + 1);
}

/**
 * Pick the highest matching tag from a version-sorted listing and strip the
 * prefix. A tag matches when it starts with `prefix` and the next character
 * is an ASCII digit, so prefix `v` accepts `v2.0` but not `version-info`.
 */
export function selectLatestTag(
  tags: readonly string[],
  prefix: string | null,
): string | null {
  const filter = prefix ?? '';
  let latest: string | null = null;

  for (const tag of tags) {
    if (!tag.startsWith(filter)) continue;
    if (!/^[0-9]$/.test(tag.charAt(filter.length))) continue;
    latest = tag;
  }

  return latest === null ? null : latest.slice(filter.length);
}

export function tagNames(refs: readonly RemoteRef[]): string[] {
  return refs
    .map((r) => r.ref)
    // Annotated tags are listed twice; the `^{}` line is the peeled commit.
    .filter((ref) => !ref.endsWith('^{}'))
    .map(lastSegment);
}

export function findBranchCommit(
  refs: readonly RemoteRef[],
  branch: string,
): string | null {
  const match = refs.find((r) => lastSegment(r.ref) === branch);
  return match ? match.commit : null;
}

// ── Resolvers ──

export interface SchemeResolver<S extends UpdateScheme> {
  resolve(source: Source, scheme: S, tooling: SourceTooling): string;
}

export const gitTagsResolver: SchemeResolver<GitTagsScheme> = {
  resolve(source, scheme, tooling) {
    const repoUrl = resolveRepoUrl(scheme, source.artifactUrlTemplate);
    const latest = selectLatestTag(tagNames(tooling.listTagRefs(repoUrl)), scheme.tagPrefix);
    if (latest === null) {
      throw new NoTagsFitFilterError(repoUrl, scheme.tagPrefix);
    }
    return latest;
  },
};

export const gitBranchResolver: SchemeResolver<GitBranchScheme> = {
  resolve(source, scheme, tooling) {
    const repoUrl = resolveRepoUrl(scheme, source.artifactUrlTemplate);
    const commit = findBranchCommit(tooling.listBranchRefs(repoUrl), scheme.branch);
    if (commit === null) {
      throw new BranchNotFoundError(repoUrl, scheme.branch);
    }
    return `${scheme.branch}-${commit.slice(0, scheme.shortHashLength)}`;
  },
};

export const staticResolver: SchemeResolver<StaticScheme> = {
  resolve(source) {
    return source.version;
  },
};

/** Candidate "latest version" for a source under its own update scheme. */
export function resolveCandidateVersion(source: Source, tooling: SourceTooling): string {
  const scheme = source.updateScheme;
  switch (scheme.type) {
    case 'git-tags':
      return gitTagsResolver.resolve(source, scheme, tooling);
    case 'git-branch':
      return gitBranchResolver.resolve(source, scheme, tooling);
    case 'static':
      return staticResolver.resolve(source, scheme, tooling);
  }
}
