export interface GitTagsScheme {
  type: 'git-tags';
  /** Repository to list tags from; inferred from the artifact URL when null. */
  repoUrl: string | null;
  /** Only tags starting with this prefix followed by a digit are candidates. */
  tagPrefix: string | null;
}

export interface GitBranchScheme {
  type: 'git-branch';
  repoUrl: string | null;
  branch: string;
  shortHashLength: number;
}

export interface StaticScheme {
  type: 'static';
}

export type UpdateScheme = GitTagsScheme | GitBranchScheme | StaticScheme;

export type UpdateSchemeType = UpdateScheme['type'];

export const UPDATE_SCHEME_TYPES: readonly UpdateSchemeType[] = [
  'git-tags',
  'git-branch',
  'static',
];

export const DEFAULT_SHORT_HASH_LENGTH = 6;

export interface Source {
  version: string;
  /** Content hash of the artifact at `version`, as printed by the prefetch tool. */
  hash: string;
  /** Last candidate seen by resolution, whether or not its prefetch succeeded. */
  latestCheckedVersion: string;
  /** URL with `{version}` (and `{branch}` for git-branch) placeholders. */
  artifactUrlTemplate: string;
  pinned: boolean;
  unpack?: boolean;
  updateScheme: UpdateScheme;
}

export type SourceMap = Record<string, Source>;

export interface VersionDiff {
  old: string;
  new: string;
}
