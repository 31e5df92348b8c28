import {
  PrefetchFailedError,
  RemoteListError,
} from '../../src/core/source-tooling.js';
import type { RemoteRef, SourceTooling } from '../../src/core/source-tooling.js';

export interface FakeRemote {
  /** Tag names in the order `git ls-remote --sort=v:refname` would list them. */
  tags?: string[];
  /** Branch name → head commit. */
  branches?: Record<string, string>;
  /** Thrown by every listing of this remote. */
  error?: Error;
}

/**
 * In-memory stand-in for git and nix. A URL missing from `hashes` behaves like
 * a prefetch of an unpublished artifact; an `Error` value is thrown as is.
 */
export class FakeSourceTooling implements SourceTooling {
  remotes: Record<string, FakeRemote>;
  hashes: Record<string, string | Error>;
  calls: {
    listTagRefs: string[];
    listBranchRefs: string[];
    fetchHash: Array<{ url: string; unpack: boolean }>;
  } = { listTagRefs: [], listBranchRefs: [], fetchHash: [] };

  constructor(
    remotes: Record<string, FakeRemote> = {},
    hashes: Record<string, string | Error> = {},
  ) {
    this.remotes = remotes;
    this.hashes = hashes;
  }

  listTagRefs(repoUrl: string): RemoteRef[] {
    this.calls.listTagRefs.push(repoUrl);
    const remote = this.remote(repoUrl);
    return (remote.tags ?? []).map((tag, i) => ({
      commit: String(i).padStart(40, 'a'),
      ref: `refs/tags/${tag}`,
    }));
  }

  listBranchRefs(repoUrl: string): RemoteRef[] {
    this.calls.listBranchRefs.push(repoUrl);
    const remote = this.remote(repoUrl);
    return Object.entries(remote.branches ?? {}).map(([branch, commit]) => ({
      commit,
      ref: `refs/heads/${branch}`,
    }));
  }

  fetchHash(url: string, unpack: boolean): string {
    this.calls.fetchHash.push({ url, unpack });
    const hash = this.hashes[url];
    if (hash === undefined) {
      throw new PrefetchFailedError(url);
    }
    if (hash instanceof Error) {
      throw hash;
    }
    return hash;
  }

  private remote(repoUrl: string): FakeRemote {
    const remote = this.remotes[repoUrl];
    if (!remote) {
      throw new RemoteListError(repoUrl, `git ls-remote ${repoUrl}`, 128, 'repository not found');
    }
    if (remote.error) {
      throw remote.error;
    }
    return remote;
  }
}
