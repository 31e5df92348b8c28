import { spawnSync } from 'node:child_process';
import { resolveToolBinaries } from './config.js';
import { locateSyntaxError } from '../utils/json.js';
import type { ToolBinaries } from './config.js';

// ── Error classes ──

/** The external command could not be executed at all. */
export class CommandSpawnError extends Error {
  constructor(
    public command: string,
    public readonly cause?: unknown,
  ) {
    super(`Failed to execute command: ${command}`);
    this.name = 'CommandSpawnError';
  }
}

export class RemoteListError extends Error {
  constructor(
    public repoUrl: string,
    public command: string,
    public exitCode: number | null,
    public stderr: string,
  ) {
    super(
      `Listing remote refs of ${repoUrl} failed (exit ${exitCode ?? 'signal'}): ${stderr.trim() || command}`,
    );
    this.name = 'RemoteListError';
  }
}

/** The prefetch tool exited non-zero: usually an unpublished artifact. */
export class PrefetchFailedError extends Error {
  constructor(public url: string) {
    super(`Could not fetch artifact at ${url}`);
    this.name = 'PrefetchFailedError';
  }
}

export class PrefetchResponseError extends Error {
  constructor(
    public url: string,
    public response: string,
    public line: number,
    public column: number,
    detail: string,
  ) {
    super(
      `Malformed or incorrect prefetch response for ${url} at line ${line}, column ${column}: ${detail}`,
    );
    this.name = 'PrefetchResponseError';
  }
}

// ── Types ──

export interface RemoteRef {
  commit: string;
  /** Full ref name, e.g. `refs/tags/v1.2.0`. */
  ref: string;
}

/**
 * Everything the engines need from the outside world. Listings come back in
 * the order the remote ref lister produced them.
 */
export interface SourceTooling {
  listTagRefs(repoUrl: string): RemoteRef[];
  listBranchRefs(repoUrl: string): RemoteRef[];
  fetchHash(url: string, unpack: boolean): string;
}

// ── Helpers ──

export function parseRemoteRefs(output: string): RemoteRef[] {
  const refs: RemoteRef[] = [];
  for (const line of output.split('\n')) {
    const [commit, ref] = line.trim().split(/\s+/);
    if (!commit || !ref) continue;
    refs.push({ commit, ref });
  }
  return refs;
}

export function parsePrefetchResponse(url: string, stdout: string): string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (err) {
    const { line, column } = locateSyntaxError(stdout, err);
    throw new PrefetchResponseError(url, stdout, line, column, 'invalid JSON');
  }

  if (
    typeof parsed !== 'object' ||
    parsed === null ||
    !('hash' in parsed) ||
    typeof parsed.hash !== 'string'
  ) {
    throw new PrefetchResponseError(url, stdout, 1, 1, 'expected an object with a string "hash"');
  }

  return parsed.hash;
}

// Tag listings of large repositories run to tens of megabytes.
export const MAX_OUTPUT_BYTES = 256 * 1024 * 1024;

function run(
  binary: string,
  args: string[],
): { status: number | null; stdout: string; stderr: string } {
  const result = spawnSync(binary, args, {
    encoding: 'utf-8',
    stdio: ['ignore', 'pipe', 'pipe'],
    maxBuffer: MAX_OUTPUT_BYTES,
  });

  if (result.error) {
    throw new CommandSpawnError(`${binary} ${args.join(' ')}`, result.error);
  }

  return {
    status: result.status,
    stdout: result.stdout ?? '',
    stderr: result.stderr ?? '',
  };
}

// ── Default implementation ──

/** Runs `git ls-remote` and `nix store prefetch-file`. */
export class SystemSourceTooling implements SourceTooling {
  private binaries: ToolBinaries;

  constructor(binaries: ToolBinaries = resolveToolBinaries()) {
    this.binaries = binaries;
  }

  listTagRefs(repoUrl: string): RemoteRef[] {
    return this.lsRemote(repoUrl, [
      '-c',
      'versionsort.suffix=-',
      'ls-remote',
      '--tags',
      '--sort=v:refname',
      repoUrl,
    ]);
  }

  listBranchRefs(repoUrl: string): RemoteRef[] {
    return this.lsRemote(repoUrl, ['ls-remote', '--branches', repoUrl]);
  }

  fetchHash(url: string, unpack: boolean): string {
    const args = ['store', 'prefetch-file', url, '--json'];
    if (unpack) {
      args.push('--unpack');
    }

    const result = run(this.binaries.nix, args);
    if (result.status !== 0) {
      throw new PrefetchFailedError(url);
    }

    return parsePrefetchResponse(url, result.stdout);
  }

  private lsRemote(repoUrl: string, args: string[]): RemoteRef[] {
    const result = run(this.binaries.git, args);
    if (result.status !== 0) {
      throw new RemoteListError(
        repoUrl,
        `${this.binaries.git} ${args.join(' ')}`,
        result.status,
        result.stderr,
      );
    }
    return parseRemoteRefs(result.stdout);
  }
}
