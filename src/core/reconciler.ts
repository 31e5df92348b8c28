import { resolveCandidateVersion, isRecoverableResolveError } from './resolvers.js';
import { buildFullUrl } from './url-builder.js';
import {
  CommandSpawnError,
  PrefetchFailedError,
  PrefetchResponseError,
} from './source-tooling.js';
import { sourceNames } from './source-map.js';
import { log } from '../utils/logger.js';
import type { SourceTooling } from './source-tooling.js';
import type { Source, SourceMap, VersionDiff } from '../types/source.js';

// ── Error classes ──

export class ReconcileOptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReconcileOptionsError';
  }
}

/** A failure that makes the whole batch unreliable; nothing is persisted. */
export class ReconcileAbortedError extends Error {
  constructor(
    public sourceName: string,
    public readonly cause: unknown,
  ) {
    super(
      `Update aborted at source "${sourceName}": ${cause instanceof Error ? cause.message : String(cause)}`,
    );
    this.name = 'ReconcileAbortedError';
  }
}

// ── Types ──

export interface ReconcileOptions {
  /** Sources to reconcile; empty or absent means all. */
  names?: string[];
  refetch?: boolean;
  force?: boolean;
  pin?: boolean;
  unpin?: boolean;
}

export type SourceOutcome =
  | { status: 'pin-changed'; pinned: boolean }
  | { status: 'skipped' }
  | { status: 'up-to-date' }
  | { status: 'updated'; diff: VersionDiff }
  | { status: 'hash-updated' }
  | { status: 'error'; error: Error };

export interface ReconcileSummary {
  updated: number;
  upToDate: number;
  skipped: number;
  errors: number;
}

export interface ReconcileReport {
  /** True when any field of any source changed. */
  changed: boolean;
  outcomes: Array<{ name: string; outcome: SourceOutcome }>;
  summary: ReconcileSummary;
  diffs: Record<string, VersionDiff>;
}

// ── Helpers ──

function selectNames(map: SourceMap, requested: string[] | undefined): string[] {
  if (!requested || requested.length === 0) {
    return sourceNames(map);
  }

  const missing = requested.filter((name) => !Object.hasOwn(map, name));
  if (missing.length > 0) {
    throw new ReconcileOptionsError(
      `No source named ${missing.map((n) => `"${n}"`).join(', ')}`,
    );
  }

  return [...new Set(requested)].sort();
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

function isSystemicPrefetchError(err: unknown): boolean {
  return err instanceof CommandSpawnError || err instanceof PrefetchResponseError;
}

// ── Per-source pipeline ──

interface SourceStep {
  outcome: SourceOutcome;
  changed: boolean;
}

function reconcileSource(
  name: string,
  source: Source,
  options: ReconcileOptions,
  tooling: SourceTooling,
): SourceStep {
  if (options.pin || options.unpin) {
    const pinned = Boolean(options.pin);
    const changed = source.pinned !== pinned;
    source.pinned = pinned;
    log.debug(`${name}: pinned = ${pinned}`);
    return { outcome: { status: 'pin-changed', pinned }, changed };
  }

  if (source.pinned && !options.force) {
    log.debug(`${name}: pinned, skipping`);
    return { outcome: { status: 'skipped' }, changed: false };
  }

  let candidate: string;
  try {
    candidate = resolveCandidateVersion(source, tooling);
  } catch (err) {
    if (isRecoverableResolveError(err)) {
      log.error(`${name}: ${toError(err).message}`);
      return { outcome: { status: 'error', error: toError(err) }, changed: false };
    }
    throw new ReconcileAbortedError(name, err);
  }
  log.trace(`${name}: candidate version ${candidate}`);

  if (
    source.updateScheme.type !== 'static' &&
    !options.refetch &&
    source.latestCheckedVersion === candidate
  ) {
    return { outcome: { status: 'up-to-date' }, changed: false };
  }

  let url: URL;
  try {
    url = buildFullUrl(source, candidate);
  } catch (err) {
    throw new ReconcileAbortedError(name, err);
  }

  let hash: string;
  try {
    log.debug(`${name}: prefetching ${url.href}`);
    hash = tooling.fetchHash(url.href, source.unpack ?? false);
  } catch (err) {
    if (err instanceof PrefetchFailedError) {
      // Remember the unusable candidate so the next run does not retry it.
      const changed = source.latestCheckedVersion !== candidate;
      source.latestCheckedVersion = candidate;
      log.error(`${name}: ${err.message}`);
      return { outcome: { status: 'error', error: err }, changed };
    }
    if (isSystemicPrefetchError(err)) {
      throw new ReconcileAbortedError(name, err);
    }
    log.error(`${name}: ${toError(err).message}`);
    return { outcome: { status: 'error', error: toError(err) }, changed: false };
  }

  const checkedChanged = source.latestCheckedVersion !== candidate;
  source.latestCheckedVersion = candidate;

  if (source.version !== candidate) {
    const diff: VersionDiff = { old: source.version, new: candidate };
    source.version = candidate;
    source.hash = hash;
    return { outcome: { status: 'updated', diff }, changed: true };
  }

  if (source.hash !== hash) {
    source.hash = hash;
    return { outcome: { status: 'hash-updated' }, changed: true };
  }

  return { outcome: { status: 'up-to-date' }, changed: checkedChanged };
}

// ── Engine ──

/**
 * Bring the selected sources up to date in place. Throws
 * `ReconcileAbortedError` on systemic failures, in which case the caller must
 * not persist `map`.
 */
export function reconcile(
  map: SourceMap,
  options: ReconcileOptions,
  tooling: SourceTooling,
): ReconcileReport {
  if (options.pin && options.unpin) {
    throw new ReconcileOptionsError('--pin and --unpin cannot be used together');
  }

  const names = selectNames(map, options.names);
  const report: ReconcileReport = {
    changed: false,
    outcomes: [],
    summary: { updated: 0, upToDate: 0, skipped: 0, errors: 0 },
    diffs: {},
  };

  for (const name of names) {
    const { outcome, changed } = reconcileSource(name, map[name], options, tooling);
    report.outcomes.push({ name, outcome });
    report.changed ||= changed;

    switch (outcome.status) {
      case 'pin-changed':
        if (changed) report.summary.updated++;
        else report.summary.upToDate++;
        break;
      case 'updated':
        report.diffs[name] = outcome.diff;
        report.summary.updated++;
        break;
      case 'hash-updated':
        report.summary.updated++;
        break;
      case 'up-to-date':
        report.summary.upToDate++;
        break;
      case 'skipped':
        report.summary.skipped++;
        break;
      case 'error':
        report.summary.errors++;
        break;
    }
  }

  return report;
}
