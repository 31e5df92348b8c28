import chalk from 'chalk';
import { resolveSourceFile } from '../core/config.js';
import { loadSourceMap, saveSourceMap } from '../core/source-map.js';
import { reconcile } from '../core/reconciler.js';
import { SystemSourceTooling } from '../core/source-tooling.js';
import { log } from '../utils/logger.js';
import { versionChange } from '../utils/output.js';
import type { GlobalOptions } from '../core/config.js';
import type { ReconcileReport } from '../core/reconciler.js';
import type { SourceTooling } from '../core/source-tooling.js';

export interface UpdateOptions extends GlobalOptions {
  refetch?: boolean;
  force?: boolean;
  pin?: boolean;
  unpin?: boolean;
  /** Print the version changes on stdout whatever the log level. */
  showUpdated?: boolean;
  /** Print the version changes as a JSON object instead of text. */
  json?: boolean;
  tooling?: SourceTooling;
}

function logOutcomes(report: ReconcileReport): void {
  for (const { name, outcome } of report.outcomes) {
    switch (outcome.status) {
      case 'updated':
        log.success(`${chalk.bold(name)}: ${versionChange(outcome.diff.old, outcome.diff.new)}`);
        break;
      case 'hash-updated':
        log.success(`${chalk.bold(name)}: hash updated`);
        break;
      case 'pin-changed':
        log.success(`${chalk.bold(name)}: ${outcome.pinned ? 'pinned' : 'unpinned'}`);
        break;
      case 'up-to-date':
        log.debug(`${name}: up to date`);
        break;
      case 'skipped':
        log.debug(`${name}: skipped (pinned)`);
        break;
      case 'error':
        // Already reported when it happened.
        break;
    }
  }
}

export async function update(
  names: string[],
  options: UpdateOptions = {},
): Promise<ReconcileReport> {
  const sourceFile = resolveSourceFile(options);
  const sources = await loadSourceMap(sourceFile);
  const tooling = options.tooling ?? new SystemSourceTooling();

  const report = reconcile(
    sources,
    {
      names,
      refetch: options.refetch,
      force: options.force,
      pin: options.pin,
      unpin: options.unpin,
    },
    tooling,
  );

  if (report.changed) {
    await saveSourceMap(sourceFile, sources);
  }

  logOutcomes(report);
  const { updated, upToDate, skipped, errors } = report.summary;
  log.info(
    `${updated} updated, ${upToDate} up to date, ${skipped} skipped, ${errors} failed`,
  );

  if (options.json) {
    console.log(JSON.stringify(report.diffs, null, 2));
  } else if (options.showUpdated) {
    for (const [name, diff] of Object.entries(report.diffs)) {
      console.log(`${name}: ${diff.old} -> ${diff.new}`);
    }
  }

  return report;
}
