import chalk from 'chalk';
import { resolveSourceFile } from '../core/config.js';
import { loadSourceMap, sourceNames } from '../core/source-map.js';
import { header, icons, table } from '../utils/output.js';
import type { GlobalOptions } from '../core/config.js';

export interface ListOptions extends GlobalOptions {
  json?: boolean;
}

export async function list(options: ListOptions = {}): Promise<void> {
  const sourceFile = resolveSourceFile(options);
  const sources = await loadSourceMap(sourceFile);
  const names = sourceNames(sources);

  if (options.json) {
    const output = names.map((name) => ({
      name,
      version: sources[name].version,
      scheme: sources[name].updateScheme.type,
      pinned: sources[name].pinned,
      hash: sources[name].hash,
    }));
    console.log(JSON.stringify(output, null, 2));
    return;
  }

  if (names.length === 0) {
    console.log(`${icons.info} No sources in ${sourceFile}.`);
    return;
  }

  console.log('');
  console.log(header('Sources'));
  console.log('');

  const rows: string[][] = [
    [chalk.dim('NAME'), chalk.dim('VERSION'), chalk.dim('SCHEME'), chalk.dim('PINNED')],
  ];
  for (const name of names) {
    const source = sources[name];
    rows.push([
      name,
      source.version,
      source.updateScheme.type,
      source.pinned ? chalk.yellow('yes') : 'no',
    ]);
  }

  console.log(table(rows));
}
