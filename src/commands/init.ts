import chalk from 'chalk';
import { resolveSourceFile } from '../core/config.js';
import { createSourceFile } from '../core/source-map.js';
import { log } from '../utils/logger.js';
import type { GlobalOptions } from '../core/config.js';

export async function init(options: GlobalOptions = {}): Promise<void> {
  const sourceFile = resolveSourceFile(options);
  await createSourceFile(sourceFile);

  log.success(`Created ${chalk.bold(sourceFile)}`);
  log.info(`Next: ${chalk.cyan('pinsmith add <scheme> <artifact-url-template>')}`);
}
