import { resolveSourceFile } from '../core/config.js';
import { loadSourceMap, saveSourceMap } from '../core/source-map.js';
import { deleteSources } from '../core/source-editor.js';
import { log } from '../utils/logger.js';
import type { GlobalOptions } from '../core/config.js';

export async function deleteCommand(
  names: string[],
  options: GlobalOptions = {},
): Promise<string[]> {
  const sourceFile = resolveSourceFile(options);
  const sources = await loadSourceMap(sourceFile);

  const removed = deleteSources(sources, names);
  await saveSourceMap(sourceFile, sources);

  for (const name of removed) {
    log.success(`Source "${name}" has been removed`);
  }
  return removed;
}
