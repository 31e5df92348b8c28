import { resolveSourceFile } from '../core/config.js';
import { loadSourceMap, saveSourceMap } from '../core/source-map.js';
import {
  EDITABLE_KEYS,
  EditValueError,
  editSource,
  isEditableKey,
} from '../core/source-editor.js';
import { log } from '../utils/logger.js';
import type { GlobalOptions } from '../core/config.js';
import type { EditResult } from '../core/source-editor.js';

export async function edit(
  name: string,
  key: string,
  value: string,
  options: GlobalOptions = {},
): Promise<EditResult> {
  if (!isEditableKey(key)) {
    throw new EditValueError(key, value, `key must be one of ${EDITABLE_KEYS.join(', ')}`);
  }

  const sourceFile = resolveSourceFile(options);
  const sources = await loadSourceMap(sourceFile);

  const result = editSource(sources, name, key, value);
  await saveSourceMap(sourceFile, sources);

  log.success(`Changed \`${key}\` to \`${value}\` in source ${name}`);
  if (result.warning) {
    log.warn(result.warning);
  }
  return result;
}
