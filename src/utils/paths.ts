import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';

function getPackageRoot(): string {
  const currentFile = fileURLToPath(import.meta.url);
  // Works from both src/utils/ and dist/utils/
  return resolve(dirname(currentFile), '..', '..');
}

export function getSchemaPath(): string {
  return resolve(getPackageRoot(), 'schema', 'pinsmith.schema.json');
}

export function getPackageJsonPath(): string {
  return resolve(getPackageRoot(), 'package.json');
}
