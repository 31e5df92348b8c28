import { readFileSync } from 'node:fs';
import { getPackageJsonPath } from './utils/paths.js';

function readVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(getPackageJsonPath(), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const VERSION = readVersion();
