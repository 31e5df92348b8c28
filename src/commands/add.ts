import ora from 'ora';
import chalk from 'chalk';
import { resolveSourceFile } from '../core/config.js';
import { loadSourceMap, saveSourceMap } from '../core/source-map.js';
import { AddArgumentError, addSource } from '../core/source-editor.js';
import { SystemSourceTooling } from '../core/source-tooling.js';
import { isLevelEnabled, log } from '../utils/logger.js';
import { UPDATE_SCHEME_TYPES } from '../types/source.js';
import type { GlobalOptions } from '../core/config.js';
import type { AddRequest, AddResult } from '../core/source-editor.js';
import type { SourceTooling } from '../core/source-tooling.js';
import type { UpdateSchemeType } from '../types/source.js';

export interface AddOptions extends GlobalOptions {
  name?: string;
  initialVersion?: string;
  hash?: string;
  unpack?: boolean;
  pinned?: boolean;
  repoUrl?: string;
  tagPrefix?: string;
  branch?: string;
  shortHashLength?: number;
  tooling?: SourceTooling;
}

export function parseScheme(value: string): UpdateSchemeType {
  const scheme = UPDATE_SCHEME_TYPES.find((type) => type === value);
  if (!scheme) {
    throw new AddArgumentError(
      `Unknown update scheme "${value}" (expected one of ${UPDATE_SCHEME_TYPES.join(', ')})`,
    );
  }
  return scheme;
}

export async function add(
  scheme: string,
  artifactUrlTemplate: string,
  options: AddOptions = {},
): Promise<AddResult> {
  const request: AddRequest = {
    scheme: parseScheme(scheme),
    artifactUrlTemplate,
    name: options.name,
    version: options.initialVersion,
    hash: options.hash,
    unpack: options.unpack,
    pinned: options.pinned,
    repoUrl: options.repoUrl,
    tagPrefix: options.tagPrefix,
    branch: options.branch,
    shortHashLength: options.shortHashLength,
  };

  const sourceFile = resolveSourceFile(options);
  const sources = await loadSourceMap(sourceFile);
  const tooling = options.tooling ?? new SystemSourceTooling();

  const spinner = ora({
    text: request.hash === undefined ? 'Resolving and prefetching...' : 'Resolving...',
    stream: process.stderr,
    isSilent: !isLevelEnabled('info'),
  }).start();

  let result: AddResult;
  try {
    result = addSource(sources, request, tooling);
  } catch (err) {
    spinner.fail('Failed to add source');
    throw err;
  }
  spinner.stop();

  await saveSourceMap(sourceFile, sources);

  log.success(
    `Added ${chalk.bold(result.name)} at ${chalk.cyan(result.source.version)} (${result.source.hash})`,
  );
  return result;
}
