import type { Source } from '../types/source.js';

export class BuildFullUrlError extends Error {
  constructor(
    public fullUrl: string,
    public parseError: string,
  ) {
    super(`Constructed full URL ${fullUrl} is invalid: ${parseError}`);
    this.name = 'BuildFullUrlError';
  }
}

export function expandTemplate(
  template: string,
  version: string,
  branch?: string,
): string {
  const withVersion = template.replaceAll('{version}', version);
  return branch === undefined ? withVersion : withVersion.replaceAll('{branch}', branch);
}

/** Expand the source's artifact URL template for `version` and parse it. */
export function buildFullUrl(
  source: Pick<Source, 'artifactUrlTemplate' | 'updateScheme'>,
  version: string,
): URL {
  const branch =
    source.updateScheme.type === 'git-branch' ? source.updateScheme.branch : undefined;
  const fullUrl = expandTemplate(source.artifactUrlTemplate, version, branch);

  try {
    return new URL(fullUrl);
  } catch (err) {
    throw new BuildFullUrlError(fullUrl, err instanceof Error ? err.message : String(err));
  }
}
