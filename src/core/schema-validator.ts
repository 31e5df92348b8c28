import { readFileSync } from 'node:fs';
import Ajv2020Module from 'ajv/dist/2020.js';
import addFormatsModule from 'ajv-formats';
import type { ValidateFunction } from 'ajv';
import { getSchemaPath } from '../utils/paths.js';
import type { SourceMap } from '../types/source.js';

// Both packages are CommonJS with `exports.default` set on `module.exports`.
const Ajv2020 = Ajv2020Module.default;
const addFormats = addFormatsModule.default;

export interface SchemaIssue {
  /** JSON pointer of the offending value, `''` for the document root. */
  path: string;
  message: string;
}

export type SchemaResult =
  | { valid: true; value: SourceMap }
  | { valid: false; issues: SchemaIssue[] };

let ajvInstance: InstanceType<typeof Ajv2020> | null = null;
let validateFn: ValidateFunction<SourceMap> | null = null;
let uriFn: ValidateFunction<string> | null = null;

function getAjv(): InstanceType<typeof Ajv2020> {
  if (ajvInstance) return ajvInstance;

  ajvInstance = new Ajv2020({ allErrors: true, strict: false, discriminator: true });
  addFormats(ajvInstance);
  return ajvInstance;
}

function getValidator(): ValidateFunction<SourceMap> {
  if (validateFn) return validateFn;

  const schema = JSON.parse(readFileSync(getSchemaPath(), 'utf-8'));
  validateFn = getAjv().compile<SourceMap>(schema);
  return validateFn;
}

/** Whether `value` passes the same `uri` format check the lockfile schema applies. */
export function isSchemaUri(value: string): boolean {
  if (!uriFn) {
    uriFn = getAjv().compile<string>({ type: 'string', format: 'uri' });
  }
  return uriFn(value);
}

export function validateSourceMap(data: unknown): SchemaResult {
  const validate = getValidator();

  if (validate(data)) {
    return { valid: true, value: data };
  }

  const issues = (validate.errors ?? []).map((err) => {
    const extra: unknown = err.params.additionalProperty;
    const path =
      err.keyword === 'additionalProperties' && typeof extra === 'string'
        ? `${err.instancePath}/${extra.replace(/~/g, '~0').replace(/\//g, '~1')}`
        : err.instancePath;
    return {
      path,
      message: `${err.instancePath || '/'} ${err.message ?? 'unknown error'}`,
    };
  });

  return { valid: false, issues };
}
