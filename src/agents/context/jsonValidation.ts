import fs from 'fs';
import path from 'path';
import AjvModule from 'ajv';
import type { ValidateFunction } from 'ajv';
import tryJsonRepair from '../../utils/jsonRepair.js';
import { SCHEMAS_DIR } from '../../paths.js';

const Ajv = AjvModule.default;
const ajv = new Ajv({ allErrors: true, strict: false });

export type JsonValidationResult<T> =
  | { valid: true; parsed: T; repaired: boolean }
  | { valid: false; parsed: unknown; errors: string[]; repaired: boolean };

/** Read the JSON schema text for `name` from the schemas directory. */
export function readSchema(name: string): string {
  return fs.readFileSync(path.join(SCHEMAS_DIR, `${name}.schema.json`), 'utf-8');
}

/** Compile the named schema from src/schemas. Callers keep the result. */
export function loadValidator<T>(name: string): ValidateFunction<T> {
  return ajv.compile<T>(JSON.parse(readSchema(name)));
}

function parseLenient(raw: string): { parsed: unknown; repaired: boolean } | null {
  try {
    const parsed: unknown = JSON.parse(raw);
    return { parsed, repaired: false };
  } catch {
    const repairedText = tryJsonRepair(raw);
    if (!repairedText) return null;
    try {
      const parsed: unknown = JSON.parse(repairedText);
      return { parsed, repaired: true };
    } catch {
      return null;
    }
  }
}

export function validateJson<T>(validator: ValidateFunction<T>, raw: string): JsonValidationResult<T> {
  const result = parseLenient(raw);
  if (!result) return { valid: false, parsed: null, errors: ['parse_failed'], repaired: false };
  const { parsed, repaired } = result;
  if (validator(parsed)) return { valid: true, parsed, repaired };
  const errors = (validator.errors ?? []).map((err) => `${err.instancePath || '(root)'} ${err.message ?? ''}`.trim());
  return { valid: false, parsed, errors: errors.length > 0 ? errors : ['schema_mismatch'], repaired };
}
