import { parse } from 'yaml';
import type { AllocationPolicy, ValidationResult } from './types.js';
import { validatePolicy } from './schemas.js';

export function parsePolicy(yamlContent: string): ValidationResult<AllocationPolicy> {
  let parsed: unknown;
  try {
    parsed = parse(yamlContent);
  } catch (e) {
    return { ok: false, errors: [`YAML parse error: ${e instanceof Error ? e.message : String(e)}`] };
  }
  return validatePolicy(parsed);
}
