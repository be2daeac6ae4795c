import {
  CONTROL_COUNTS,
  LOE_LEVELS,
  type AllocationPolicy,
  type ControlCount,
  type FeatureFlagState,
  type LoeLevel,
  type TemplateBaseline,
  type ValidationResult,
} from './types.js';
import { TEMPLATE_FIELD_COUNT, defaultTemplateBaseline } from './defaults.js';

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === 'object' && x !== null && !Array.isArray(x);
}

function isString(x: unknown): x is string {
  return typeof x === 'string';
}

function isControlCount(x: unknown): x is ControlCount {
  return CONTROL_COUNTS.some((c) => c === x);
}

function isLoeLevel(x: unknown): x is LoeLevel {
  return LOE_LEVELS.some((l) => l === x);
}

export function validateFeatureFlags(input: unknown): ValidationResult<FeatureFlagState> {
  if (!isRecord(input)) {
    return { ok: false, errors: ['featureFlags must be object'] };
  }
  const { fastTrackEnabled } = input;
  if (typeof fastTrackEnabled !== 'boolean') {
    return { ok: false, errors: ['featureFlags.fastTrackEnabled must be boolean'] };
  }
  return { ok: true, value: Object.freeze({ fastTrackEnabled }) };
}

export function validateTemplateBaseline(input: unknown): ValidationResult<TemplateBaseline> {
  if (!isRecord(input)) {
    return { ok: false, errors: ['templateBaseline must be object'] };
  }
  const errors: string[] = [];
  const { requiredFields, controlCount, loeLevel, reason } = input;

  let fields: string[] = [];
  if (!Array.isArray(requiredFields)) {
    errors.push('templateBaseline.requiredFields must be array');
  } else {
    fields = requiredFields.filter(isString).map((f) => f.trim());
    if (fields.length !== requiredFields.length) {
      errors.push('templateBaseline.requiredFields must contain only strings');
    }
    if (fields.some((f) => f.length === 0)) {
      errors.push('templateBaseline.requiredFields must not contain empty names');
    }
    if (new Set(fields).size !== fields.length) {
      errors.push('templateBaseline.requiredFields must be unique');
    }
    if (requiredFields.length !== TEMPLATE_FIELD_COUNT) {
      errors.push(`templateBaseline.requiredFields must have exactly ${TEMPLATE_FIELD_COUNT} entries`);
    }
  }
  if (!isControlCount(controlCount)) {
    errors.push(`templateBaseline.controlCount must be one of ${CONTROL_COUNTS.join(', ')}`);
  }
  if (!isLoeLevel(loeLevel)) {
    errors.push(`templateBaseline.loeLevel must be one of ${LOE_LEVELS.join(', ')}`);
  }
  if (!isString(reason) || reason.length === 0) {
    errors.push('templateBaseline.reason must be non-empty string');
  }

  if (errors.length || !isControlCount(controlCount) || !isLoeLevel(loeLevel) || !isString(reason)) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: Object.freeze({
      requiredFields: Object.freeze(fields),
      controlCount,
      loeLevel,
      reason,
    }),
  };
}

export function validatePolicy(input: unknown): ValidationResult<AllocationPolicy> {
  if (!isRecord(input)) {
    return { ok: false, errors: ['policy must be object'] };
  }
  const errors: string[] = [];
  const { version } = input;
  if (!isString(version)) errors.push('version must be string');

  if (input['featureFlags'] === undefined) errors.push('featureFlags missing');
  const flags = validateFeatureFlags(input['featureFlags'] ?? {});
  if (!flags.ok) errors.push(...flags.errors);

  // templateBaseline 省略時は既定のテンプレートを使う
  const baseline: ValidationResult<TemplateBaseline> =
    input['templateBaseline'] === undefined
      ? { ok: true, value: defaultTemplateBaseline }
      : validateTemplateBaseline(input['templateBaseline']);
  if (!baseline.ok) errors.push(...baseline.errors);

  if (errors.length || !isString(version) || !flags.ok || !baseline.ok) {
    return { ok: false, errors };
  }
  return {
    ok: true,
    value: Object.freeze({ version, featureFlags: flags.value, templateBaseline: baseline.value }),
  };
}
