/**
 * Property-based Testing Arbitraries
 *
 * 分類選択（ClassificationSelection）とテンプレート項目のジェネレーター。
 * フラグは true / false / 未指定の3値を取りうる。
 *
 * @see https://github.com/dubzzz/fast-check
 */
import * as fc from 'fast-check';
import {
  SYSTEM_SCOPES,
  type ClassificationSelection,
  type SystemScope,
} from '@control-alloc/policy-schemas';

export const BOOLEAN_FLAGS = [
  'cui',
  'cdiDfars',
  'itar',
  'ear',
  'ear99Plus',
  'publicData',
  'pilotShortDuration',
  'competitionSensitive',
  'proprietary',
  'pii',
] as const;
export type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

/**
 * 任意フラグ（未指定を含む）
 */
export const OptionalFlagArb = fc.option(fc.boolean(), { nil: undefined });

export const SystemScopeArb = fc.option(fc.constantFrom<SystemScope>(...SYSTEM_SCOPES), {
  nil: undefined,
});

/**
 * ClassificationSelection Arbitrary
 *
 * @example
 * fc.sample(SelectionArb, 1);
 * // => [{ cui: undefined, itar: true, systemScope: 'External', ... }]
 */
export const SelectionArb: fc.Arbitrary<ClassificationSelection> = fc.record({
  cui: OptionalFlagArb,
  cdiDfars: OptionalFlagArb,
  itar: OptionalFlagArb,
  ear: OptionalFlagArb,
  ear99Plus: OptionalFlagArb,
  publicData: OptionalFlagArb,
  pilotShortDuration: OptionalFlagArb,
  systemScope: SystemScopeArb,
  competitionSensitive: OptionalFlagArb,
  proprietary: OptionalFlagArb,
  pii: OptionalFlagArb,
});

/**
 * CUI/CDI/ITAR/EAR/EAR99+ がすべて立っていない選択
 */
export const NonDfarsSelectionArb: fc.Arbitrary<ClassificationSelection> = SelectionArb.map(
  (s) => ({ ...s, cui: false, cdiDfars: false, itar: false, ear: false, ear99Plus: false })
);

/**
 * 全組み合わせの列挙（2^10 × 3 = 3072件）
 */
export function allSelections(): ClassificationSelection[] {
  const result: ClassificationSelection[] = [];
  const total = 1 << BOOLEAN_FLAGS.length;
  for (let mask = 0; mask < total; mask++) {
    for (const systemScope of SYSTEM_SCOPES) {
      const flags: Partial<Record<BooleanFlag, boolean>> = {};
      BOOLEAN_FLAGS.forEach((flag, bit) => {
        flags[flag] = (mask & (1 << bit)) !== 0;
      });
      result.push({ ...flags, systemScope });
    }
  }
  return result;
}

/**
 * 項目名リストからすべて埋まったテンプレート入力を作る
 */
export function filledFields(names: readonly string[]): Record<string, string> {
  return Object.fromEntries(names.map((name) => [name, `value-${name}`]));
}
