import {
  defaultTemplateBaseline,
  type ClassificationSelection,
  type ControlAllocationResult,
  type FeatureFlagState,
  type TemplateBaseline,
} from '@control-alloc/policy-schemas';
import { explain, type RuleExplainer } from './evaluate.js';
import { isDfarsTier, type RuleMatch } from './rules.js';

/** Fast-Track 用に収集したテンプレート項目（項目名 → 値） */
export type TemplateFields = Readonly<Record<string, string | undefined>>;

export type Ineligibility = 'disabled' | 'dfars-tier' | 'missing-fields';

export type RouteDecision =
  | { readonly path: 'fast-track'; readonly result: ControlAllocationResult }
  | {
      readonly path: 'full';
      readonly result: ControlAllocationResult;
      readonly match: RuleMatch;
      readonly ineligibility: Ineligibility;
      readonly missingFields: readonly string[];
    };

export interface FastTrackGate {
  readonly baseline: TemplateBaseline;
  decide(
    selection: ClassificationSelection,
    flags: FeatureFlagState,
    fields?: TemplateFields
  ): RouteDecision;
  route(
    selection: ClassificationSelection,
    flags: FeatureFlagState,
    fields?: TemplateFields
  ): ControlAllocationResult;
}

/**
 * 未入力（undefined・空白のみ）のテンプレート項目を列挙
 */
export function missingTemplateFields(
  baseline: TemplateBaseline,
  fields: TemplateFields
): string[] {
  return baseline.requiredFields.filter((name) => {
    // 継承プロパティ（constructor など）は未入力扱い
    const value = Object.hasOwn(fields, name) ? fields[name] : undefined;
    return value === undefined || value.trim().length === 0;
  });
}

/**
 * Fast-Track ゲートを生成
 *
 * 適格（フラグ有効・DFARS系フラグなし・8項目すべて入力済み）なら
 * explainer を呼ばずにテンプレート結果を返す。それ以外は explainer にそのまま委譲し、
 * マッチしたルールを RouteDecision に載せる。
 */
export function createFastTrackGate(
  baseline: TemplateBaseline = defaultTemplateBaseline,
  explainer: RuleExplainer = explain
): FastTrackGate {
  const baselineResult: ControlAllocationResult = Object.freeze({
    controlCount: baseline.controlCount,
    loeLevel: baseline.loeLevel,
    reason: baseline.reason,
  });

  const full = (
    selection: ClassificationSelection,
    ineligibility: Ineligibility,
    missingFields: readonly string[] = []
  ): RouteDecision => {
    const match = explainer(selection);
    return { path: 'full', result: match.result, match, ineligibility, missingFields };
  };

  const decide = (
    selection: ClassificationSelection,
    flags: FeatureFlagState,
    fields: TemplateFields = {}
  ): RouteDecision => {
    if (!flags.fastTrackEnabled) return full(selection, 'disabled');
    if (isDfarsTier(selection)) return full(selection, 'dfars-tier');
    const missing = missingTemplateFields(baseline, fields);
    if (missing.length > 0) return full(selection, 'missing-fields', missing);
    return { path: 'fast-track', result: baselineResult };
  };

  return {
    baseline,
    decide,
    route: (selection, flags, fields) => decide(selection, flags, fields).result,
  };
}

const defaultGate = createFastTrackGate();

export function route(
  selection: ClassificationSelection,
  flags: FeatureFlagState,
  fields?: TemplateFields
): ControlAllocationResult {
  return defaultGate.route(selection, flags, fields);
}
