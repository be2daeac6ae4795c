import type { ClassificationSelection, ControlAllocationResult } from '@control-alloc/policy-schemas';
import { ALLOCATION_RULES, DEFAULT_RULE, type AllocationRule, type RuleMatch } from './rules.js';

export type RuleEvaluator = (selection: ClassificationSelection) => ControlAllocationResult;

/** マッチしたルールごと返す評価器（Fast-Track ゲートが使う） */
export type RuleExplainer = (selection: ClassificationSelection) => RuleMatch;

/**
 * どのルールがマッチしたかを返す
 * 後続のルールはマッチ後に評価しない
 */
export function explain(
  selection: ClassificationSelection,
  rules: readonly AllocationRule[] = ALLOCATION_RULES
): RuleMatch {
  for (const [index, rule] of rules.entries()) {
    if (rule.matches(selection)) {
      return { ruleId: rule.id, rank: index + 1, result: rule.outcome };
    }
  }
  // ALLOCATION_RULES は DEFAULT_RULE で終わるためここには来ない
  return { ruleId: DEFAULT_RULE.id, rank: rules.length + 1, result: DEFAULT_RULE.outcome };
}

export const evaluate: RuleEvaluator = (selection) => explain(selection).result;
