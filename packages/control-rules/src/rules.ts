import type { ClassificationSelection, ControlAllocationResult } from '@control-alloc/policy-schemas';

export type RuleId =
  | 'cui-override'
  | 'dfars'
  | 'public-data'
  | 'pilot'
  | 'internal-sensitive'
  | 'external-sensitive'
  | 'default';

export interface AllocationRule {
  readonly id: RuleId;
  readonly matches: (selection: ClassificationSelection) => boolean;
  readonly outcome: ControlAllocationResult;
}

export interface RuleMatch {
  readonly ruleId: RuleId;
  /** チェーン内の1始まりの順位 */
  readonly rank: number;
  readonly result: ControlAllocationResult;
}

const outcome = (
  controlCount: ControlAllocationResult['controlCount'],
  loeLevel: ControlAllocationResult['loeLevel'],
  reason: string
): ControlAllocationResult => Object.freeze({ controlCount, loeLevel, reason });

/**
 * DFARS系フラグ（CUI/CDI/ITAR/EAR/EAR99+）のいずれかが立っているか
 * Fast-Track の適格判定でも使う
 */
export function isDfarsTier(s: ClassificationSelection): boolean {
  return s.cui === true || isExportOrCdi(s);
}

function isExportOrCdi(s: ClassificationSelection): boolean {
  return s.cdiDfars === true || s.itar === true || s.ear === true || s.ear99Plus === true;
}

function hasSensitiveData(s: ClassificationSelection): boolean {
  return s.competitionSensitive === true || s.proprietary === true || s.pii === true;
}

const rule = (
  id: RuleId,
  matches: AllocationRule['matches'],
  ruleOutcome: ControlAllocationResult
): AllocationRule => Object.freeze({ id, matches, outcome: ruleOutcome });

export const DEFAULT_RULE: AllocationRule = rule(
  'default',
  () => true,
  outcome(20, 'A', 'Default minimum controls')
);

/**
 * 割当ルール（先頭から評価し、最初にマッチしたものを採用）
 * 並び順がそのまま優先順位になる
 */
export const ALLOCATION_RULES: readonly AllocationRule[] = Object.freeze([
  rule(
    'cui-override',
    (s) => s.cui === true,
    outcome(110, 'DFARS', 'CUI Override - Highest Security Level')
  ),
  rule('dfars', isExportOrCdi, outcome(110, 'DFARS', 'DFARS Compliance Required')),
  rule('public-data', (s) => s.publicData === true, outcome(38, 'B', 'LOE B - Public Data')),
  rule(
    'pilot',
    (s) => s.pilotShortDuration === true,
    outcome(20, 'A', 'LOE A - ATC (Pilot System)')
  ),
  rule(
    'internal-sensitive',
    (s) => s.systemScope === 'Internal' && hasSensitiveData(s),
    outcome(56, 'C', 'LOE C - Internal System (RTX Non-DFARS)')
  ),
  rule(
    'external-sensitive',
    (s) => s.systemScope === 'External' && hasSensitiveData(s),
    outcome(70, 'D', 'LOE D - External System (RTX Non-DFARS)')
  ),
  DEFAULT_RULE,
]);
