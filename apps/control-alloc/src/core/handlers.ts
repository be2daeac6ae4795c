/**
 * 割当ハンドラ（コア実装）
 *
 * 入力検証 → Fast-Track ゲート → 評価器 の順に合成する。
 * CLI から利用し、ライブラリとしても公開する。
 */
import * as E from 'fp-ts/Either';
import { pipe } from 'fp-ts/function';
import type {
  AllocationPolicy,
  ControlAllocationResult,
  ControlCount,
  LoeLevel,
} from '@control-alloc/policy-schemas';
import {
  ALLOCATION_RULES,
  createFastTrackGate,
  type FastTrackGate,
  type Ineligibility,
  type RuleId,
} from '@control-alloc/rules';
import type { DomainError } from '../domain/errors.js';
import { parseAllocationRequest, type AllocationRequest } from '../domain/selection.js';

// ========== Type Definitions ==========

export interface AllocationContext {
  readonly policy: AllocationPolicy;
  readonly gate: FastTrackGate;
}

export interface AllocationResponse {
  readonly path: 'fast-track' | 'full';
  readonly rule: RuleId | 'fast-track-template';
  readonly result: ControlAllocationResult;
  readonly policy_version: string;
  readonly ineligibility?: Ineligibility;
  readonly missing_fields?: readonly string[];
}

export interface RuleSummary {
  readonly rank: number;
  readonly id: RuleId;
  readonly controlCount: ControlCount;
  readonly loeLevel: LoeLevel;
  readonly reason: string;
}

// ========== Handlers ==========

export const createAllocationContext = (policy: AllocationPolicy): AllocationContext => ({
  policy,
  gate: createFastTrackGate(policy.templateBaseline),
});

/**
 * 検証済みリクエストの割当
 */
export function allocate(request: AllocationRequest, ctx: AllocationContext): AllocationResponse {
  const decision = ctx.gate.decide(
    request.selection,
    ctx.policy.featureFlags,
    request.templateFields
  );

  if (decision.path === 'fast-track') {
    return {
      path: 'fast-track',
      rule: 'fast-track-template',
      result: decision.result,
      policy_version: ctx.policy.version,
    };
  }

  return {
    path: 'full',
    rule: decision.match.ruleId,
    result: decision.result,
    policy_version: ctx.policy.version,
    ineligibility: decision.ineligibility,
    ...(decision.missingFields.length > 0 && { missing_fields: decision.missingFields }),
  };
}

/**
 * 未検証ペイロードの割当（形式不正は INVALID_SELECTION）
 */
export const handleAllocate = (
  input: unknown,
  ctx: AllocationContext
): E.Either<DomainError, AllocationResponse> =>
  pipe(
    parseAllocationRequest(input),
    E.map((request) => allocate(request, ctx))
  );

/**
 * ルールチェーンを優先順に列挙
 */
export function describeRules(): RuleSummary[] {
  return ALLOCATION_RULES.map((rule, index) => ({
    rank: index + 1,
    id: rule.id,
    controlCount: rule.outcome.controlCount,
    loeLevel: rule.outcome.loeLevel,
    reason: rule.outcome.reason,
  }));
}
