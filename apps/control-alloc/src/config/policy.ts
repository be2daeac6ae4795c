/**
 * デプロイポリシーの読み込み
 *
 * 優先順位: CLI上書き > 環境変数 > ポリシーファイル > 組み込み既定値
 * 読み込んだポリシー（FeatureFlagStateを含む）は凍結し、以降は読み取り専用で渡す。
 */
import * as fs from 'node:fs/promises';
import * as E from 'fp-ts/Either';
import * as TE from 'fp-ts/TaskEither';
import { pipe } from 'fp-ts/function';
import { defaultPolicy, parsePolicy, type AllocationPolicy } from '@control-alloc/policy-schemas';
import { configError, policyInvalidError, type DomainError } from '../domain/errors.js';
import type { Env } from './env.js';

export interface PolicyOverrides {
  readonly policyPath?: string;
  readonly fastTrackEnabled?: boolean;
}

/**
 * ポリシーYAMLを読み込んで検証
 */
export const readPolicyFile = (filePath: string): TE.TaskEither<DomainError, AllocationPolicy> =>
  pipe(
    TE.tryCatch(
      () => fs.readFile(filePath, 'utf8'),
      (e) => configError(`failed to read policy file: ${filePath}`, e)
    ),
    TE.chainEitherK((content) => {
      const result = parsePolicy(content);
      return result.ok ? E.right(result.value) : E.left(policyInvalidError(result.errors));
    })
  );

/**
 * Fast-Track フラグを上書き（未指定ならそのまま）
 */
export const withFastTrack = (
  policy: AllocationPolicy,
  fastTrackEnabled: boolean | undefined
): AllocationPolicy => {
  if (fastTrackEnabled === undefined || fastTrackEnabled === policy.featureFlags.fastTrackEnabled) {
    return policy;
  }
  return Object.freeze({
    ...policy,
    featureFlags: Object.freeze({ fastTrackEnabled }),
  });
};

export const loadAllocationPolicy = (
  env: Env,
  overrides: PolicyOverrides = {}
): TE.TaskEither<DomainError, AllocationPolicy> => {
  const policyPath = overrides.policyPath ?? env.CONTROL_ALLOC_POLICY;
  const base: TE.TaskEither<DomainError, AllocationPolicy> =
    policyPath === undefined ? TE.right(defaultPolicy) : readPolicyFile(policyPath);

  return pipe(
    base,
    TE.map((policy) =>
      withFastTrack(policy, overrides.fastTrackEnabled ?? env.CONTROL_ALLOC_FAST_TRACK)
    )
  );
};
