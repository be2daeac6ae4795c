/**
 * control-alloc - 情報分類からのセキュリティコントロール数割当
 *
 * ライブラリとして利用する場合のエクスポート。
 * CLI は bin.ts を参照。
 */
export {
  allocate,
  createAllocationContext,
  describeRules,
  handleAllocate,
  type AllocationContext,
  type AllocationResponse,
  type RuleSummary,
} from './core/handlers.js';
export {
  AllocationRequestSchema,
  ClassificationSelectionSchema,
  parseAllocationRequest,
  parseSelection,
  type AllocationRequest,
} from './domain/selection.js';
export type { DomainError, ErrorCode } from './domain/errors.js';
export { loadEnv, clearEnvCache, type Env } from './config/env.js';
export { loadAllocationPolicy, readPolicyFile, withFastTrack, type PolicyOverrides } from './config/policy.js';
export { runCli } from './cli/index.js';
