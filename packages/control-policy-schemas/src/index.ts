/**
 * @control-alloc/policy-schemas - 分類選択・割当結果の型と、デプロイポリシーのYAML検証
 *
 * - 共通型（ClassificationSelection / ControlAllocationResult / FeatureFlagState）
 * - Fast-Track テンプレート（8項目）の既定値
 * - YAMLポリシーのパースと検証
 */
export * from './types.js';
export { defaultPolicy, defaultTemplateBaseline, TEMPLATE_FIELD_COUNT } from './defaults.js';
export { validatePolicy, validateFeatureFlags, validateTemplateBaseline } from './schemas.js';
export { parsePolicy } from './parser.js';
