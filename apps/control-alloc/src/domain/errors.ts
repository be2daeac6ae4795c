/**
 * ドメインエラー型定義
 * 評価器・ゲートは失敗しないため、エラーは入力境界と設定読み込みでのみ発生する
 */

// エラーコード（Tagged Union）
export type ErrorCode =
  | 'INVALID_SELECTION' // 分類選択ペイロードの型・列挙値・未知キー
  | 'POLICY_INVALID' // ポリシーYAMLのパース/検証失敗
  | 'CONFIG_ERROR' // ポリシーファイルが読めない
  | 'USAGE_ERROR'; // CLI引数の誤り

// ドメインエラー型
export interface DomainError {
  readonly _tag: 'DomainError';
  readonly code: ErrorCode;
  readonly message: string;
  readonly cause?: unknown;
}

// エラー生成関数
export const domainError = (code: ErrorCode, message: string, cause?: unknown): DomainError => ({
  _tag: 'DomainError',
  code,
  message,
  cause,
});

export const invalidSelectionError = (message: string): DomainError =>
  domainError('INVALID_SELECTION', message);

export const policyInvalidError = (errors: readonly string[]): DomainError =>
  domainError('POLICY_INVALID', `policy invalid: ${errors.join('; ')}`);

export const configError = (message: string, cause?: unknown): DomainError =>
  domainError('CONFIG_ERROR', message, cause);

export const usageError = (message: string, cause?: unknown): DomainError =>
  domainError('USAGE_ERROR', message, cause);
