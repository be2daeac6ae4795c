export const SYSTEM_SCOPES = ['Internal', 'External', 'Unset'] as const;
export type SystemScope = (typeof SYSTEM_SCOPES)[number];

export const LOE_LEVELS = ['A', 'B', 'C', 'D', 'DFARS'] as const;
export type LoeLevel = (typeof LOE_LEVELS)[number];

export const CONTROL_COUNTS = [20, 38, 56, 70, 110] as const;
export type ControlCount = (typeof CONTROL_COUNTS)[number];

/**
 * 分類選択（すべて任意、相互排他ではない）
 * 未指定のフラグは false、systemScope 未指定は 'Unset' として扱う
 */
export interface ClassificationSelection {
  readonly cui?: boolean;
  readonly cdiDfars?: boolean;
  readonly itar?: boolean;
  readonly ear?: boolean;
  readonly ear99Plus?: boolean;
  readonly publicData?: boolean;
  readonly pilotShortDuration?: boolean;
  readonly systemScope?: SystemScope;
  readonly competitionSensitive?: boolean;
  readonly proprietary?: boolean;
  readonly pii?: boolean;
}

export interface ControlAllocationResult {
  readonly controlCount: ControlCount;
  readonly loeLevel: LoeLevel;
  readonly reason: string;
}

export interface FeatureFlagState {
  readonly fastTrackEnabled: boolean;
}

/**
 * Fast-Track用の固定テンプレート
 * requiredFields はデプロイ設定で決まる8項目
 */
export interface TemplateBaseline extends ControlAllocationResult {
  readonly requiredFields: readonly string[];
}

export interface AllocationPolicy {
  readonly version: string;
  readonly featureFlags: FeatureFlagState;
  readonly templateBaseline: TemplateBaseline;
}

export type ValidationResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly errors: string[] };
