/**
 * 環境変数の読み込みとバリデーション
 */
import { z } from 'zod';

// 環境変数スキーマ定義
const envSchema = z.object({
  // デプロイポリシー（YAML）のパス。未指定なら組み込みの既定ポリシー
  CONTROL_ALLOC_POLICY: z.string().min(1).optional(),

  // Fast-Track フラグの上書き（ポリシーの featureFlags より優先）
  CONTROL_ALLOC_FAST_TRACK: z
    .enum(['true', 'false'])
    .transform((v) => v === 'true')
    .optional(),

  // 実行環境
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

let cachedEnv: Env | null = null;

/**
 * 環境変数を読み込み、バリデーションを実行
 * 起動時に一度だけ読み、以降はキャッシュを返す
 */
export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  if (cachedEnv) return cachedEnv;

  const result = envSchema.safeParse(source);

  if (!result.success) {
    const errors = result.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`).join(', ');
    throw new Error(`ENV_VALIDATION_FAILED: ${errors}`);
  }

  cachedEnv = Object.freeze(result.data);
  return cachedEnv;
}

/**
 * テスト用: キャッシュをクリア
 */
export function clearEnvCache(): void {
  cachedEnv = null;
}
