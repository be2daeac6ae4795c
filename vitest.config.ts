import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const resolve = (p: string): string => fileURLToPath(new URL(p, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // ワークスペースパッケージのエイリアス設定（tsconfig.json の paths と揃える）
      '@control-alloc/policy-schemas': resolve('./packages/control-policy-schemas/src/index.ts'),
      '@control-alloc/rules': resolve('./packages/control-rules/src/index.ts'),
    },
  },
  test: {
    // グローバル設定
    globals: true,
    environment: 'node',

    // カバレッジ設定
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/node_modules/**', '**/dist/**', '**/test/**', '**/*.test.ts', '**/bin.ts'],
      thresholds: {
        lines: 80,
        functions: 80,
        branches: 80,
        statements: 80,
      },
    },

    // Property-based testは時間がかかる
    testTimeout: 30000,

    // `npm run test:pbt` で Property: プレフィックス付きテストのみ実行
    include: ['packages/*/test/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
  },
});
