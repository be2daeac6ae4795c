import { defineConfig } from 'tsdown';

export default defineConfig({
  entry: ['src/index.ts', 'src/bin.ts'],
  format: ['esm'],
  dts: true,
  clean: true,
  // バンドルに含めるパッケージ
  // - fp-ts: ESM互換性問題を回避
  // - @control-alloc/*: workspace依存をバンドル化（ソースのみ公開のため）
  noExternal: [/^fp-ts/, /^@control-alloc\//],
});
