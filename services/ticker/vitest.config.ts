import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/unit/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    // 呼び出し履歴だけをテストごとに消す（モックの実装は残す）
    clearMocks: true,
    // ソケットもタイマーも偽物なので、待ち時間のかかるテストはない
    testTimeout: 5000,
  },
  resolve: {
    alias: {
      '@': path.resolve(root, './src'),
      '@test': path.resolve(root, './tests'),
    },
  },
});
