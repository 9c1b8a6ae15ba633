import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],

    // 輪詢相關測試使用 0ms 間隔，一般測試 5 秒內完成
    testTimeout: 10000,
    hookTimeout: 10000,

    // 顯示執行時間超過 1000ms 的測試
    slowTestThreshold: 1000,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: ['src/index.ts', 'src/types/**'],
    },
  },
});
