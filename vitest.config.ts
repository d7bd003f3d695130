import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['src/**/*.test.ts'],
    environment: 'node',
    // 模块与对局都是同步纯内存对象，测试之间不共享状态
    isolate: true,
    coverage: {
      provider: 'v8',
      include: ['src/**/*.ts'],
      exclude: ['src/cli/**', 'src/**/*.test.ts', 'src/**/__test__/**'],
      reportsDirectory: './coverage',
      reporter: ['text', 'html'],
    },
  },
});
