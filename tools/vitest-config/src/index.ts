import type { UserConfig } from 'vitest/config';

/** Workspace roots whose `src/` trees hold tests */
export const WORKSPACE_ROOTS = ['tools', 'packages', 'apps'] as const;

export const defineConfig = (options: UserConfig = {}): UserConfig => {
  const sourceGlob = `{${WORKSPACE_ROOTS.join(',')}}/*/src`;

  return {
    ...options,
    test: {
      environment: 'node',
      globals: true,
      clearMocks: true,
      pool: 'threads',
      include: [`${sourceGlob}/**/*.{test,spec}.ts`],
      coverage: {
        provider: 'v8',
        reporter: process.env.TEST_MODE === 'ci' ? ['json-summary'] : ['text'],
        reportsDirectory: './coverage',
        include: [`${sourceGlob}/**/*.ts`],
        exclude: ['**/index.ts', '**/*.test.ts', 'apps/*/src/main.ts'],
      },
      ...options.test,
    },
  };
};
