import { transformWithEsbuild } from 'vite';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  // Vite's built-in TS transform forces keepNames off, and esbuild then renames
  // shadowing function names (function early -> early2). Tools are registered by
  // handler name, so compile TS with keepNames on instead.
  esbuild: false,
  plugins: [
    {
      name: 'ts-keep-names',
      async transform(code, id) {
        if (!/\.m?ts$/.test(id.split('?')[0])) return null;
        const result = await transformWithEsbuild(code, id, {
          loader: 'ts',
          target: 'esnext',
          keepNames: true,
          sourcemap: true,
        });
        return { code: result.code, map: JSON.stringify(result.map) };
      },
    },
  ],
  test: {
    include: ['lib/**/*.test.ts', 'src/**/*.test.ts'],
    // delivery tests wait on real AbortController timers
    testTimeout: 10_000,
    pool: 'forks',
  },
});
