import { defineConfig } from 'tsup';

export default defineConfig({
  entry: {
    'claude3-cli': 'src/index.ts',
    'llm-review': 'src/review.ts',
  },
  format: ['esm'],
  platform: 'node',
  target: 'node20',
  sourcemap: true,
  banner: {
    js: [
      '#!/usr/bin/env node',
      'import { createRequire as __createRequire } from "module";',
      'const require = __createRequire(import.meta.url);'
    ].join('\n'),
  },
  clean: true,
  outDir: 'bin',
  noExternal: ['@claude3-cli/llm-core'],
});
