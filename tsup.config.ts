import { defineConfig } from 'tsup';

export default defineConfig({
    entry: { index: 'src/cli/index.ts' },
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    banner: {
        js: '#!/usr/bin/env node',
    },
    // Native addon stays outside the bundle
    external: ['better-sqlite3'],
});
