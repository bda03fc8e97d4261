import { defineConfig } from 'tsup';

export default defineConfig({
    entry: ['src/cli/index.ts', 'src/index.ts'],
    format: ['esm'],
    target: 'node20',
    outDir: 'dist',
    clean: true,
    splitting: false,
    sourcemap: false,
    dts: false,
    // Native addon and driver stay external
    external: ['better-sqlite3', 'neo4j-driver'],
});
