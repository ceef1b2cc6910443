import { defineConfig } from 'tsup'

/**
 * tsup configuration for matchkit
 *
 * - splitting: true → Shared code goes to chunks used by every entry
 * - minify: true → Production-ready compressed output
 */
export default defineConfig({
    name: 'matchkit',

    entry: {
        // ==================== Main Entry ====================
        index: 'index.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/models': 'src/models/index.ts',
        'src/matching': 'src/matching/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    outDir: 'dist',
    target: 'es2020',

    // Pure computation, no runtime-specific modules
    platform: 'neutral',
})
