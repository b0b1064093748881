import { defineConfig } from 'tsup'

/**
 * Build configuration for radar-serial-sdk
 *
 * - index: library entry (CJS + ESM + declarations)
 * - bin: `radar-sdk` command
 * - sub-path entries share chunks with the main entry
 */
export default defineConfig({
    name: 'radar-serial-sdk',

    entry: {
        // ==================== Main Entries ====================
        index: 'index.ts',
        bin: 'bin.ts',

        // ==================== Sub-path Exports ====================
        'src/core': 'src/core/index.ts',
        'src/protocol': 'src/protocol/index.ts',
        'src/transport': 'src/transport/index.ts',
        'src/units': 'src/units/index.ts',
        'src/sensor': 'src/sensor/index.ts',
    },

    format: ['cjs', 'esm'],
    dts: true,

    splitting: true,
    minify: false,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // serialport ships native bindings and must stay external
    external: ['serialport'],

    outDir: 'dist',
    target: 'es2022',
    platform: 'node',
})
