import { defineConfig } from 'tsup'

/**
 * tsup configuration
 *
 * - index: library entry (browser-safe)
 * - node: library entry plus the CLI runner
 * - cli: executable behind the `simplex` bin
 */
export default defineConfig({
    name: 'dictionary-simplex',

    entry: {
        index: 'index.ts',
        node: 'node.ts',
        cli: 'src/cli/cli.ts',
    },

    format: ['cjs', 'esm'],
    dts: {
        entry: {
            index: 'index.ts',
            node: 'node.ts',
        },
    },

    splitting: true,
    treeshake: true,

    sourcemap: false,
    clean: true,

    // Node.js built-ins are resolved at runtime
    external: [
        'fs',
    ],

    outDir: 'dist',
    target: 'es2022',
    platform: 'node',
})
