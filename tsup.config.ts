import { defineConfig } from 'tsup';

export default defineConfig({
    entry: {
        index: 'src/index.ts',
        config: 'src/config.ts',
        dev: 'src/dev.ts',
    },
    format: ['esm', 'cjs'],
    dts: true,
    sourcemap: false,
    clean: true,
    minify: false,
    treeshake: true,
    outDir: 'dist',
    skipNodeModulesBundle: true
});
