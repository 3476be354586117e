import { defineConfig } from 'tsup';

export default defineConfig({
	entry: ['src/index.ts', 'src/bin.ts'],
	format: ['esm'],
	dts: { entry: 'src/index.ts' },
	// workspace packages export their TypeScript sources, so they are bundled in
	noExternal: ['cucumis-gherkin', 'cucumis-expressions'],
	splitting: true,
	sourcemap: true,
	clean: true,
	treeshake: true,
	outDir: 'dist',
	target: 'node20',
});
