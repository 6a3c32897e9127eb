import { defineConfig } from 'vite';
import { fileURLToPath } from 'node:url';

export default defineConfig({
	build: {
		lib: {
			entry: fileURLToPath(new URL('./src/bundles/index.ts', import.meta.url)),
			formats: ['es'],
			fileName: () => 'tile-partition.js',
		},
		outDir: 'dist',
		emptyOutDir: true,
		sourcemap: true,
		target: 'es2022',
		rollupOptions: {
			// zod stays a runtime dependency of the consumer
			external: ['zod'],
		},
	},
});
