import { fileURLToPath } from 'node:url';
import { dirname, resolve } from 'node:path';
import { defineConfig } from 'vite';
import dts from 'vite-plugin-dts';
import { configDefaults } from 'vitest/config';
import { createRequire } from 'node:module';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const require = createRequire(import.meta.url);
const pkg = require('./package.json') as { dependencies?: Record<string, string> };
const deps = Object.keys(pkg.dependencies || {});

function isExternal(id: string) {
	// Node built-ins and declared deps stay out of the bundle
	if (id.startsWith('node:')) return true;
	return deps.some((dep) => id === dep || id.startsWith(`${dep}/`));
}

export default defineConfig({
	build: {
		outDir: 'dist',
		target: 'node20',
		emptyOutDir: true,
		lib: {
			entry: { dblog: resolve(__dirname, 'src/index.ts') },
			formats: ['es', 'cjs'],
			fileName: (format, entryName) => `${entryName}.${format === 'es' ? 'es.js' : 'cjs'}`,
		},
		rollupOptions: {
			external: isExternal,
		},
		sourcemap: true,
	},

	plugins: [
		dts({
			tsconfigPath: './tsconfig.json',
			include: ['src'],
			outDir: 'dist/types',
			rollupTypes: true,
		}),
	],

	test: {
		name: 'node',
		globals: true,
		environment: 'node',
		include: ['test/**/*.test.ts'],
		exclude: [...configDefaults.exclude],
		coverage: {
			provider: 'v8',
			include: ['src/**/*.ts'],
		},
	},
});
