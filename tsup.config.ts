import {defineConfig} from 'tsup';

export default defineConfig({
	entry: {
		'find-skills': 'src/app/entry/find-skills.ts',
		'skill-run': 'src/app/entry/skill-run.ts',
		'session-start': 'src/app/entry/session-start.ts',
		'status-line': 'src/app/entry/status-line.ts',
	},
	format: ['esm'],
	target: 'node20',
	outDir: 'dist',
	clean: true,
	splitting: true,
	sourcemap: true,
});
