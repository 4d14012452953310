import { defineBuildConfig } from 'unbuild';

export default defineBuildConfig({
	entries: ['src/index', 'src/cli'],
	declaration: true,
	clean: true,
	// better-sqlite3 is a native add-on and stays external
	externals: ['better-sqlite3'],
	rollup: {
		emitCJS: false
	}
});
