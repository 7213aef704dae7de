import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {PatternCatalogError} from '../../src/core/errors.js';
import {
	countPatterns,
	createPatternCatalog,
	createPatternMatcher,
	globToRegExp,
	loadPatternCatalog,
} from '../../src/core/patterns.js';

const matchesGlob = (name: string, pattern: string): boolean =>
	globToRegExp(pattern).test(name);

test('globToRegExp supports wildcards, single characters and bracket sets', () => {
	expect(matchesGlob('a.cache', '*.cache')).toBe(true);
	expect(matchesGlob('.cache', '*.cache')).toBe(true);
	expect(matchesGlob('a.cache.bak', '*.cache')).toBe(false);
	expect(matchesGlob('npm-debug.log.1', 'npm-debug.log*')).toBe(true);
	expect(matchesGlob('log1', 'log?')).toBe(true);
	expect(matchesGlob('log12', 'log?')).toBe(false);
	expect(matchesGlob('venv2', 'venv[0-9]')).toBe(true);
	expect(matchesGlob('venvx', 'venv[0-9]')).toBe(false);
	expect(matchesGlob('venvx', 'venv[!0-9]')).toBe(true);
	expect(matchesGlob('[broken', '[broken')).toBe(true);
});

test('globToRegExp treats regex metacharacters in names literally', () => {
	expect(matchesGlob('a+b(1).log', 'a+b(1).log')).toBe(true);
	expect(matchesGlob('aab(1).log', 'a+b(1).log')).toBe(false);
	expect(matchesGlob('node_modules', 'node_modules')).toBe(true);
	expect(matchesGlob('Node_modules', 'node_modules')).toBe(false);
	expect(globToRegExp('x.y').test('xzy')).toBe(false);
});

test('createPatternCatalog skips reserved keys and keeps catalog order', () => {
	const catalog = createPatternCatalog({
		build: {caches: ['*.cache'], outputs: ['dist']},
		python: {bytecode: ['__pycache__']},
		size_thresholds: {minimum_file_size: '1MB', large_artifact: 100},
		system_exclusions: ['~/Library', 42],
	});

	expect(catalog.entries.map(entry => `${entry.category}.${entry.subcategory}`)).toEqual([
		'build.caches',
		'build.outputs',
		'python.bytecode',
	]);
	expect(catalog.sizeThresholds).toEqual({
		minimum_file_size: '1MB',
		large_artifact: '100MB',
	});
	expect(catalog.systemExclusions).toEqual(['~/Library']);
	expect(countPatterns(catalog)).toBe(3);
	expect(Object.isFrozen(catalog.entries)).toBe(true);
});

test('createPatternCatalog rejects malformed categories and pattern lists', () => {
	expect(() => createPatternCatalog([])).toThrow(PatternCatalogError);
	expect(() => createPatternCatalog({build: ['*.cache']})).toThrow(
		'Category "build" must map subcategories to pattern lists',
	);
	expect(() => createPatternCatalog({build: {caches: '*.cache'}})).toThrow(
		'build.caches must be a list of glob patterns',
	);
	expect(() => createPatternCatalog({build: {caches: ['']}})).toThrow(
		'build.caches[0] must be a non-empty string',
	);
});

test('pattern matcher reports the first matching entry in catalog order', () => {
	const matcher = createPatternMatcher(
		createPatternCatalog({
			logs: {files: ['*.log']},
			javascript: {debug_logs: ['npm-debug.log*']},
		}),
	);

	expect(matcher('npm-debug.log')).toEqual({
		category: 'logs',
		subcategory: 'files',
		pattern: '*.log',
	});
	expect(matcher('npm-debug.log.2')).toEqual({
		category: 'javascript',
		subcategory: 'debug_logs',
		pattern: 'npm-debug.log*',
	});
	expect(matcher('README.md')).toBeNull();
});

test('loadPatternCatalog reads the bundled catalog', async () => {
	const catalog = await loadPatternCatalog();
	const categories = new Set(catalog.entries.map(entry => entry.category));

	expect(categories.has('javascript')).toBe(true);
	expect(categories.has('size_thresholds')).toBe(false);
	expect(catalog.systemExclusions).toContain('~/.ssh');
	expect(createPatternMatcher(catalog)('node_modules')?.category).toBe(
		'javascript',
	);
});

test('loadPatternCatalog fails with PatternCatalogError for missing or invalid files', async () => {
	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'devpurge-patterns-'));
	const invalidPath = path.join(directory, 'patterns.json');
	await fs.writeFile(invalidPath, '{not json');

	await expect(loadPatternCatalog(invalidPath)).rejects.toThrow(
		PatternCatalogError,
	);
	await expect(
		loadPatternCatalog(path.join(directory, 'missing.json')),
	).rejects.toThrow('Cannot read pattern catalog');
});
