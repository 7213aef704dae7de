import fs from 'node:fs/promises';
import {fileURLToPath} from 'node:url';
import {PatternCatalogError, toErrorMessage} from './errors.js';
import type {
	PatternCatalog,
	PatternCatalogEntry,
	PatternMatch,
} from './types.js';

export const RESERVED_CATALOG_KEYS = new Set([
	'size_thresholds',
	'system_exclusions',
]);

export const DEFAULT_PATTERNS_PATH = fileURLToPath(
	new URL('../../patterns.json', import.meta.url),
);

const REGEX_SPECIALS = /[\\^$.*+?()[\]{}|/-]/g;

const escapeRegex = (value: string): string =>
	value.replaceAll(REGEX_SPECIALS, String.raw`\$&`);

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const translateBracket = (body: string): string => {
	let negate = false;
	let rest = body;
	if (rest.startsWith('!')) {
		negate = true;
		rest = rest.slice(1);
	}

	const escaped = rest
		.replaceAll('\\', '\\\\')
		.replaceAll(']', String.raw`\]`)
		.replace(/^\^/, String.raw`\^`);
	return `[${negate ? '^' : ''}${escaped}]`;
};

/**
 * Translate a shell-style glob into an anchored, case-sensitive RegExp.
 * Supports `*`, `?`, `[abc]`, `[a-z]` and `[!abc]`; an unclosed `[` is literal.
 */
export const globToRegExp = (pattern: string): RegExp => {
	let source = '';
	let index = 0;

	while (index < pattern.length) {
		const char = pattern.charAt(index);
		index++;

		if (char === '*') {
			if (!source.endsWith('.*')) source += '.*';
			continue;
		}

		if (char === '?') {
			source += '.';
			continue;
		}

		if (char === '[') {
			let end = index;
			if (pattern.charAt(end) === '!') end++;
			if (pattern.charAt(end) === ']') end++;
			while (end < pattern.length && pattern.charAt(end) !== ']') end++;

			if (end >= pattern.length) {
				source += String.raw`\[`;
				continue;
			}

			source += translateBracket(pattern.slice(index, end));
			index = end + 1;
			continue;
		}

		source += escapeRegex(char);
	}

	try {
		return new RegExp(`^${source}$`, 's');
	} catch (error) {
		throw new PatternCatalogError(
			`Invalid glob pattern "${pattern}": ${toErrorMessage(error)}`,
		);
	}
};

interface CompiledEntry {
	category: string;
	subcategory: string;
	pattern: string;
	regex: RegExp;
}

export type PatternMatcher = (name: string) => PatternMatch | null;

/**
 * Compile every pattern once. The returned matcher tries them in catalog
 * order and reports the first hit.
 */
export const createPatternMatcher = (catalog: PatternCatalog): PatternMatcher => {
	const compiled: CompiledEntry[] = [];
	for (const entry of catalog.entries) {
		for (const pattern of entry.patterns) {
			compiled.push({
				category: entry.category,
				subcategory: entry.subcategory,
				pattern,
				regex: globToRegExp(pattern),
			});
		}
	}

	return name => {
		for (const entry of compiled) {
			if (entry.regex.test(name)) {
				return {
					category: entry.category,
					subcategory: entry.subcategory,
					pattern: entry.pattern,
				};
			}
		}

		return null;
	};
};

const parseStringList = (value: unknown, where: string): string[] => {
	if (!Array.isArray(value)) {
		throw new PatternCatalogError(`${where} must be a list of glob patterns`);
	}

	return value.map((entry, index) => {
		if (typeof entry !== 'string' || entry.length === 0) {
			throw new PatternCatalogError(
				`${where}[${index}] must be a non-empty string`,
			);
		}

		return entry;
	});
};

const parseSizeThresholds = (value: unknown): Record<string, string> => {
	if (!isRecord(value)) return {};

	const thresholds: Record<string, string> = {};
	for (const [key, threshold] of Object.entries(value)) {
		if (typeof threshold === 'string') thresholds[key] = threshold;
		else if (typeof threshold === 'number') thresholds[key] = `${threshold}MB`;
	}

	return thresholds;
};

/**
 * Build a catalog from parsed JSON of the shape
 * `{category: {subcategory: [glob, ...]}}`. The reserved keys carry metadata
 * and never take part in matching.
 */
export const createPatternCatalog = (data: unknown): PatternCatalog => {
	if (!isRecord(data)) {
		throw new PatternCatalogError('Pattern catalog must be an object');
	}

	const entries: PatternCatalogEntry[] = [];
	for (const [category, subcategories] of Object.entries(data)) {
		if (RESERVED_CATALOG_KEYS.has(category)) continue;
		if (!isRecord(subcategories)) {
			throw new PatternCatalogError(
				`Category "${category}" must map subcategories to pattern lists`,
			);
		}

		for (const [subcategory, patterns] of Object.entries(subcategories)) {
			const list = parseStringList(patterns, `${category}.${subcategory}`);
			for (const pattern of list) globToRegExp(pattern);
			entries.push({category, subcategory, patterns: Object.freeze(list)});
		}
	}

	const exclusions = data['system_exclusions'];
	return Object.freeze({
		entries: Object.freeze(entries),
		sizeThresholds: Object.freeze(parseSizeThresholds(data['size_thresholds'])),
		systemExclusions: Object.freeze(
			Array.isArray(exclusions)
				? exclusions.filter(
						(entry): entry is string => typeof entry === 'string',
					)
				: [],
		),
	});
};

export const loadPatternCatalog = async (
	patternsPath: string = DEFAULT_PATTERNS_PATH,
): Promise<PatternCatalog> => {
	let content: string;
	try {
		content = await fs.readFile(patternsPath, 'utf8');
	} catch (error) {
		throw new PatternCatalogError(
			`Cannot read pattern catalog ${patternsPath}: ${toErrorMessage(error)}`,
		);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(content);
	} catch (error) {
		throw new PatternCatalogError(
			`Pattern catalog ${patternsPath} is not valid JSON: ${toErrorMessage(error)}`,
		);
	}

	return createPatternCatalog(parsed);
};

export const countPatterns = (catalog: PatternCatalog): number =>
	catalog.entries.reduce((total, entry) => total + entry.patterns.length, 0);
