import type {Dirent} from 'node:fs';
import path from 'node:path';
import {toErrorMessage} from './errors.js';
import {fromMegabytes} from './format.js';
import {
	expandHome,
	isContainedPath,
	resolveLoosely,
	resolveRealPath,
} from './paths.js';
import {createPatternMatcher} from './patterns.js';
import type {PatternMatcher} from './patterns.js';
import {runPool} from './pool.js';
import {collectStats, nodeFileSystem} from './stats.js';
import type {
	Artifact,
	PatternMatch,
	ScanError,
	ScanResult,
	ScannerOptions,
} from './types.js';

export const DEFAULT_PARALLEL_WORKERS = 4;
export const DEFAULT_MAX_DEPTH = 32;

export interface Scanner {
	scan(root: string, minSizeMb?: number): Promise<ScanResult>;
	isWhitelisted(targetPath: string): Promise<boolean>;
}

interface WalkSeed {
	directory: string;
	depth: number;
	/** Entries already listed by the caller; skips the whitelist check and readdir. */
	entries?: Dirent[];
	/** Already recorded in the visited set before the pool started. */
	claimed?: boolean;
}

type EntryOutcome =
	| {kind: 'artifact'; artifact: Artifact}
	| {kind: 'descend'; directory: string}
	| {kind: 'skip'};

const SKIP: EntryOutcome = {kind: 'skip'};

/** Resolve sanctuary paths once; entries that do not exist keep their absolute form. */
export const resolveSanctuaries = async (
	whitelist: readonly string[],
): Promise<string[]> => {
	const resolved = await Promise.all(
		whitelist
			.filter(entry => entry.trim().length > 0)
			.map(async entry => resolveLoosely(entry)),
	);
	return [...new Set(resolved)];
};

/**
 * True when `targetPath` resolves to a sanctuary or somewhere below one. A path
 * that cannot be resolved counts as whitelisted.
 */
export const isWhitelistedPath = async (
	targetPath: string,
	sanctuaries: readonly string[],
): Promise<boolean> => {
	let resolvedPath: string;
	try {
		resolvedPath = await resolveRealPath(targetPath);
	} catch {
		return true;
	}

	return sanctuaries.some(sanctuary => isContainedPath(sanctuary, resolvedPath));
};

const compareArtifacts = (left: Artifact, right: Artifact): number =>
	right.sizeBytes - left.sizeBytes || left.path.localeCompare(right.path);

export const createScanner = ({
	catalog,
	whitelist = [],
	followSymlinks = false,
	parallelWorkers = DEFAULT_PARALLEL_WORKERS,
	maxDepth = DEFAULT_MAX_DEPTH,
	logger,
	fileSystem = nodeFileSystem,
}: ScannerOptions): Scanner => {
	const matcher: PatternMatcher = createPatternMatcher(catalog);
	let sanctuaries: Promise<string[]> | undefined;
	const getSanctuaries = async (): Promise<string[]> => {
		sanctuaries ??= resolveSanctuaries(whitelist);
		return sanctuaries;
	};

	const isWhitelisted = async (targetPath: string): Promise<boolean> =>
		isWhitelistedPath(targetPath, await getSanctuaries());

	const scan = async (root: string, minSizeMb = 0): Promise<ScanResult> => {
		const errors: ScanError[] = [];
		const recordError = (targetPath: string, error: unknown): void => {
			errors.push({path: targetPath, error: toErrorMessage(error)});
		};

		let rootPath: string;
		try {
			rootPath = await resolveRealPath(root);
		} catch (error) {
			const absoluteRoot = path.resolve(expandHome(root));
			recordError(absoluteRoot, error);
			return {root: absoluteRoot, artifacts: [], errors};
		}

		logger?.logScanStart(rootPath, catalog);

		const measureArtifact = async (
			entryPath: string,
			match: PatternMatch,
			depth: number,
		): Promise<Artifact | null> => {
			try {
				const stats = await collectStats(entryPath, {
					fileSystem,
					onError: recordError,
				});
				return Object.freeze({
					path: entryPath,
					sizeBytes: stats.size,
					category: `${match.category}.${match.subcategory}`,
					pattern: match.pattern,
					depth,
					inode: stats.inode,
				});
			} catch (error) {
				recordError(entryPath, error);
				return null;
			}
		};

		const inspectEntry = async (
			directory: string,
			entry: Dirent,
			depth: number,
		): Promise<EntryOutcome> => {
			const entryPath = path.join(directory, entry.name);
			const isSymlink = entry.isSymbolicLink();
			if (isSymlink && !followSymlinks) return SKIP;

			const match = matcher(entry.name);
			if (match) {
				if (await isWhitelisted(entryPath)) {
					logger?.logWhitelistSkip(entryPath);
					return SKIP;
				}

				const artifact = await measureArtifact(entryPath, match, depth);
				return artifact ? {kind: 'artifact', artifact} : SKIP;
			}

			let isDirectory = entry.isDirectory();
			if (isSymlink) {
				try {
					isDirectory = (await fileSystem.stat(entryPath)).isDirectory();
				} catch (error) {
					recordError(entryPath, error);
					return SKIP;
				}
			}

			return isDirectory ? {kind: 'descend', directory: entryPath} : SKIP;
		};

		// Shared by every unit so a followed link never re-enters another unit's tree.
		const visited = new Set<string>([rootPath]);

		const walk = async (seed: WalkSeed): Promise<Artifact[]> => {
			const found: Artifact[] = [];
			const stack: WalkSeed[] = [seed];

			while (stack.length > 0) {
				const current = stack.pop();
				if (!current) break;
				const {directory, depth} = current;

				let entries = current.entries;
				if (!entries) {
					if (await isWhitelisted(directory)) {
						logger?.logWhitelistSkip(directory);
						continue;
					}

					if (followSymlinks && !current.claimed) {
						try {
							const realDirectory = await fileSystem.realpath(directory);
							if (visited.has(realDirectory)) continue;
							visited.add(realDirectory);
						} catch (error) {
							recordError(directory, error);
							continue;
						}
					}

					try {
						entries = await fileSystem.readdir(directory);
					} catch (error) {
						recordError(directory, error);
						continue;
					}
				}

				for (const entry of entries) {
					const outcome = await inspectEntry(directory, entry, depth);
					if (outcome.kind === 'artifact') {
						found.push(outcome.artifact);
					} else if (outcome.kind === 'descend' && depth + 1 <= maxDepth) {
						stack.push({directory: outcome.directory, depth: depth + 1});
					}
				}
			}

			return found;
		};

		if (await isWhitelisted(rootPath)) {
			logger?.logWhitelistSkip(rootPath);
			return {root: rootPath, artifacts: [], errors};
		}

		let rootEntries: Dirent[];
		try {
			rootEntries = await fileSystem.readdir(rootPath);
		} catch (error) {
			recordError(rootPath, error);
			return {root: rootPath, artifacts: [], errors};
		}

		// Plain subdirectories that match nothing become their own units; every
		// other root entry belongs to the root unit.
		const subdirectories: Dirent[] = [];
		const rootLevelEntries: Dirent[] = [];
		for (const entry of rootEntries) {
			if (entry.isDirectory() && !matcher(entry.name) && maxDepth >= 1) {
				subdirectories.push(entry);
			} else {
				rootLevelEntries.push(entry);
			}
		}

		const seeds: WalkSeed[] = [
			{directory: rootPath, depth: 0, entries: rootLevelEntries},
			...subdirectories.map(entry => ({
				directory: path.join(rootPath, entry.name),
				depth: 1,
				claimed: true,
			})),
		];
		// Unit directories are plain entries of a resolved root, so their joined
		// path is already their realpath.
		for (const seed of seeds) visited.add(seed.directory);

		const batches = await runPool(seeds, parallelWorkers, async seed => {
			try {
				return await walk(seed);
			} catch (error) {
				recordError(seed.directory, error);
				return [];
			}
		});

		const artifacts = batches
			.flat()
			.filter(artifact => artifact.sizeBytes >= fromMegabytes(minSizeMb))
			.sort(compareArtifacts);

		return {root: rootPath, artifacts, errors};
	};

	return {scan, isWhitelisted};
};
