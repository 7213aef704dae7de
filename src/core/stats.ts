import fs from 'node:fs/promises';
import type {Dirent, Stats} from 'node:fs';
import path from 'node:path';
import type {ArtifactStats, EntryKind} from './types.js';

/**
 * The filesystem calls used to measure and remove a path. Production code uses
 * {@link nodeFileSystem}; tests wrap it to change files between calls.
 */
export interface FileSystemAdapter {
	lstat(targetPath: string): Promise<Stats>;
	stat(targetPath: string): Promise<Stats>;
	realpath(targetPath: string): Promise<string>;
	readdir(targetPath: string): Promise<Dirent[]>;
	rm(targetPath: string, options: {recursive: boolean}): Promise<void>;
	unlink(targetPath: string): Promise<void>;
}

export const nodeFileSystem: FileSystemAdapter = {
	lstat: async targetPath => fs.lstat(targetPath),
	stat: async targetPath => fs.stat(targetPath),
	realpath: async targetPath => fs.realpath(targetPath),
	readdir: async targetPath => fs.readdir(targetPath, {withFileTypes: true}),
	rm: async (targetPath, options) => fs.rm(targetPath, options),
	unlink: async targetPath => fs.unlink(targetPath),
};

export interface CollectStatsOptions {
	fileSystem?: FileSystemAdapter;
	/**
	 * Called for every path below the root that cannot be read. When omitted
	 * the first such error is thrown instead.
	 */
	onError?: (targetPath: string, error: unknown) => void;
}

export const toEntryKind = (stat: Stats): EntryKind => {
	if (stat.isSymbolicLink()) return 'symlink';
	if (stat.isDirectory()) return 'directory';
	if (stat.isFile()) return 'file';
	return 'other';
};

/**
 * Measure a path without following symlinks. Directories report the sum of
 * the regular files below them and the newest mtime seen anywhere in the tree.
 * Errors on the root itself always throw.
 */
export const collectStats = async (
	targetPath: string,
	{fileSystem = nodeFileSystem, onError}: CollectStatsOptions = {},
): Promise<ArtifactStats> => {
	const rootStat = await fileSystem.lstat(targetPath);
	const kind = toEntryKind(rootStat);
	if (kind !== 'directory') {
		return {
			size: kind === 'file' ? rootStat.size : 0,
			fileCount: kind === 'file' ? 1 : 0,
			latestMtimeMs: rootStat.mtimeMs,
			inode: rootStat.ino,
			kind,
		};
	}

	let size = 0;
	let fileCount = 0;
	let latestMtimeMs = rootStat.mtimeMs;
	const stack = [targetPath];

	while (stack.length > 0) {
		const directory = stack.pop();
		if (directory === undefined) break;

		let entries: Dirent[];
		try {
			entries = await fileSystem.readdir(directory);
		} catch (error) {
			if (!onError) throw error;
			onError(directory, error);
			continue;
		}

		for (const entry of entries) {
			const entryPath = path.join(directory, entry.name);
			let stat: Stats;
			try {
				stat = await fileSystem.lstat(entryPath);
			} catch (error) {
				if (!onError) throw error;
				onError(entryPath, error);
				continue;
			}

			if (stat.mtimeMs > latestMtimeMs) latestMtimeMs = stat.mtimeMs;
			if (stat.isDirectory()) {
				stack.push(entryPath);
			} else if (stat.isFile()) {
				size += stat.size;
				fileCount++;
			}
		}
	}

	return {size, fileCount, latestMtimeMs, inode: rootStat.ino, kind};
};

/** Names of the fields that differ between two measurements of one path. */
export const diffStats = (
	before: ArtifactStats,
	after: ArtifactStats,
): string[] => {
	const changed: string[] = [];
	if (before.kind !== after.kind) changed.push('type');
	if (before.inode !== after.inode) changed.push('inode');
	if (before.size !== after.size) changed.push('size');
	if (before.latestMtimeMs !== after.latestMtimeMs) changed.push('mtime');
	return changed;
};
