import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

export const expandHome = (value: string, homeDirectory = os.homedir()): string => {
	if (value === '~') return homeDirectory;
	if (value.startsWith('~/') || value.startsWith(`~${path.sep}`)) {
		return path.join(homeDirectory, value.slice(2));
	}

	return value;
};

/** Absolute, symlink-free form of `targetPath`. Throws when it cannot be resolved. */
export const resolveRealPath = async (targetPath: string): Promise<string> =>
	fs.realpath(path.resolve(expandHome(targetPath)));

/**
 * Like {@link resolveRealPath} but falls back to the lexical absolute path for
 * paths that do not exist yet.
 */
export const resolveLoosely = async (targetPath: string): Promise<string> => {
	const absolutePath = path.resolve(expandHome(targetPath));
	try {
		return await fs.realpath(absolutePath);
	} catch {
		return absolutePath;
	}
};

export const isContainedPath = (rootPath: string, targetPath: string): boolean =>
	targetPath === rootPath ||
	targetPath.startsWith(
		rootPath.endsWith(path.sep) ? rootPath : `${rootPath}${path.sep}`,
	);

/**
 * Number of components in an absolute path, counting the filesystem root as
 * one: `/` has 1, `/usr/local` has 3, `/Users/x/dev/app` has 5.
 */
export const countPathComponents = (absolutePath: string): number => {
	const {root} = path.parse(absolutePath);
	const segments = absolutePath
		.slice(root.length)
		.split(path.sep)
		.filter(segment => segment.length > 0);
	return (root ? 1 : 0) + segments.length;
};
