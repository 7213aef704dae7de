import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import {UnsafePathError, toErrorMessage} from './errors.js';
import {countPathComponents, isContainedPath} from './paths.js';
import type {DeletionLogger, SafetyVerdict, UnsafeReason} from './types.js';

export const MIN_DELETABLE_COMPONENTS = 4;

const SYSTEM_DIRECTORIES = [
	'/System',
	'/Library',
	'/Applications',
	'/usr',
	'/bin',
	'/sbin',
	'/private',
	'/dev',
	'/Volumes',
	'/etc',
	'/boot',
	'/proc',
	'/sys',
];

const HOME_SENSITIVE_DIRECTORIES = [
	'.ssh',
	'.gnupg',
	path.join('Library', 'Keychains'),
	path.join('Library', 'Application Support', 'CrashReporter'),
];

export const defaultProtectedPaths = (
	homeDirectory = os.homedir(),
): string[] => [
	...SYSTEM_DIRECTORIES,
	...HOME_SENSITIVE_DIRECTORIES.map(entry => path.join(homeDirectory, entry)),
];

/** Resolve candidates once, keeping only those that exist on disk. */
export const resolveProtectedPaths = async (
	candidates: readonly string[],
): Promise<string[]> => {
	const resolved = await Promise.all(
		candidates.map(async candidate => {
			try {
				return await fs.realpath(candidate);
			} catch {
				return null;
			}
		}),
	);

	return [
		...new Set(resolved.filter((entry): entry is string => entry !== null)),
	];
};

export interface SafetyValidatorOptions {
	/** Already-resolved protected directories. */
	protectedPaths: readonly string[];
	logger?: Pick<DeletionLogger, 'logError'>;
	/** Owner check; defaults to the current process uid. */
	getUid?: () => number | undefined;
}

const currentUid = (): number | undefined =>
	typeof process.getuid === 'function' ? process.getuid() : undefined;

const unsafe = (reason: UnsafeReason, message: string): SafetyVerdict => ({
	safe: false,
	reason,
	message,
});

/**
 * Decide whether `targetPath` may be deleted. Checks run in a fixed order and
 * the first failure wins: resolution, protected paths, ownership, depth.
 */
export const checkDeletionSafety = async (
	targetPath: string,
	{protectedPaths, logger, getUid = currentUid}: SafetyValidatorOptions,
): Promise<SafetyVerdict> => {
	let verdict: SafetyVerdict;
	try {
		verdict = await evaluate(targetPath, protectedPaths, getUid);
	} catch (error) {
		verdict = unsafe(
			'unresolvable',
			`Safety check failed for ${targetPath}: ${toErrorMessage(error)}`,
		);
	}

	if (!verdict.safe) {
		logger?.logError(
			new UnsafePathError(targetPath, verdict.reason, verdict.message),
			'safety_check',
		);
	}

	return verdict;
};

const evaluate = async (
	targetPath: string,
	protectedPaths: readonly string[],
	getUid: () => number | undefined,
): Promise<SafetyVerdict> => {
	let resolvedPath: string;
	try {
		resolvedPath = await fs.realpath(path.resolve(targetPath));
	} catch (error) {
		return unsafe(
			'unresolvable',
			`Cannot resolve ${targetPath}: ${toErrorMessage(error)}`,
		);
	}

	const protectedMatch = protectedPaths.find(protectedPath =>
		isContainedPath(protectedPath, resolvedPath),
	);
	if (protectedMatch) {
		return unsafe(
			'protected',
			`Attempted to delete protected path: ${targetPath} (inside ${protectedMatch})`,
		);
	}

	let ownerUid: number;
	try {
		ownerUid = (await fs.stat(resolvedPath)).uid;
	} catch (error) {
		return unsafe(
			'unresolvable',
			`Cannot stat ${targetPath}: ${toErrorMessage(error)}`,
		);
	}

	const uid = getUid();
	if (uid === undefined || ownerUid !== uid) {
		return unsafe('ownership', `Ownership mismatch: ${targetPath}`);
	}

	if (countPathComponents(resolvedPath) < MIN_DELETABLE_COMPONENTS) {
		return unsafe('shallow', `Path too shallow: ${targetPath}`);
	}

	return {safe: true, resolvedPath};
};
