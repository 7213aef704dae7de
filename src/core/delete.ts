import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {performance} from 'node:perf_hooks';
import {
	ModifiedDuringDeletionError,
	UnsafePathError,
	hasErrorCode,
	toError,
	toErrorMessage,
} from './errors.js';
import {roundTo, toMegabytes} from './format.js';
import {countPathComponents} from './paths.js';
import {runPool} from './pool.js';
import {
	checkDeletionSafety,
	defaultProtectedPaths,
	resolveProtectedPaths,
} from './safety.js';
import {collectStats, diffStats, nodeFileSystem} from './stats.js';
import type {FileSystemAdapter} from './stats.js';
import type {
	Artifact,
	ConfirmationCallback,
	DeletionLogger,
	DeletionMode,
	DeletionResult,
	DestructionMetrics,
	SafetyVerdict,
} from './types.js';

export const DEFAULT_PARALLEL_OPERATIONS = 2;
export const SAFE_MODE_SIZE_LIMIT_MB = 100;
export const SAFE_MODE_MIN_COMPONENTS = 6;
const MAX_MANIFEST_ATTEMPTS = 100;

export interface ExecuteDeletionOptions {
	dryRun?: boolean;
	mode?: DeletionMode;
	fileSystem?: FileSystemAdapter;
}

/**
 * Measure and delete a single path. The path is measured a second time right
 * before the destructive call; any difference aborts with
 * {@link ModifiedDuringDeletionError} and leaves the path in place.
 * Never throws: failures come back as `{ok: false}` results.
 */
export const executeDeletion = async (
	targetPath: string,
	{
		dryRun = false,
		mode = dryRun ? 'dry-run' : 'force',
		fileSystem = nodeFileSystem,
	}: ExecuteDeletionOptions = {},
): Promise<DeletionResult> => {
	const startedAt = performance.now();

	try {
		const before = await collectStats(targetPath, {fileSystem});

		if (!dryRun) {
			const after = await collectStats(targetPath, {fileSystem});
			const changed = diffStats(before, after);
			if (changed.length > 0) {
				throw new ModifiedDuringDeletionError(targetPath, changed);
			}

			if (before.kind === 'directory') {
				await fileSystem.rm(targetPath, {recursive: true});
			} else {
				await fileSystem.unlink(targetPath);
			}
		}

		return {
			path: targetPath,
			ok: true,
			sizeMb: toMegabytes(before.size),
			durationMs: performance.now() - startedAt,
			mode,
		};
	} catch (error) {
		return {
			path: targetPath,
			ok: false,
			sizeMb: 0,
			durationMs: performance.now() - startedAt,
			mode,
			error: toError(error),
		};
	}
};

export const getDestructionMetrics = (
	results: readonly DeletionResult[],
): DestructionMetrics => {
	let successfulDeletions = 0;
	let totalFreedMb = 0;
	let successDurationMs = 0;
	const errors: DestructionMetrics['errors'] = [];

	for (const result of results) {
		if (result.ok) {
			successfulDeletions++;
			totalFreedMb += result.sizeMb;
			successDurationMs += result.durationMs;
		} else {
			errors.push({path: result.path, error: toErrorMessage(result.error)});
		}
	}

	return {
		totalOperations: results.length,
		successfulDeletions,
		failedDeletions: results.length - successfulDeletions,
		totalFreedMb: roundTo(totalFreedMb),
		totalFreedGb: roundTo(totalFreedMb / 1024),
		averageDurationMs:
			successfulDeletions > 0
				? roundTo(successDurationMs / successfulDeletions)
				: 0,
		errors,
	};
};

export interface UndoManifestOptions {
	directory?: string;
	now?: number;
}

/**
 * Record what a batch deleted. This is documentation for the user, not
 * something that can bring the data back.
 */
export const createUndoManifest = async (
	results: readonly DeletionResult[],
	{directory = os.homedir(), now = Date.now()}: UndoManifestOptions = {},
): Promise<string> => {
	const stem = `.devpurge_undo_${Math.floor(now / 1000)}`;
	const manifest = {
		timestamp: new Date(now).toISOString(),
		deletions: results.map(result => ({
			path: result.path,
			sizeMb: roundTo(result.sizeMb),
			success: result.ok,
			mode: result.mode,
		})),
	};

	const content = `${JSON.stringify(manifest, null, 2)}\n`;

	await fs.mkdir(directory, {recursive: true});
	// Batches finishing in the same second get a numeric suffix instead of
	// overwriting each other.
	for (let attempt = 0; ; attempt++) {
		const manifestPath = path.join(
			directory,
			attempt === 0 ? `${stem}.json` : `${stem}_${attempt}.json`,
		);
		try {
			await fs.writeFile(manifestPath, content, {mode: 0o600, flag: 'wx'});
			return manifestPath;
		} catch (error) {
			if (!hasErrorCode(error, 'EEXIST') || attempt >= MAX_MANIFEST_ATTEMPTS) {
				throw error;
			}
		}
	}
};

export interface NukerOptions {
	logger: DeletionLogger;
	parallelOperations?: number;
	/** Candidate protected directories; only those that exist are kept. */
	protectedPaths?: readonly string[];
	getUid?: () => number | undefined;
	fileSystem?: FileSystemAdapter;
}

export interface Nuker {
	checkDeletionSafety(targetPath: string): Promise<SafetyVerdict>;
	isSafeToDelete(targetPath: string): Promise<boolean>;
	executeDeletion(
		targetPath: string,
		options?: Omit<ExecuteDeletionOptions, 'fileSystem'>,
	): Promise<DeletionResult>;
	deleteArtifacts(
		artifacts: readonly Artifact[],
		mode: DeletionMode,
		confirm?: ConfirmationCallback,
	): Promise<DeletionResult[]>;
}

interface ValidatedArtifact {
	artifact: Artifact;
	resolvedPath: string;
}

export const createNuker = ({
	logger,
	parallelOperations = DEFAULT_PARALLEL_OPERATIONS,
	protectedPaths = defaultProtectedPaths(),
	getUid,
	fileSystem = nodeFileSystem,
}: NukerOptions): Nuker => {
	const resolvedProtectedPaths = resolveProtectedPaths(protectedPaths);

	const validate = async (targetPath: string): Promise<SafetyVerdict> =>
		checkDeletionSafety(targetPath, {
			protectedPaths: await resolvedProtectedPaths,
			logger,
			getUid,
		});

	const isSafeToDelete = async (targetPath: string): Promise<boolean> =>
		(await validate(targetPath)).safe;

	const runDeletion = async (
		targetPath: string,
		options: Omit<ExecuteDeletionOptions, 'fileSystem'> = {},
	): Promise<DeletionResult> =>
		executeDeletion(targetPath, {...options, fileSystem});

	const askConfirmation = async (
		confirm: ConfirmationCallback,
		artifact: Artifact,
	): Promise<boolean> => {
		try {
			return (await confirm(artifact)) === true;
		} catch (error) {
			logger.logError(error, `confirmation of ${artifact.path}`);
			return false;
		}
	};

	// Validation runs again right before the destructive step; a path that no
	// longer passes is skipped without a result.
	const destroy = async (
		artifact: Artifact,
		mode: DeletionMode,
	): Promise<DeletionResult | null> => {
		if (!(await isSafeToDelete(artifact.path))) return null;

		const result = await runDeletion(artifact.path, {mode});
		if (result.ok) {
			logger.logDeletion(artifact.path, result.sizeMb, false);
		} else {
			logger.logError(result.error, `deletion of ${artifact.path}`);
		}

		return result;
	};

	const collect = (
		results: DeletionResult[],
		result: DeletionResult | null,
	): void => {
		if (result) results.push(result);
	};

	const deleteArtifacts = async (
		artifacts: readonly Artifact[],
		mode: DeletionMode,
		confirm?: ConfirmationCallback,
	): Promise<DeletionResult[]> => {
		const results: DeletionResult[] = [];
		const validated: ValidatedArtifact[] = [];

		for (const artifact of artifacts) {
			const verdict = await validate(artifact.path);
			if (verdict.safe) {
				validated.push({artifact, resolvedPath: verdict.resolvedPath});
				continue;
			}

			logger.logError(
				new UnsafePathError(
					artifact.path,
					verdict.reason,
					`Unsafe path rejected: ${artifact.path}`,
				),
				'pre_deletion_validation',
			);
		}

		switch (mode) {
			case 'dry-run': {
				for (const {artifact} of validated) {
					results.push(await runDeletion(artifact.path, {dryRun: true, mode}));
					logger.logDeletion(
						artifact.path,
						toMegabytes(artifact.sizeBytes),
						true,
					);
				}

				break;
			}

			case 'interactive': {
				for (const {artifact} of validated) {
					if (!confirm) {
						logger.logError(
							new Error('No confirmation callback provided'),
							'interactive_mode',
						);
						continue;
					}

					if (await askConfirmation(confirm, artifact)) {
						collect(results, await destroy(artifact, mode));
					}
				}

				break;
			}

			case 'force': {
				const completed = await runPool(
					validated,
					parallelOperations,
					async ({artifact}) => destroy(artifact, mode),
				);
				for (const result of completed) collect(results, result);
				break;
			}

			case 'safe': {
				for (const {artifact, resolvedPath} of validated) {
					const needsConfirmation =
						toMegabytes(artifact.sizeBytes) > SAFE_MODE_SIZE_LIMIT_MB ||
						countPathComponents(resolvedPath) < SAFE_MODE_MIN_COMPONENTS;
					if (
						needsConfirmation &&
						!(confirm && (await askConfirmation(confirm, artifact)))
					) {
						continue;
					}

					collect(results, await destroy(artifact, mode));
				}

				break;
			}
		}

		return results;
	};

	return {
		checkDeletionSafety: validate,
		isSafeToDelete,
		executeDeletion: runDeletion,
		deleteArtifacts,
	};
};
