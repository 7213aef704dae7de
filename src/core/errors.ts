import type {UnsafeReason} from './types.js';

export class ConfigError extends Error {
	override name = 'ConfigError';
}

export class PatternCatalogError extends Error {
	override name = 'PatternCatalogError';
}

export class UnsafePathError extends Error {
	override name = 'UnsafePathError';

	constructor(
		readonly targetPath: string,
		readonly reason: UnsafeReason,
		message: string,
	) {
		super(message);
	}
}

/**
 * Raised when a path changed between the size measurement and the destructive
 * step. Callers may retry after a fresh scan; an I/O failure usually needs a
 * different fix.
 */
export class ModifiedDuringDeletionError extends Error {
	override name = 'ModifiedDuringDeletionError';
	readonly code = 'EMODIFIED';

	constructor(
		readonly targetPath: string,
		readonly changed: readonly string[],
	) {
		super(
			`${targetPath} was modified during deletion (${changed.join(', ')} changed)`,
		);
	}
}

export const isModificationError = (
	error: unknown,
): error is ModifiedDuringDeletionError =>
	error instanceof ModifiedDuringDeletionError;

export const hasErrorCode = (error: unknown, code: string): boolean =>
	error instanceof Error && 'code' in error && error.code === code;

export const toError = (error: unknown): Error =>
	error instanceof Error ? error : new Error(String(error));

export const toErrorMessage = (error: unknown): string =>
	String(error instanceof Error ? error.message : error);
