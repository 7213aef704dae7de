import type {FileSystemAdapter} from './stats.js';

export type DeletionMode = 'dry-run' | 'interactive' | 'force' | 'safe';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';
export type EntryKind = 'file' | 'directory' | 'symlink' | 'other';

export interface PatternCatalogEntry {
	category: string;
	subcategory: string;
	patterns: readonly string[];
}

export interface PatternCatalog {
	entries: readonly PatternCatalogEntry[];
	sizeThresholds: Readonly<Record<string, string>>;
	systemExclusions: readonly string[];
}

export interface PatternMatch {
	category: string;
	subcategory: string;
	pattern: string;
}

export interface Artifact {
	readonly path: string;
	readonly sizeBytes: number;
	readonly category: string;
	readonly pattern: string;
	readonly depth: number;
	readonly inode: number;
}

export interface ScanError {
	path: string;
	error: string;
}

export interface ScanResult {
	root: string;
	artifacts: Artifact[];
	errors: ScanError[];
}

export interface CategoryStats {
	count: number;
	sizeMb: number;
}

export interface ScanReport {
	summary: {
		totalArtifacts: number;
		totalSizeMb: number;
		totalSizeGb: number;
		uniqueCategories: number;
		scanErrors: number;
	};
	categories: Record<string, CategoryStats>;
	topArtifacts: Array<{path: string; sizeMb: number; category: string}>;
	errors: ScanError[];
}

export interface ScannerOptions {
	catalog: PatternCatalog;
	whitelist?: readonly string[];
	followSymlinks?: boolean;
	parallelWorkers?: number;
	maxDepth?: number;
	logger?: ScanLogger;
	fileSystem?: FileSystemAdapter;
}

export interface ArtifactStats {
	size: number;
	fileCount: number;
	latestMtimeMs: number;
	inode: number;
	kind: EntryKind;
}

export type UnsafeReason = 'unresolvable' | 'protected' | 'ownership' | 'shallow';

export type SafetyVerdict =
	| {safe: true; resolvedPath: string}
	| {safe: false; reason: UnsafeReason; message: string};

export interface DeletionSuccessResult {
	path: string;
	ok: true;
	sizeMb: number;
	durationMs: number;
	mode: DeletionMode;
}

export interface DeletionFailureResult {
	path: string;
	ok: false;
	sizeMb: 0;
	durationMs: number;
	mode: DeletionMode;
	error: Error;
}

export type DeletionResult = DeletionSuccessResult | DeletionFailureResult;

export type ConfirmationCallback = (
	artifact: Artifact,
) => boolean | Promise<boolean>;

export interface DestructionMetrics {
	totalOperations: number;
	successfulDeletions: number;
	failedDeletions: number;
	totalFreedMb: number;
	totalFreedGb: number;
	averageDurationMs: number;
	errors: Array<{path: string; error: string}>;
}

export interface ScanLogger {
	logError(error: unknown, context: string): void;
	logScanStart(targetPath: string, catalog: PatternCatalog): void;
	logWhitelistSkip(targetPath: string): void;
}

export interface DeletionLogger {
	logError(error: unknown, context: string): void;
	logDeletion(targetPath: string, sizeMb: number, dryRun: boolean): void;
}

export interface PurgeConfig {
	target: string;
	whitelistPaths: string[];
	followSymlinks: boolean;
	maxWorkers: number;
	parallelOperations: number;
	safeMode: boolean;
	minimumSize: string;
	maxDepth: number;
	logPath?: string;
	logLevel: LogLevel;
	reportDirectory: string;
	manifestDirectory: string;
}
