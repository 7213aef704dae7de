import path from 'node:path';
import {
	createNuker,
	createUndoManifest,
	getDestructionMetrics,
} from './core/delete.js';
import {toErrorMessage} from './core/errors.js';
import {formatMegabytes, human} from './core/format.js';
import type {Logger, LogSink} from './core/logger.js';
import {findDuplicates, generateReport, writeScanReport} from './core/report.js';
import {createScanner} from './core/scanner.js';
import type {
	Artifact,
	ConfirmationCallback,
	DeletionMode,
	DeletionResult,
	DestructionMetrics,
	PatternCatalog,
	PurgeConfig,
	ScanReport,
	ScanResult,
} from './core/types.js';

export interface CommandContext {
	config: PurgeConfig;
	catalog: PatternCatalog;
	logger: Logger;
	stdout: LogSink;
	stderr: LogSink;
	/** Artifacts smaller than this many megabytes are left out. */
	thresholdMb: number;
	protectedPaths?: readonly string[];
	getUid?: () => number | undefined;
}

export interface ModeFlags {
	dryRun?: boolean;
	interactive?: boolean;
	force?: boolean;
	apply?: boolean;
}

export type ModeResolution =
	| {ok: true; mode: DeletionMode}
	| {ok: false; message: string};

export const resolveDeletionMode = (
	{dryRun = false, interactive = false, force = false, apply = false}: ModeFlags,
	safeMode: boolean,
): ModeResolution => {
	if (dryRun) return {ok: true, mode: 'dry-run'};
	if (interactive) return {ok: true, mode: 'interactive'};
	if (force) {
		if (safeMode && !apply) {
			return {
				ok: false,
				message:
					'Refusing to force-delete while safeMode is enabled. Pass --apply to proceed, or use --dry-run to preview.',
			};
		}

		return {ok: true, mode: 'force'};
	}

	return {ok: true, mode: 'safe'};
};

export interface ScanOutcome {
	result: ScanResult;
	report: ScanReport;
	duplicates: Map<string, Artifact[]>;
}

export const scanTarget = async ({
	config,
	catalog,
	logger,
	thresholdMb,
}: CommandContext): Promise<ScanOutcome> => {
	const scanner = createScanner({
		catalog,
		whitelist: [...config.whitelistPaths, ...catalog.systemExclusions],
		followSymlinks: config.followSymlinks,
		parallelWorkers: config.maxWorkers,
		maxDepth: config.maxDepth,
		logger,
	});

	const result = await scanner.scan(config.target, thresholdMb);
	for (const artifact of result.artifacts) logger.logArtifactFound(artifact);
	for (const error of result.errors) {
		logger.debug(`Scan error at ${error.path}: ${error.error}`);
	}

	return {
		result,
		report: generateReport(result),
		duplicates: findDuplicates(result.artifacts),
	};
};

const relativeTo = (root: string, targetPath: string): string =>
	path.relative(root, targetPath) || '.';

export const formatArtifactLine = (root: string, artifact: Artifact): string =>
	`${human(artifact.sizeBytes).padStart(8)}  ${artifact.category.padEnd(34)} ${relativeTo(root, artifact.path)}`;

export const printScanOutcome = (
	{stdout}: Pick<CommandContext, 'stdout'>,
	{result, report, duplicates}: ScanOutcome,
	asJson: boolean,
): void => {
	if (asJson) {
		stdout.write(
			`${JSON.stringify(
				{
					root: result.root,
					report,
					artifacts: result.artifacts,
					duplicates: Object.fromEntries(
						[...duplicates].map(([key, group]) => [
							key,
							group.map(artifact => artifact.path),
						]),
					),
				},
				null,
				2,
			)}\n`,
		);
		return;
	}

	if (result.artifacts.length === 0) {
		stdout.write(`No artifacts found under ${result.root}.\n`);
		return;
	}

	for (const artifact of result.artifacts) {
		stdout.write(`${formatArtifactLine(result.root, artifact)}\n`);
	}

	const {summary} = report;
	stdout.write(
		`\nTotal: ${formatMegabytes(summary.totalSizeMb)} in ${summary.totalArtifacts} artifacts across ${summary.uniqueCategories} categories\n`,
	);
	if (duplicates.size > 0) {
		stdout.write(`Possible duplicates: ${duplicates.size} groups\n`);
	}

	if (summary.scanErrors > 0) {
		stdout.write(`Scan errors: ${summary.scanErrors}\n`);
	}
};

export const runScanCommand = async (
	context: CommandContext,
	{json = false}: {json?: boolean} = {},
): Promise<ScanOutcome> => {
	const outcome = await scanTarget(context);
	printScanOutcome(context, outcome, json);

	try {
		const reportPath = await writeScanReport(
			outcome.report,
			context.config.reportDirectory,
		);
		context.logger.info(`Scan report written to ${reportPath}`);
	} catch (error) {
		context.logger.logError(error, 'scan_report');
	}

	return outcome;
};

export interface CleanOutcome {
	scan: ScanOutcome;
	results: DeletionResult[];
	metrics: DestructionMetrics;
	manifestPath?: string;
	auditPath?: string;
}

export const cleanArtifacts = async (
	context: CommandContext,
	scan: ScanOutcome,
	mode: DeletionMode,
	confirm?: ConfirmationCallback,
): Promise<CleanOutcome> => {
	const {config, logger} = context;
	const nuker = createNuker({
		logger,
		parallelOperations: config.parallelOperations,
		...(context.protectedPaths ? {protectedPaths: context.protectedPaths} : {}),
		getUid: context.getUid,
	});

	const results = await nuker.deleteArtifacts(scan.result.artifacts, mode, confirm);
	const metrics = getDestructionMetrics(results);
	logger.logSummary(metrics);

	const outcome: CleanOutcome = {scan, results, metrics};

	if (mode !== 'dry-run' && results.length > 0) {
		try {
			outcome.manifestPath = await createUndoManifest(results, {
				directory: config.manifestDirectory,
			});
			logger.info(`Deletion manifest written to ${outcome.manifestPath}`);
		} catch (error) {
			logger.logError(error, 'undo_manifest');
		}
	}

	if (config.logPath) {
		try {
			outcome.auditPath = await logger.exportAuditLog();
		} catch (error) {
			logger.logError(error, 'audit_log');
		}
	}

	return outcome;
};

export const printCleanOutcome = (
	{stdout, stderr}: Pick<CommandContext, 'stdout' | 'stderr'>,
	{scan, results, metrics}: CleanOutcome,
	mode: DeletionMode,
	asJson: boolean,
): void => {
	if (asJson) {
		stdout.write(
			`${JSON.stringify(
				{
					mode,
					metrics,
					results: results.map(result => ({
						path: result.path,
						ok: result.ok,
						sizeMb: result.sizeMb,
						mode: result.mode,
						...(result.ok ? {} : {error: toErrorMessage(result.error)}),
					})),
				},
				null,
				2,
			)}\n`,
		);
		return;
	}

	if (scan.result.artifacts.length === 0) {
		stdout.write('Nothing to clean.\n');
		return;
	}

	if (mode === 'dry-run') {
		stdout.write(
			`Dry-run: would delete ${metrics.successfulDeletions} artifacts (${formatMegabytes(metrics.totalFreedMb)}).\n`,
		);
		return;
	}

	stdout.write(
		`Deleted ${metrics.successfulDeletions}/${scan.result.artifacts.length} artifacts. Freed ${formatMegabytes(metrics.totalFreedMb)}.\n`,
	);

	for (const result of results) {
		if (result.ok) continue;
		stderr.write(
			`Failed to delete ${result.path}: ${toErrorMessage(result.error)}\n`,
		);
	}
};

export const runCleanCommand = async (
	context: CommandContext,
	mode: DeletionMode,
	{json = false, confirm}: {json?: boolean; confirm?: ConfirmationCallback} = {},
): Promise<CleanOutcome> => {
	const scan = await scanTarget(context);
	const outcome = await cleanArtifacts(context, scan, mode, confirm);
	printCleanOutcome(context, outcome, mode, json);
	return outcome;
};
