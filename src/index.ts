import path from 'node:path';
import {
	cancel,
	confirm,
	intro,
	isCancel,
	log,
	note,
	outro,
	spinner,
} from '@clack/prompts';
import {cleanArtifacts, scanTarget} from './commands.js';
import type {CleanOutcome, CommandContext} from './commands.js';
import {toErrorMessage} from './core/errors.js';
import {formatMegabytes, roundTo, toMegabytes} from './core/format.js';
import type {Artifact, ConfirmationCallback, DeletionMode} from './core/types.js';

export interface PromptConfirmation {
	confirm: ConfirmationCallback;
	/** True once the user cancelled a prompt; later prompts are declined. */
	isCancelled(): boolean;
}

export const createPromptConfirmation = (root: string): PromptConfirmation => {
	let cancelled = false;

	const ask = async (artifact: Artifact): Promise<boolean> => {
		if (cancelled) return false;

		const answer = await confirm({
			message: `Delete ${path.relative(root, artifact.path) || artifact.path} (${formatMegabytes(roundTo(toMegabytes(artifact.sizeBytes)))}, ${artifact.category})?`,
			initialValue: false,
		});
		if (isCancel(answer)) {
			cancelled = true;
			return false;
		}

		return answer;
	};

	return {confirm: ask, isCancelled: () => cancelled};
};

const MODE_LABELS: Record<DeletionMode, string> = {
	'dry-run': 'dry-run (nothing is deleted)',
	interactive: 'interactive (confirm every artifact)',
	force: 'force (no confirmation)',
	safe: 'safe (confirm large or shallow artifacts)',
};

export const runInteractiveClean = async (
	context: CommandContext,
	mode: DeletionMode,
): Promise<CleanOutcome | null> => {
	intro('devpurge');

	const scanSpinner = spinner();
	scanSpinner.start(`Scanning ${context.config.target}`);
	const scan = await scanTarget(context);
	const {summary} = scan.report;
	scanSpinner.stop(
		`Found ${summary.totalArtifacts} artifacts (${formatMegabytes(summary.totalSizeMb)})`,
	);

	if (scan.result.artifacts.length === 0) {
		outro('Nothing to clean.');
		return null;
	}

	note(
		[
			`Path: ${scan.result.root}`,
			`Artifacts: ${summary.totalArtifacts} in ${summary.uniqueCategories} categories`,
			`Total: ${formatMegabytes(summary.totalSizeMb)}`,
			`Scan errors: ${summary.scanErrors}`,
			`Mode: ${MODE_LABELS[mode]}`,
		].join('\n'),
		'Scan summary',
	);

	const prompt = createPromptConfirmation(scan.result.root);
	const outcome = await cleanArtifacts(context, scan, mode, prompt.confirm);
	if (prompt.isCancelled() && outcome.results.length === 0) {
		cancel('Operation cancelled.');
		return outcome;
	}

	const {metrics} = outcome;
	if (mode === 'dry-run') {
		log.success(
			`Dry-run: would delete ${metrics.successfulDeletions} artifacts (${formatMegabytes(metrics.totalFreedMb)}).`,
		);
		outro('Dry-run complete.');
		return outcome;
	}

	log.info(
		`Deleted ${metrics.successfulDeletions}/${scan.result.artifacts.length} artifacts. Freed ${formatMegabytes(metrics.totalFreedMb)}.`,
	);
	for (const result of outcome.results) {
		if (result.ok) continue;
		log.error(`Failed to delete ${result.path}: ${toErrorMessage(result.error)}`);
	}

	if (outcome.manifestPath) {
		log.info(`Manifest: ${outcome.manifestPath}`);
	}

	outro(
		metrics.failedDeletions > 0
			? 'Cleanup finished with errors.'
			: 'Cleanup finished.',
	);
	return outcome;
};
