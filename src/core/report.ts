import fs from 'node:fs/promises';
import path from 'node:path';
import {roundTo, toMegabytes} from './format.js';
import type {Artifact, CategoryStats, ScanReport, ScanResult} from './types.js';

const TOP_ARTIFACT_LIMIT = 10;
const REPORTED_ERROR_LIMIT = 10;

export const generateReport = (result: ScanResult): ScanReport => {
	const categories: Record<string, CategoryStats> = {};
	let totalSizeMb = 0;

	for (const artifact of result.artifacts) {
		const sizeMb = toMegabytes(artifact.sizeBytes);
		const stats = (categories[artifact.category] ??= {count: 0, sizeMb: 0});
		stats.count++;
		stats.sizeMb += sizeMb;
		totalSizeMb += sizeMb;
	}

	for (const stats of Object.values(categories)) {
		stats.sizeMb = roundTo(stats.sizeMb);
	}

	return {
		summary: {
			totalArtifacts: result.artifacts.length,
			totalSizeMb: roundTo(totalSizeMb),
			totalSizeGb: roundTo(totalSizeMb / 1024),
			uniqueCategories: Object.keys(categories).length,
			scanErrors: result.errors.length,
		},
		categories,
		topArtifacts: result.artifacts.slice(0, TOP_ARTIFACT_LIMIT).map(artifact => ({
			path: artifact.path,
			sizeMb: roundTo(toMegabytes(artifact.sizeBytes)),
			category: artifact.category,
		})),
		errors: result.errors.slice(0, REPORTED_ERROR_LIMIT).map(error => ({...error})),
	};
};

/**
 * Group artifacts that share a pattern and an exact byte size. Handy for
 * spotting copies of the same virtualenv or dependency tree.
 */
export const findDuplicates = (
	artifacts: readonly Artifact[],
): Map<string, Artifact[]> => {
	const groups = new Map<string, Artifact[]>();
	for (const artifact of artifacts) {
		const key = `${artifact.pattern}:${artifact.sizeBytes}`;
		const group = groups.get(key);
		if (group) group.push(artifact);
		else groups.set(key, [artifact]);
	}

	for (const [key, group] of groups) {
		if (group.length < 2) groups.delete(key);
	}

	return groups;
};

export const writeScanReport = async (
	report: ScanReport,
	directory: string,
	now = Date.now(),
): Promise<string> => {
	await fs.mkdir(directory, {recursive: true});
	const reportPath = path.join(
		directory,
		`scan_report_${Math.floor(now / 1000)}.json`,
	);
	await fs.writeFile(reportPath, `${JSON.stringify(report, null, 2)}\n`, {
		mode: 0o600,
	});
	return reportPath;
};
