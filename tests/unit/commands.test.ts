import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {
	resolveDeletionMode,
	runCleanCommand,
	runScanCommand,
} from '../../src/commands.js';
import type {CommandContext} from '../../src/commands.js';
import {createDefaultConfig} from '../../src/core/config.js';
import {Logger} from '../../src/core/logger.js';
import {createPatternCatalog} from '../../src/core/patterns.js';

const createSink = () => {
	const lines: string[] = [];
	return {
		lines,
		write(chunk: string) {
			lines.push(chunk);
			return true;
		},
	};
};

const exists = async (targetPath: string): Promise<boolean> =>
	fs
		.lstat(targetPath)
		.then(() => true)
		.catch(() => false);

const createWorkspace = async () => {
	const base = await fs.realpath(
		await fs.mkdtemp(path.join(os.tmpdir(), 'devpurge-commands-')),
	);
	const root = path.join(base, 'projects');
	await fs.mkdir(path.join(root, 'a'), {recursive: true});
	await fs.mkdir(path.join(root, 'b'), {recursive: true});
	await fs.writeFile(path.join(root, 'a', 'x.cache'), Buffer.alloc(2048));
	await fs.writeFile(path.join(root, 'b', 'y.cache'), Buffer.alloc(1024));
	await fs.writeFile(path.join(root, 'b', 'notes.txt'), 'keep me');

	const stdout = createSink();
	const stderr = createSink();
	const logSink = createSink();
	const context: CommandContext = {
		config: {
			...createDefaultConfig(base),
			target: root,
			reportDirectory: path.join(base, 'reports'),
			manifestDirectory: path.join(base, 'manifests'),
		},
		catalog: createPatternCatalog({build: {caches: ['*.cache']}}),
		logger: new Logger({stdout: logSink, stderr: logSink, color: false}),
		stdout,
		stderr,
		thresholdMb: 0,
		protectedPaths: [],
	};

	return {base, root, context, stdout: stdout.lines, stderr: stderr.lines};
};

test('resolveDeletionMode picks the strongest requested mode', () => {
	expect(resolveDeletionMode({dryRun: true, force: true}, true)).toEqual({
		ok: true,
		mode: 'dry-run',
	});
	expect(resolveDeletionMode({interactive: true, force: true}, true)).toEqual({
		ok: true,
		mode: 'interactive',
	});
	expect(resolveDeletionMode({force: true}, false)).toEqual({
		ok: true,
		mode: 'force',
	});
	expect(resolveDeletionMode({force: true, apply: true}, true)).toEqual({
		ok: true,
		mode: 'force',
	});
	expect(resolveDeletionMode({}, true)).toEqual({ok: true, mode: 'safe'});
});

test('resolveDeletionMode refuses force without apply in safe mode', () => {
	const resolution = resolveDeletionMode({force: true}, true);

	expect(resolution.ok).toBe(false);
	if (resolution.ok) return;
	expect(resolution.message).toContain('--apply');
});

test('runScanCommand lists artifacts and writes a scan report', async () => {
	const {base, root, context, stdout} = await createWorkspace();

	const outcome = await runScanCommand(context);

	expect(outcome.result.artifacts).toHaveLength(2);
	expect(stdout).toEqual([
		`  2.0 KB  ${'build.caches'.padEnd(34)} ${path.join('a', 'x.cache')}\n`,
		`  1.0 KB  ${'build.caches'.padEnd(34)} ${path.join('b', 'y.cache')}\n`,
		'\nTotal: 0.00 MB in 2 artifacts across 1 categories\n',
	]);
	const reports = await fs.readdir(path.join(base, 'reports'));
	expect(reports).toHaveLength(1);
	expect(reports[0]).toMatch(/^scan_report_\d+\.json$/);
	expect(await exists(path.join(root, 'a', 'x.cache'))).toBe(true);
});

test('runScanCommand prints JSON when asked', async () => {
	const {root, context, stdout} = await createWorkspace();

	await runScanCommand(context, {json: true});

	const output: unknown = JSON.parse(stdout.join(''));
	expect(output).toMatchObject({
		root,
		report: {summary: {totalArtifacts: 2, uniqueCategories: 1}},
		duplicates: {},
	});
});

test('runCleanCommand in dry-run deletes nothing and writes no manifest', async () => {
	const {base, root, context, stdout} = await createWorkspace();

	const outcome = await runCleanCommand(context, 'dry-run');

	expect(outcome.metrics.successfulDeletions).toBe(2);
	expect(outcome.manifestPath).toBeUndefined();
	expect(stdout).toEqual(['Dry-run: would delete 2 artifacts (0.00 MB).\n']);
	expect(await exists(path.join(root, 'a', 'x.cache'))).toBe(true);
	expect(await exists(path.join(base, 'manifests'))).toBe(false);
});

test('runCleanCommand in force mode deletes artifacts and records a manifest', async () => {
	const {root, context, stdout, stderr} = await createWorkspace();

	const outcome = await runCleanCommand(context, 'force');

	expect(outcome.metrics).toMatchObject({
		totalOperations: 2,
		successfulDeletions: 2,
		failedDeletions: 0,
	});
	expect(stdout).toEqual(['Deleted 2/2 artifacts. Freed 0.00 MB.\n']);
	expect(stderr).toEqual([]);
	expect(await exists(path.join(root, 'a', 'x.cache'))).toBe(false);
	expect(await exists(path.join(root, 'b', 'y.cache'))).toBe(false);
	expect(await exists(path.join(root, 'b', 'notes.txt'))).toBe(true);

	expect(outcome.manifestPath).toBeDefined();
	const manifest: unknown = JSON.parse(
		await fs.readFile(outcome.manifestPath ?? '', 'utf8'),
	);
	expect(manifest).toMatchObject({
		deletions: [
			{success: true, mode: 'force'},
			{success: true, mode: 'force'},
		],
	});
});

test('runCleanCommand reports when there is nothing to clean', async () => {
	const {root, context, stdout} = await createWorkspace();
	await fs.rm(path.join(root, 'a', 'x.cache'));
	await fs.rm(path.join(root, 'b', 'y.cache'));

	const outcome = await runCleanCommand(context, 'force');

	expect(outcome.results).toEqual([]);
	expect(outcome.manifestPath).toBeUndefined();
	expect(stdout).toEqual(['Nothing to clean.\n']);
});
