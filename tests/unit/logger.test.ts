import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import {expect, test} from 'vitest';
import {Logger, levelFromFlags} from '../../src/core/logger.js';
import type {LoggerOptions} from '../../src/core/logger.js';
import {createPatternCatalog} from '../../src/core/patterns.js';
import type {DestructionMetrics} from '../../src/core/types.js';

const FIXED_NOW = new Date('2026-01-02T03:04:05.000Z');

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

const createTestLogger = (options: LoggerOptions = {}) => {
	const stdout = createSink();
	const stderr = createSink();
	const logger = new Logger({
		stdout,
		stderr,
		color: false,
		now: () => FIXED_NOW,
		...options,
	});
	return {logger, stdout: stdout.lines, stderr: stderr.lines};
};

const metrics: DestructionMetrics = {
	totalOperations: 3,
	successfulDeletions: 2,
	failedDeletions: 1,
	totalFreedMb: 4,
	totalFreedGb: 0,
	averageDurationMs: 12,
	errors: [{path: '/work/c', error: 'busy'}],
};

test('levelFromFlags prefers verbose, then quiet, then the configured level', () => {
	expect(levelFromFlags({verbose: true, quiet: true})).toBe('debug');
	expect(levelFromFlags({quiet: true})).toBe('warn');
	expect(levelFromFlags({fallback: 'error'})).toBe('error');
	expect(levelFromFlags({})).toBe('info');
});

test('levelled output goes to stdout or stderr and respects the threshold', () => {
	const {logger, stdout, stderr} = createTestLogger();

	logger.debug('hidden');
	logger.info('hello');
	logger.success('done');
	logger.warn('careful');
	logger.error('broken');

	expect(stdout).toEqual(['[INFO] hello\n', '[SUCCESS] done\n']);
	expect(stderr).toEqual(['[WARN] careful\n', '[ERROR] broken\n']);
});

test('quiet loggers drop info lines but keep warnings', () => {
	const {logger, stdout, stderr} = createTestLogger({level: 'warn'});

	logger.info('hello');
	logger.logDeletion('/work/a', 1, false);
	logger.warn('careful');

	expect(stdout).toEqual([]);
	expect(stderr).toEqual(['[WARN] careful\n']);
});

test('core events are logged and recorded in the audit trail', async () => {
	const {logger, stdout, stderr} = createTestLogger({level: 'debug'});
	const catalog = createPatternCatalog({build: {caches: ['*.cache', 'dist']}});

	logger.logScanStart('/work', catalog);
	logger.logWhitelistSkip('/work/keep');
	logger.logArtifactFound({
		path: '/work/a.cache',
		sizeBytes: 3 * 1024 * 1024,
		category: 'build.caches',
		pattern: '*.cache',
		depth: 0,
		inode: 1,
	});
	logger.logDeletion('/work/a.cache', 3, true);
	logger.logDeletion('/work/dist', 1.234, false);
	logger.logError(new Error('boom'), 'deletion of /work/x');

	expect(stdout).toEqual([
		'[INFO] Scanning /work against 2 patterns\n',
		'[DEBUG] Skipping whitelisted path /work/keep\n',
		'[DEBUG] Found build.caches artifact /work/a.cache (3.00 MB)\n',
		'[INFO] [DRY RUN] Would delete /work/a.cache (3.00 MB)\n',
		'[SUCCESS] Deleted /work/dist (1.23 MB)\n',
	]);
	expect(stderr).toEqual(['[ERROR] deletion of /work/x: boom\n']);

	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'devpurge-logger-'));
	const auditPath = await logger.exportAuditLog(path.join(directory, 'audit.json'));
	const timestamp = FIXED_NOW.toISOString();
	expect(JSON.parse(await fs.readFile(auditPath, 'utf8'))).toHaveProperty('entries', [
		{timestamp, event: 'scan_start', path: '/work'},
		{timestamp, event: 'artifact_found', path: '/work/a.cache', sizeMb: 3},
		{timestamp, event: 'simulated_deletion', path: '/work/a.cache', sizeMb: 3},
		{timestamp, event: 'deletion', path: '/work/dist', sizeMb: 1.23},
		{timestamp, event: 'error', message: 'deletion of /work/x: boom'},
	]);
});

test('logSummary reports totals and failures', () => {
	const {logger, stdout, stderr} = createTestLogger();

	logger.logSummary(metrics);

	expect(stdout).toEqual(['[INFO] Deleted 2/3 artifacts, freed 4.00 MB\n']);
	expect(stderr).toEqual(['[WARN] 1 deletions failed\n']);
});

test('the session id is derived from the start time', () => {
	expect(createTestLogger().logger.sessionId).toBe('20260102_030405');
});

test('log files receive plain lines and the audit log is exported beside them', async () => {
	const directory = await fs.mkdtemp(path.join(os.tmpdir(), 'devpurge-logger-'));
	const logPath = path.join(directory, 'logs', 'devpurge.log');
	const {logger} = createTestLogger({logPath, sessionId: 'test-session'});

	logger.info('hello');
	logger.logDeletion('/work/a', 2, false);
	logger.logSummary(metrics);
	const auditPath = await logger.exportAuditLog();

	expect(await fs.readFile(logPath, 'utf8')).toBe(
		[
			'2026-01-02T03:04:05.000Z INFO hello',
			'2026-01-02T03:04:05.000Z INFO Deleted /work/a (2.00 MB)',
			'2026-01-02T03:04:05.000Z INFO Deleted 2/3 artifacts, freed 4.00 MB',
			'2026-01-02T03:04:05.000Z WARN 1 deletions failed',
			'',
		].join('\n'),
	);
	expect(auditPath).toBe(
		path.join(directory, 'logs', 'devpurge_audit_test-session.json'),
	);
	expect(JSON.parse(await fs.readFile(auditPath, 'utf8'))).toEqual({
		sessionId: 'test-session',
		entries: [
			{
				timestamp: '2026-01-02T03:04:05.000Z',
				event: 'deletion',
				path: '/work/a',
				sizeMb: 2,
			},
		],
		summary: metrics,
	});
});
