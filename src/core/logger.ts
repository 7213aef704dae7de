import {appendFileSync, mkdirSync} from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import process from 'node:process';
import {Chalk} from 'chalk';
import type {ChalkInstance} from 'chalk';
import {toErrorMessage} from './errors.js';
import {formatMegabytes, roundTo, toMegabytes} from './format.js';
import {countPatterns} from './patterns.js';
import type {
	Artifact,
	DeletionLogger,
	DestructionMetrics,
	LogLevel,
	PatternCatalog,
	ScanLogger,
} from './types.js';

export interface LogSink {
	write(chunk: string): unknown;
}

export type AuditEvent =
	| 'scan_start'
	| 'artifact_found'
	| 'deletion'
	| 'simulated_deletion'
	| 'error';

export interface AuditEntry {
	timestamp: string;
	event: AuditEvent;
	path?: string;
	sizeMb?: number;
	message?: string;
}

export interface LoggerOptions {
	level?: LogLevel;
	/** Appends uncoloured lines here as well as writing to the terminal. */
	logPath?: string;
	stdout?: LogSink;
	stderr?: LogSink;
	color?: boolean;
	sessionId?: string;
	now?: () => Date;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export const levelFromFlags = ({
	verbose = false,
	quiet = false,
	fallback = 'info',
}: {verbose?: boolean; quiet?: boolean; fallback?: LogLevel}): LogLevel => {
	if (verbose) return 'debug';
	if (quiet) return 'warn';
	return fallback;
};

const toSessionId = (date: Date): string =>
	date.toISOString().replaceAll(/[-:]/g, '').replace('T', '_').slice(0, 15);

export class Logger implements ScanLogger, DeletionLogger {
	readonly sessionId: string;
	private readonly level: LogLevel;
	private readonly stdout: LogSink;
	private readonly stderr: LogSink;
	private readonly paint: ChalkInstance;
	private readonly now: () => Date;
	private logPath: string | undefined;
	private readonly entries: AuditEntry[] = [];
	private summary: DestructionMetrics | undefined;

	constructor({
		level = 'info',
		logPath,
		stdout = process.stdout,
		stderr = process.stderr,
		color,
		sessionId,
		now = () => new Date(),
	}: LoggerOptions = {}) {
		this.level = level;
		this.stdout = stdout;
		this.stderr = stderr;
		this.paint = color === undefined ? new Chalk() : new Chalk({level: color ? 1 : 0});
		this.now = now;
		this.sessionId = sessionId ?? toSessionId(now());
		this.logPath = logPath;

		if (logPath) {
			try {
				mkdirSync(path.dirname(logPath), {recursive: true});
			} catch (error) {
				this.disableFileLog(error);
			}
		}
	}

	debug(message: string): void {
		this.emit('debug', this.paint.gray(`[DEBUG] ${message}`), message);
	}

	info(message: string): void {
		this.emit('info', this.paint.blue(`[INFO] ${message}`), message);
	}

	success(message: string): void {
		this.emit('info', this.paint.green(`[SUCCESS] ${message}`), message);
	}

	warn(message: string): void {
		this.emit('warn', this.paint.yellow(`[WARN] ${message}`), message);
	}

	error(message: string): void {
		this.emit('error', this.paint.red(`[ERROR] ${message}`), message);
	}

	logError(error: unknown, context: string): void {
		const message = `${context}: ${toErrorMessage(error)}`;
		this.error(message);
		this.record({event: 'error', message});
	}

	logScanStart(targetPath: string, catalog: PatternCatalog): void {
		this.info(
			`Scanning ${targetPath} against ${countPatterns(catalog)} patterns`,
		);
		this.record({event: 'scan_start', path: targetPath});
	}

	logWhitelistSkip(targetPath: string): void {
		this.debug(`Skipping whitelisted path ${targetPath}`);
	}

	logArtifactFound(artifact: Artifact): void {
		const sizeMb = roundTo(toMegabytes(artifact.sizeBytes));
		this.debug(
			`Found ${artifact.category} artifact ${artifact.path} (${formatMegabytes(sizeMb)})`,
		);
		this.record({event: 'artifact_found', path: artifact.path, sizeMb});
	}

	logDeletion(targetPath: string, sizeMb: number, dryRun: boolean): void {
		const size = formatMegabytes(sizeMb);
		if (dryRun) {
			this.info(`[DRY RUN] Would delete ${targetPath} (${size})`);
		} else {
			this.success(`Deleted ${targetPath} (${size})`);
		}

		this.record({
			event: dryRun ? 'simulated_deletion' : 'deletion',
			path: targetPath,
			sizeMb: roundTo(sizeMb),
		});
	}

	logSummary(metrics: DestructionMetrics): void {
		this.summary = metrics;
		this.info(
			`Deleted ${metrics.successfulDeletions}/${metrics.totalOperations} artifacts, freed ${formatMegabytes(metrics.totalFreedMb)}`,
		);
		if (metrics.failedDeletions > 0) {
			this.warn(`${metrics.failedDeletions} deletions failed`);
		}
	}

	defaultAuditPath(): string {
		const directory = this.logPath ? path.dirname(this.logPath) : process.cwd();
		return path.join(directory, `devpurge_audit_${this.sessionId}.json`);
	}

	async exportAuditLog(targetPath = this.defaultAuditPath()): Promise<string> {
		const document = {
			sessionId: this.sessionId,
			entries: this.entries,
			summary: this.summary ?? null,
		};
		await fs.mkdir(path.dirname(targetPath), {recursive: true});
		await fs.writeFile(targetPath, `${JSON.stringify(document, null, 2)}\n`, {
			mode: 0o600,
		});
		return targetPath;
	}

	private record(entry: Omit<AuditEntry, 'timestamp'>): void {
		this.entries.push({timestamp: this.now().toISOString(), ...entry});
	}

	private emit(level: LogLevel, line: string, plain: string): void {
		if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

		const sink = LEVEL_ORDER[level] >= LEVEL_ORDER.warn ? this.stderr : this.stdout;
		sink.write(`${line}\n`);

		if (!this.logPath) return;
		try {
			appendFileSync(
				this.logPath,
				`${this.now().toISOString()} ${level.toUpperCase()} ${plain}\n`,
			);
		} catch (error) {
			this.disableFileLog(error);
		}
	}

	private disableFileLog(error: unknown): void {
		this.stderr.write(
			`${this.paint.yellow(`[WARN] Log file disabled: ${toErrorMessage(error)}`)}\n`,
		);
		this.logPath = undefined;
	}
}
