import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import process from 'node:process';
import {ConfigError, toErrorMessage} from './errors.js';
import {expandHome} from './paths.js';
import {DEFAULT_PARALLEL_OPERATIONS} from './delete.js';
import {DEFAULT_MAX_DEPTH, DEFAULT_PARALLEL_WORKERS} from './scanner.js';
import type {LogLevel, PurgeConfig} from './types.js';

export const CONFIG_FILE_NAME = '.devpurgerc.json';
export const MAX_SIZE_THRESHOLD_MB = 1_048_576;

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];
const MAX_WORKERS = 64;

const SIZE_PATTERN = /^([0-9]+(?:\.[0-9]+)?)(kb|mb|gb|tb)?$/i;
const UNIT_FACTORS: Record<string, number> = {
	kb: 1 / 1024,
	mb: 1,
	gb: 1024,
	tb: 1024 * 1024,
};

export const createDefaultConfig = (
	homeDirectory = os.homedir(),
): PurgeConfig => ({
	target: homeDirectory,
	whitelistPaths: [],
	followSymlinks: false,
	maxWorkers: DEFAULT_PARALLEL_WORKERS,
	parallelOperations: DEFAULT_PARALLEL_OPERATIONS,
	safeMode: true,
	minimumSize: '1MB',
	maxDepth: DEFAULT_MAX_DEPTH,
	logLevel: 'info',
	reportDirectory: homeDirectory,
	manifestDirectory: homeDirectory,
});

/**
 * Parse a size such as `500MB`, `1.5GB` or `250` (megabytes) into megabytes.
 * Blank input means no threshold.
 */
export const parseSizeThreshold = (value: string): number => {
	const trimmed = value.trim();
	if (!trimmed) return 0;

	const match = SIZE_PATTERN.exec(trimmed);
	const amount = match?.[1];
	if (!match || amount === undefined) {
		throw new ConfigError(`Invalid size threshold: "${value}"`);
	}

	const factor = UNIT_FACTORS[(match[2] ?? 'mb').toLowerCase()] ?? 1;
	const megabytes = Number(amount) * factor;
	if (
		!Number.isFinite(megabytes) ||
		megabytes < 0 ||
		megabytes > MAX_SIZE_THRESHOLD_MB
	) {
		throw new ConfigError(
			`Size threshold "${value}" is out of bounds (0 to ${MAX_SIZE_THRESHOLD_MB} MB)`,
		);
	}

	return megabytes;
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
	Boolean(value) && typeof value === 'object' && !Array.isArray(value);

const parseBoolean = (value: unknown, fallback: boolean): boolean =>
	typeof value === 'boolean' ? value : fallback;

const parseString = (value: unknown, fallback: string): string =>
	typeof value === 'string' && value.trim() ? value.trim() : fallback;

const parseInteger = (
	value: unknown,
	fallback: number,
	{min, max}: {min: number; max: number},
): number =>
	typeof value === 'number' &&
	Number.isInteger(value) &&
	value >= min &&
	value <= max
		? value
		: fallback;

const isLogLevel = (value: unknown): value is LogLevel =>
	LOG_LEVELS.some(level => level === value);

const parseLogLevel = (value: unknown, fallback: LogLevel): LogLevel =>
	isLogLevel(value) ? value : fallback;

const parseSize = (value: unknown, fallback: string): string => {
	if (typeof value !== 'string') return fallback;
	try {
		parseSizeThreshold(value);
		return value.trim();
	} catch {
		return fallback;
	}
};

export interface NormalizeConfigOptions {
	homeDirectory?: string;
	/** Base for relative paths in the config. */
	cwd?: string;
}

export const normalizeConfig = (
	value: unknown,
	{homeDirectory = os.homedir(), cwd = process.cwd()}: NormalizeConfigOptions = {},
): PurgeConfig => {
	const raw = isRecord(value) ? value : {};
	const defaults = createDefaultConfig(homeDirectory);
	const resolvePath = (entry: string): string =>
		path.resolve(cwd, expandHome(entry.trim(), homeDirectory));
	const resolveDirectory = (entry: unknown, fallback: string): string =>
		resolvePath(parseString(entry, fallback));

	const whitelistPaths = new Set<string>();
	if (Array.isArray(raw.whitelistPaths)) {
		for (const entry of raw.whitelistPaths) {
			if (typeof entry === 'string' && entry.trim()) {
				whitelistPaths.add(resolvePath(entry));
			}
		}
	}

	const logPath =
		typeof raw.logPath === 'string' && raw.logPath.trim()
			? resolvePath(raw.logPath)
			: undefined;

	return {
		target: resolveDirectory(raw.target, defaults.target),
		whitelistPaths: [...whitelistPaths],
		followSymlinks: parseBoolean(raw.followSymlinks, defaults.followSymlinks),
		maxWorkers: parseInteger(raw.maxWorkers, defaults.maxWorkers, {
			min: 1,
			max: MAX_WORKERS,
		}),
		parallelOperations: parseInteger(
			raw.parallelOperations,
			defaults.parallelOperations,
			{min: 1, max: MAX_WORKERS},
		),
		safeMode: parseBoolean(raw.safeMode, defaults.safeMode),
		minimumSize: parseSize(raw.minimumSize, defaults.minimumSize),
		maxDepth: parseInteger(raw.maxDepth, defaults.maxDepth, {
			min: 0,
			max: 1024,
		}),
		...(logPath ? {logPath} : {}),
		logLevel: parseLogLevel(raw.logLevel, defaults.logLevel),
		reportDirectory: resolveDirectory(
			raw.reportDirectory,
			defaults.reportDirectory,
		),
		manifestDirectory: resolveDirectory(
			raw.manifestDirectory,
			defaults.manifestDirectory,
		),
	};
};

const readOptionalJson = async (
	filePath: string,
): Promise<Record<string, unknown>> => {
	try {
		const parsed: unknown = JSON.parse(await fs.readFile(filePath, 'utf8'));
		return isRecord(parsed) ? parsed : {};
	} catch {
		return {};
	}
};

const readRequiredJson = async (
	filePath: string,
): Promise<Record<string, unknown>> => {
	let parsed: unknown;
	try {
		parsed = JSON.parse(await fs.readFile(filePath, 'utf8'));
	} catch (error) {
		throw new ConfigError(
			`Cannot load config ${filePath}: ${toErrorMessage(error)}`,
		);
	}

	if (!isRecord(parsed)) {
		throw new ConfigError(`Config ${filePath} must contain a JSON object`);
	}

	return parsed;
};

export interface LoadConfigOptions {
	cwd?: string;
	homeDirectory?: string;
	/** Explicit config file; unlike the rc files it must exist and parse. */
	configPath?: string;
}

export const loadConfig = async ({
	cwd = process.cwd(),
	homeDirectory = os.homedir(),
	configPath,
}: LoadConfigOptions = {}): Promise<PurgeConfig> => {
	const homeConfig = await readOptionalJson(
		path.join(homeDirectory, CONFIG_FILE_NAME),
	);
	const projectConfig =
		path.resolve(cwd) === path.resolve(homeDirectory)
			? {}
			: await readOptionalJson(path.join(cwd, CONFIG_FILE_NAME));
	const explicitConfig = configPath
		? await readRequiredJson(path.resolve(cwd, expandHome(configPath, homeDirectory)))
		: {};

	return normalizeConfig(
		{...homeConfig, ...projectConfig, ...explicitConfig},
		{homeDirectory, cwd},
	);
};
