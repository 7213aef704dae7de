#!/usr/bin/env node

import path from 'node:path';
import process from 'node:process';
import meow from 'meow';
import {
	resolveDeletionMode,
	runCleanCommand,
	runScanCommand,
} from './commands.js';
import type {CommandContext} from './commands.js';
import {loadConfig, parseSizeThreshold} from './core/config.js';
import {ConfigError, PatternCatalogError, toErrorMessage} from './core/errors.js';
import {Logger, levelFromFlags} from './core/logger.js';
import {expandHome} from './core/paths.js';
import {loadPatternCatalog} from './core/patterns.js';
import {runInteractiveClean} from './index.js';

const cli = meow(
	`
	Usage
	  $ devpurge --scan [options]
	  $ devpurge --clean [options]

	Description
	  Find development artifacts (dependency folders, build caches, virtual
	  environments, log files) and delete the ones that pass the safety checks.

	Commands
	  --scan          List artifacts and write a scan report
	  --clean         Delete artifacts (safe mode unless another mode is given)

	Modes (highest wins)
	  --dry-run       Measure only; nothing is deleted
	  --interactive   Confirm every artifact
	  --force         Delete without confirmation (needs --apply in safe mode)
	  --apply         Allow --force while safeMode is enabled

	Options
	  --target=<path>     Directory to scan (default: home directory)
	  --threshold=<size>  Minimum artifact size, e.g. 500KB, 10MB, 1.5GB
	  --config=<path>     Extra config file, merged over .devpurgerc.json
	  --patterns=<path>   Pattern catalog (default: bundled patterns.json)
	  --json              Print machine-readable output
	  --verbose, -v       Debug logging
	  --quiet, -q         Only warnings and errors

	Examples
	  $ devpurge --scan --target=~/dev
	  $ devpurge --clean --dry-run --threshold=50MB
	  $ devpurge --clean --interactive
	  $ devpurge --clean --force --apply --target=~/dev/old-projects
	`,
	{
		importMeta: import.meta,
		flags: {
			scan: {type: 'boolean', default: false},
			clean: {type: 'boolean', default: false},
			dryRun: {type: 'boolean', default: false},
			interactive: {type: 'boolean', default: false},
			force: {type: 'boolean', default: false},
			apply: {type: 'boolean', default: false},
			json: {type: 'boolean', default: false},
			config: {type: 'string'},
			patterns: {type: 'string'},
			target: {type: 'string'},
			threshold: {type: 'string'},
			verbose: {type: 'boolean', shortFlag: 'v', default: false},
			quiet: {type: 'boolean', shortFlag: 'q', default: false},
		},
	},
);

const fail = (message: string): void => {
	process.stderr.write(`${message}\n`);
	process.exitCode = 1;
};

const buildContext = async (): Promise<CommandContext> => {
	const config = await loadConfig({configPath: cli.flags.config});
	if (cli.flags.target) {
		config.target = path.resolve(expandHome(cli.flags.target));
	}

	const catalog = await loadPatternCatalog(
		cli.flags.patterns ? path.resolve(expandHome(cli.flags.patterns)) : undefined,
	);
	const thresholdMb = parseSizeThreshold(
		cli.flags.threshold ?? config.minimumSize,
	);

	// JSON goes to stdout, so log lines move to stderr.
	const logger = new Logger({
		level: levelFromFlags({
			verbose: cli.flags.verbose,
			quiet: cli.flags.quiet,
			fallback: config.logLevel,
		}),
		logPath: config.logPath,
		stdout: cli.flags.json ? process.stderr : process.stdout,
	});

	return {
		config,
		catalog,
		logger,
		stdout: process.stdout,
		stderr: process.stderr,
		thresholdMb,
	};
};

const main = async (): Promise<void> => {
	if (cli.flags.scan === cli.flags.clean) {
		fail('Pass exactly one of --scan or --clean. See --help.');
		return;
	}

	let context: CommandContext;
	try {
		context = await buildContext();
	} catch (error) {
		if (error instanceof ConfigError || error instanceof PatternCatalogError) {
			fail(error.message);
			return;
		}

		throw error;
	}

	if (cli.flags.scan) {
		await runScanCommand(context, {json: cli.flags.json});
		return;
	}

	const resolution = resolveDeletionMode(cli.flags, context.config.safeMode);
	if (!resolution.ok) {
		fail(resolution.message);
		return;
	}

	const {mode} = resolution;
	const needsPrompts = mode === 'interactive' || mode === 'safe';
	const outcome =
		needsPrompts && process.stdin.isTTY && !cli.flags.json
			? await runInteractiveClean(context, mode)
			: await runCleanCommand(context, mode, {json: cli.flags.json});

	if (outcome && outcome.metrics.failedDeletions > 0) {
		process.exitCode = 1;
	}
};

try {
	await main();
} catch (error) {
	fail(`devpurge failed: ${toErrorMessage(error)}`);
}
