export {
	createDefaultConfig,
	loadConfig,
	normalizeConfig,
	parseSizeThreshold,
} from './config.js';
export type {LoadConfigOptions} from './config.js';
export {
	createNuker,
	createUndoManifest,
	executeDeletion,
	getDestructionMetrics,
} from './delete.js';
export type {ExecuteDeletionOptions, Nuker, NukerOptions} from './delete.js';
export {
	ConfigError,
	ModifiedDuringDeletionError,
	PatternCatalogError,
	UnsafePathError,
	isModificationError,
} from './errors.js';
export {Logger, levelFromFlags} from './logger.js';
export type {AuditEntry, LoggerOptions, LogSink} from './logger.js';
export {
	createPatternCatalog,
	createPatternMatcher,
	loadPatternCatalog,
} from './patterns.js';
export {findDuplicates, generateReport, writeScanReport} from './report.js';
export {checkDeletionSafety, defaultProtectedPaths} from './safety.js';
export {createScanner, isWhitelistedPath} from './scanner.js';
export type {Scanner} from './scanner.js';
export type * from './types.js';
