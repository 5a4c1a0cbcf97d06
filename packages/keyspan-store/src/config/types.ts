/**
 * Configuration types for opening a store.
 */

/**
 * Logging configuration.
 */
export interface LoggingConfig {
	/** Debug namespace filter (e.g., 'keyspan:*'). Unset leaves DEBUG untouched. */
	namespaces?: string;
}

export interface KeyspanConfig {
	/** Engine location: a LevelDB directory, or ':memory:'. */
	path: string;
	/** Open an engine that already holds a schema instead of failing. */
	ignoreExisting: boolean;
	/** Create the engine's storage when it doesn't exist. */
	createIfMissing: boolean;
	logging: LoggingConfig;
}

/**
 * Partial configuration for overrides and per-source loading.
 */
export interface PartialKeyspanConfig {
	path?: string;
	ignoreExisting?: boolean;
	createIfMissing?: boolean;
	logging?: Partial<LoggingConfig>;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: KeyspanConfig = {
	path: ':memory:',
	ignoreExisting: false,
	createIfMissing: true,
	logging: {},
};
