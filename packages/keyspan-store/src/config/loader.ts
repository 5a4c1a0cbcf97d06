/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { ConfigError } from '../common/errors.js';
import { createLogger, enableLogging } from '../common/logger.js';
import {
	type KeyspanConfig,
	type PartialKeyspanConfig,
	DEFAULT_CONFIG,
} from './types.js';

const configLog = createLogger('config');

/** Config file looked up in the working directory when none is named. */
export const DEFAULT_CONFIG_FILE = 'keyspan.json';

export type Environment = Readonly<Record<string, string | undefined>>;

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readOptional<T>(
	source: Record<string, unknown>,
	field: string,
	check: (value: unknown) => value is T,
	expected: string
): T | undefined {
	const value = source[field];
	if (value === undefined) return undefined;
	if (!check(value)) {
		throw new ConfigError(`Config field '${field}' must be ${expected}`);
	}
	return value;
}

const isString = (value: unknown): value is string => typeof value === 'string';
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean';

/**
 * Validate parsed JSON as a partial configuration.
 */
export function parseConfig(parsed: unknown): PartialKeyspanConfig {
	if (!isRecord(parsed)) {
		throw new ConfigError('Config must be a JSON object');
	}

	const config: PartialKeyspanConfig = {};
	const path = readOptional(parsed, 'path', isString, 'a string');
	if (path !== undefined) config.path = path;
	const ignoreExisting = readOptional(parsed, 'ignoreExisting', isBoolean, 'a boolean');
	if (ignoreExisting !== undefined) config.ignoreExisting = ignoreExisting;
	const createIfMissing = readOptional(parsed, 'createIfMissing', isBoolean, 'a boolean');
	if (createIfMissing !== undefined) config.createIfMissing = createIfMissing;

	const logging = readOptional(parsed, 'logging', isRecord, 'an object');
	if (logging) {
		const namespaces = readOptional(logging, 'namespaces', isString, 'a string');
		config.logging = namespaces !== undefined ? { namespaces } : {};
	}
	return config;
}

/**
 * Load configuration from a JSON file.
 * @throws ConfigError when the file is missing or invalid
 */
export function loadConfigFile(configPath: string): PartialKeyspanConfig {
	const resolved = resolve(configPath);
	if (!existsSync(resolved)) {
		throw new ConfigError(`Config file not found: ${resolved}`);
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
	} catch (err) {
		configLog('Failed to parse config file %s: %O', resolved, err);
		throw new ConfigError(`Failed to parse config file: ${resolved}`, err instanceof Error ? err : undefined);
	}

	const config = parseConfig(parsed);
	configLog('Loaded config from %s', resolved);
	return config;
}

function parseFlag(name: string, raw: string): boolean {
	if (raw === 'true' || raw === '1') return true;
	if (raw === 'false' || raw === '0') return false;
	throw new ConfigError(`Environment variable ${name} must be true or false, got '${raw}'`);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: Environment = process.env): PartialKeyspanConfig {
	const config: PartialKeyspanConfig = {};

	if (env.KEYSPAN_PATH) {
		config.path = env.KEYSPAN_PATH;
	}
	if (env.KEYSPAN_IGNORE_EXISTING) {
		config.ignoreExisting = parseFlag('KEYSPAN_IGNORE_EXISTING', env.KEYSPAN_IGNORE_EXISTING);
	}
	if (env.KEYSPAN_CREATE_IF_MISSING) {
		config.createIfMissing = parseFlag('KEYSPAN_CREATE_IF_MISSING', env.KEYSPAN_CREATE_IF_MISSING);
	}
	if (env.KEYSPAN_DEBUG) {
		config.logging = { namespaces: env.KEYSPAN_DEBUG };
	}

	return config;
}

/**
 * Merge configuration objects; later overrides win.
 */
export function mergeConfig(
	base: KeyspanConfig,
	...overrides: PartialKeyspanConfig[]
): KeyspanConfig {
	const result: KeyspanConfig = { ...base, logging: { ...base.logging } };

	for (const override of overrides) {
		if (override.path !== undefined) result.path = override.path;
		if (override.ignoreExisting !== undefined) result.ignoreExisting = override.ignoreExisting;
		if (override.createIfMissing !== undefined) result.createIfMissing = override.createIfMissing;
		if (override.logging) {
			result.logging = { ...result.logging, ...override.logging };
		}
	}

	return result;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
	configPath?: string;
	overrides?: PartialKeyspanConfig;
	env?: Environment;
} = {}): KeyspanConfig {
	const sources: PartialKeyspanConfig[] = [];

	if (options.configPath) {
		sources.push(loadConfigFile(options.configPath));
	} else if (existsSync(DEFAULT_CONFIG_FILE)) {
		sources.push(loadConfigFile(DEFAULT_CONFIG_FILE));
	}

	sources.push(loadEnvConfig(options.env));

	if (options.overrides) {
		sources.push(options.overrides);
	}

	return mergeConfig(DEFAULT_CONFIG, ...sources);
}

/**
 * Enable the configured debug namespaces, if any.
 */
export function applyLoggingConfig(config: KeyspanConfig): void {
	if (config.logging.namespaces) {
		enableLogging(config.logging.namespaces);
	}
}
