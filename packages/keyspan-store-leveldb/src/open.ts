/**
 * Open a Keyspan store on a LevelDB directory.
 */

import { mkdirSync } from 'node:fs';
import {
	applyLoggingConfig,
	initStore,
	loadConfig,
	type InitOptions,
	type KeyspanConfig,
	type Store,
} from '@keyspan/store';
import { LevelDBStore } from './store.js';

export interface LevelDBOpenOptions extends Omit<InitOptions, 'engine' | 'factory' | 'path'> {
	/** LevelDB directory. */
	path: string;
}

/**
 * Initialize a store backed by LevelDB at `options.path`.
 * Parent directories are created when `createIfMissing` is not false.
 */
export async function openLevelDBStore(options: LevelDBOpenOptions): Promise<Store> {
	const createIfMissing = options.createIfMissing ?? true;
	if (createIfMissing) {
		mkdirSync(options.path, { recursive: true });
	}
	return initStore({
		...options,
		createIfMissing,
		factory: engineOptions => LevelDBStore.open(engineOptions),
	});
}

/**
 * Initialize a store from loaded configuration. Features and defaults are not
 * part of the configuration and are passed separately.
 */
export async function openFromConfig(
	config: KeyspanConfig = loadConfig(),
	options: Pick<InitOptions, 'defaults' | 'features'> = {}
): Promise<Store> {
	applyLoggingConfig(config);
	if (config.path === ':memory:') {
		return initStore({ ...options, path: config.path, ignoreExisting: config.ignoreExisting });
	}
	return openLevelDBStore({
		...options,
		path: config.path,
		ignoreExisting: config.ignoreExisting,
		createIfMissing: config.createIfMissing,
	});
}
