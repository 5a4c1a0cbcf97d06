/**
 * Store initialization: engine selection, schema marker, feature declaration
 * and default seeding.
 */

import { CantCreateDatabaseError, ConfigError } from './errors.js';
import { FeatureRegistry, type FeatureDefinition } from './features.js';
import { CLOCK_KEY, SCHEMA_KEY } from './key-builder.js';
import type { KVStore, KVStoreFactory } from './kv-store.js';
import { createLogger } from './logger.js';
import { openInMemoryKVStore } from './memory-store.js';
import { SCHEMA_VERSION, deserializeClock, serializeSchema } from './record.js';
import { Store } from './store.js';
import type { Value } from './value-codec.js';

const log = createLogger('init');

/** Path that selects the in-memory engine. */
export const MEMORY_PATH = ':memory:';

export interface InitOptions {
	/** Engine location. Default ':memory:'. */
	path?: string;
	/** Already opened engine; takes precedence over `path` and `factory`. */
	engine?: KVStore;
	/** Opens the engine at `path`. */
	factory?: KVStoreFactory;
	/** Passed to the factory. Default: true. */
	createIfMissing?: boolean;
	/** Seeded only where the key is absent. */
	defaults?: Readonly<Record<string, Value>> | Iterable<readonly [string, Value]>;
	/** Accept an engine that already holds a schema. Default: false. */
	ignoreExisting?: boolean;
	features?: readonly FeatureDefinition[];
}

type Defaults = NonNullable<InitOptions['defaults']>;

function isEntryIterable(defaults: Defaults): defaults is Iterable<readonly [string, Value]> {
	return Symbol.iterator in defaults;
}

function defaultEntries(defaults: InitOptions['defaults']): Iterable<readonly [string, Value]> {
	if (!defaults) return [];
	return isEntryIterable(defaults) ? defaults : Object.entries(defaults);
}

async function openEngine(options: InitOptions): Promise<KVStore> {
	if (options.engine) {
		return options.engine;
	}
	const path = options.path ?? MEMORY_PATH;
	if (options.factory) {
		return options.factory({ path, createIfMissing: options.createIfMissing ?? true });
	}
	if (path === MEMORY_PATH) {
		return openInMemoryKVStore({ path });
	}
	throw new ConfigError(`No engine factory given for path '${path}'`);
}

/**
 * Open a store.
 *
 * @throws CantCreateDatabaseError when the engine already holds a schema and `ignoreExisting` is false
 * @throws FeatureNotFoundError when a feature declaration is invalid
 */
export async function initStore(options: InitOptions = {}): Promise<Store> {
	const engine = await openEngine(options);

	let store: Store;
	try {
		const registry = new FeatureRegistry(options.features);

		if (await engine.has(SCHEMA_KEY)) {
			if (!options.ignoreExisting) {
				throw new CantCreateDatabaseError(`Database already exists at '${options.path ?? MEMORY_PATH}'`);
			}
			log('reusing existing schema');
		}

		await engine.put(SCHEMA_KEY, serializeSchema({
			version: SCHEMA_VERSION,
			features: registry.list().map(({ name, type }) => ({ name, type })),
		}));

		const lastTimestamp = deserializeClock(await engine.get(CLOCK_KEY));
		store = new Store(engine, registry, lastTimestamp);
		log('opened with features [%s]', registry.names.join(', '));
	} catch (e) {
		await engine.close();
		throw e;
	}

	try {
		for (const [key, value] of defaultEntries(options.defaults)) {
			if (!(await store.has(key))) {
				await store.put(key, value);
			}
		}
	} catch (e) {
		await store.close();
		throw e;
	}

	return store;
}
