/**
 * Common building blocks of the store.
 */

// Engine contract and in-memory engine
export type {
	KVStore,
	KVEntry,
	WriteBatch,
	IterateOptions,
	KVStoreFactory,
	KVStoreOptions,
} from './kv-store.js';
export { InMemoryKVStore, openInMemoryKVStore } from './memory-store.js';

// Errors and logging
export { StatusCode } from './types.js';
export {
	KeyspanError,
	NotInitializedError,
	CantCreateDatabaseError,
	NoOperationsError,
	FeatureNotFoundError,
	KeyNotFoundError,
	ConfigError,
} from './errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './logger.js';

// Values and features
export {
	classifyValue,
	encodeValue,
	decodeValue,
	encodeTagged,
	integerValue,
	textValue,
	documentValue,
	type Value,
	type TaggedValue,
	type JsonValue,
	type JsonObject,
	type JsonArray,
	type JsonPrimitive,
} from './value-codec.js';
export {
	FeatureRegistry,
	type FeatureDefinition,
	type FeatureType,
	type FeatureValue,
	type FeatureAssignments,
	type FeatureBag,
	type StoredFeatureValue,
} from './features.js';

// Store, scans and namespaces
export { Store, type Entry } from './store.js';
export { Op, resolveOperator, type OperatorInput, type KeyValue } from './range-scan.js';
export { NamespaceProxy, type NamespaceKey } from './namespace.js';
export { initStore, MEMORY_PATH, type InitOptions } from './init.js';
export { StoreEventEmitter, type DataChangeEvent, type DataChangeListener } from './events.js';
