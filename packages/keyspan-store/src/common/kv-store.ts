/**
 * Persistence engine contract.
 * Implemented by InMemoryKVStore (here) and LevelDBStore (@keyspan/store-leveldb).
 */

/**
 * Options for iterating over key-value pairs.
 * At most one lower bound (gt/gte) and one upper bound (lt/lte) may be given.
 */
export interface IterateOptions {
	/** Start key (inclusive). If omitted, starts from beginning. */
	gte?: Uint8Array;
	/** Start key (exclusive). */
	gt?: Uint8Array;
	/** End key (inclusive). */
	lte?: Uint8Array;
	/** End key (exclusive). If omitted, iterates to end. */
	lt?: Uint8Array;
	/** Iterate in reverse order. */
	reverse?: boolean;
	/** Maximum number of entries to return. */
	limit?: number;
}

/**
 * A key-value pair from iteration.
 */
export interface KVEntry {
	key: Uint8Array;
	value: Uint8Array;
}

/**
 * Write batch for atomic operations.
 */
export interface WriteBatch {
	/** Queue a put operation. */
	put(key: Uint8Array, value: Uint8Array): void;
	/** Queue a delete operation. */
	delete(key: Uint8Array): void;
	/** Execute all queued operations atomically. */
	write(): Promise<void>;
	/** Discard all queued operations. */
	clear(): void;
}

/**
 * Sorted key-value storage with range iteration.
 * Keys are compared lexicographically by bytes.
 */
export interface KVStore {
	/**
	 * Get a value by key.
	 * @returns The value, or undefined if not found.
	 */
	get(key: Uint8Array): Promise<Uint8Array | undefined>;

	put(key: Uint8Array, value: Uint8Array): Promise<void>;

	delete(key: Uint8Array): Promise<void>;

	has(key: Uint8Array): Promise<boolean>;

	/**
	 * Iterate over key-value pairs in sorted order.
	 * The underlying cursor is released when iteration completes or is abandoned
	 * through `return()`.
	 */
	iterate(options?: IterateOptions): AsyncIterable<KVEntry>;

	/**
	 * Create a write batch for atomic operations.
	 */
	batch(): WriteBatch;

	/**
	 * Close the store and release resources.
	 */
	close(): Promise<void>;
}

/**
 * Options for opening a KVStore.
 */
export interface KVStoreOptions {
	/** Storage path (LevelDB directory, or ':memory:'). */
	path: string;
	/** Create if doesn't exist. Default: true. */
	createIfMissing?: boolean;
}

/**
 * Factory function to open a KVStore.
 */
export type KVStoreFactory = (options: KVStoreOptions) => Promise<KVStore>;
