/**
 * In-memory KVStore implementation.
 *
 * Backs ':memory:' stores and the test suites. Keys are stored using hex
 * encoding, which preserves byte ordering under string comparison.
 */

import type { KVStore, KVEntry, KVStoreFactory, WriteBatch, IterateOptions } from './kv-store.js';

/**
 * Convert Uint8Array to hex string for Map key storage.
 */
function keyToHex(key: Uint8Array): string {
	return Array.from(key).map(b => b.toString(16).padStart(2, '0')).join('');
}

type BatchOp =
	| { type: 'put'; key: Uint8Array; value: Uint8Array }
	| { type: 'delete'; key: Uint8Array };

/**
 * In-memory implementation of KVStore.
 * Uses a Map with hex-encoded keys for correct byte ordering.
 */
export class InMemoryKVStore implements KVStore {
	private data = new Map<string, KVEntry>();
	private closed = false;

	async get(key: Uint8Array): Promise<Uint8Array | undefined> {
		this.checkOpen();
		return this.data.get(keyToHex(key))?.value;
	}

	async put(key: Uint8Array, value: Uint8Array): Promise<void> {
		this.checkOpen();
		this.apply({ type: 'put', key, value });
	}

	async delete(key: Uint8Array): Promise<void> {
		this.checkOpen();
		this.apply({ type: 'delete', key });
	}

	async has(key: Uint8Array): Promise<boolean> {
		this.checkOpen();
		return this.data.has(keyToHex(key));
	}

	async *iterate(options?: IterateOptions): AsyncIterable<KVEntry> {
		this.checkOpen();

		// Snapshot at first pull, so writes during iteration don't disturb the order
		const entries = Array.from(this.data.entries())
			.sort((a, b) => (a[0] < b[0] ? -1 : a[0] > b[0] ? 1 : 0));

		if (options?.reverse) {
			entries.reverse();
		}

		const gteHex = options?.gte ? keyToHex(options.gte) : undefined;
		const gtHex = options?.gt ? keyToHex(options.gt) : undefined;
		const lteHex = options?.lte ? keyToHex(options.lte) : undefined;
		const ltHex = options?.lt ? keyToHex(options.lt) : undefined;

		let count = 0;
		const limit = options?.limit;

		for (const [keyHex, { key, value }] of entries) {
			if (limit !== undefined && limit >= 0 && count >= limit) break;
			if (gteHex !== undefined && keyHex < gteHex) continue;
			if (gtHex !== undefined && keyHex <= gtHex) continue;
			if (lteHex !== undefined && keyHex > lteHex) continue;
			if (ltHex !== undefined && keyHex >= ltHex) continue;

			yield { key, value };
			count++;
		}
	}

	batch(): WriteBatch {
		this.checkOpen();
		const ops: BatchOp[] = [];

		return {
			put: (key: Uint8Array, value: Uint8Array): void => {
				ops.push({ type: 'put', key, value });
			},
			delete: (key: Uint8Array): void => {
				ops.push({ type: 'delete', key });
			},
			write: async (): Promise<void> => {
				this.checkOpen();
				// Applied synchronously, so no reader observes a partial batch
				for (const op of ops) {
					this.apply(op);
				}
				ops.length = 0;
			},
			clear: (): void => {
				ops.length = 0;
			},
		};
	}

	async close(): Promise<void> {
		this.closed = true;
		this.data.clear();
	}

	/**
	 * Get the number of entries in the store.
	 */
	get size(): number {
		return this.data.size;
	}

	private apply(op: BatchOp): void {
		if (op.type === 'put') {
			// Store copies to prevent external mutation
			this.data.set(keyToHex(op.key), {
				key: new Uint8Array(op.key),
				value: new Uint8Array(op.value),
			});
		} else {
			this.data.delete(keyToHex(op.key));
		}
	}

	private checkOpen(): void {
		if (this.closed) {
			throw new Error('InMemoryKVStore is closed');
		}
	}
}

/**
 * Factory opening a fresh in-memory store. The path is ignored.
 */
export const openInMemoryKVStore: KVStoreFactory = async () => new InMemoryKVStore();
