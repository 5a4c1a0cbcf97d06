/**
 * LevelDB engine for Keyspan stores, over classic-level.
 *
 * Keys and values cross the binding as raw bytes (`view` encodings); the
 * record, index and schema layout above them belongs to `@keyspan/store`.
 */

import { ClassicLevel, type IteratorOptions } from 'classic-level';
import { createLogger, type KVStore, type KVEntry, type WriteBatch, type IterateOptions, type KVStoreOptions } from '@keyspan/store';

const log = createLogger('leveldb');

type Database = ClassicLevel<Uint8Array, Uint8Array>;

type LevelBatchOp =
	| { type: 'put'; key: Uint8Array; value: Uint8Array }
	| { type: 'del'; key: Uint8Array };

/** Translate engine-neutral scan bounds; a negative limit means unbounded. */
function toIteratorOptions(options: IterateOptions = {}): IteratorOptions<Uint8Array, Uint8Array> {
	const { gte, gt, lte, lt, reverse, limit } = options;
	return {
		...(gte && { gte }),
		...(gt && { gt }),
		...(lte && { lte }),
		...(lt && { lt }),
		reverse: reverse ?? false,
		limit: limit !== undefined && limit >= 0 ? limit : -1,
	};
}

export class LevelDBStore implements KVStore {
	private readonly db: Database;
	private closed = false;

	private constructor(db: Database) {
		this.db = db;
	}

	/**
	 * Open (and optionally create) the database directory at `options.path`.
	 * classic-level holds a lock on it until `close()`.
	 */
	static async open(options: KVStoreOptions): Promise<LevelDBStore> {
		const db: Database = new ClassicLevel<Uint8Array, Uint8Array>(options.path, {
			keyEncoding: 'view',
			valueEncoding: 'view',
			createIfMissing: options.createIfMissing ?? true,
		});
		await db.open();
		log('opened %s', options.path);
		return new LevelDBStore(db);
	}

	async get(key: Uint8Array): Promise<Uint8Array | undefined> {
		this.checkOpen();
		return this.db.get(key);
	}

	async has(key: Uint8Array): Promise<boolean> {
		return (await this.get(key)) !== undefined;
	}

	async put(key: Uint8Array, value: Uint8Array): Promise<void> {
		this.checkOpen();
		await this.db.put(key, value);
	}

	async delete(key: Uint8Array): Promise<void> {
		this.checkOpen();
		await this.db.del(key);
	}

	/**
	 * Cursor over a key range. The native iterator is released when the loop
	 * ends, including on `break`.
	 */
	async *iterate(options?: IterateOptions): AsyncIterable<KVEntry> {
		this.checkOpen();
		const iterator = this.db.iterator(toIteratorOptions(options));
		try {
			for await (const [key, value] of iterator) {
				yield { key, value };
			}
		} finally {
			await iterator.close();
		}
	}

	/**
	 * Inserts write a record, its creation-order index entry and the clock
	 * through one batch, so they land together or not at all.
	 */
	batch(): WriteBatch {
		this.checkOpen();
		return new LevelDBWriteBatch(this.db);
	}

	async close(): Promise<void> {
		if (this.closed) return;
		this.closed = true;
		await this.db.close();
		log('closed %s', this.db.location);
	}

	private checkOpen(): void {
		if (this.closed) {
			throw new Error(`LevelDBStore at ${this.db.location} is closed`);
		}
	}
}

/** Queues operations for a single `db.batch()` call. */
class LevelDBWriteBatch implements WriteBatch {
	private ops: LevelBatchOp[] = [];

	constructor(private readonly db: Database) {}

	put(key: Uint8Array, value: Uint8Array): void {
		this.ops.push({ type: 'put', key, value });
	}

	delete(key: Uint8Array): void {
		this.ops.push({ type: 'del', key });
	}

	async write(): Promise<void> {
		if (this.ops.length === 0) return;
		const ops = this.ops;
		this.ops = [];
		await this.db.batch(ops);
	}

	clear(): void {
		this.ops = [];
	}
}
