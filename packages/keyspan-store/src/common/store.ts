/**
 * Namespaced key-value store over a sorted KV engine.
 */

import { KeyNotFoundError, KeyspanError, NotInitializedError } from './errors.js';
import { StoreEventEmitter, type DataChangeListener } from './events.js';
import type { FeatureAssignments, FeatureBag, FeatureRegistry, FeatureValue } from './features.js';
import {
	CLOCK_KEY,
	buildDataKey,
	buildDataPrefixBounds,
	buildTimeKey,
	encodeText,
	parseDataKey,
} from './key-builder.js';
import type { KVStore } from './kv-store.js';
import { Latch } from './latches.js';
import { createLogger } from './logger.js';
import { NamespaceProxy } from './namespace.js';
import { resolveOperator, scanRange, type KeyValue, type OperatorInput } from './range-scan.js';
import { deserializeRecord, serializeClock, serializeRecord, type EntryRecord } from './record.js';
import { decodeValue, encodeValue, type Value } from './value-codec.js';

const log = createLogger('store');

/** A stored entry with its metadata. */
export interface Entry {
	key: string;
	value: Value;
	/** Creation timestamp; unchanged by overwrites. */
	timestamp: number;
	features: FeatureBag;
}

/**
 * Store over an opened engine. Use `initStore` (or `openLevelDBStore`) to
 * obtain one; the constructor trusts that the schema has been set up.
 */
export class Store {
	private engine: KVStore | undefined;
	private readonly registry: FeatureRegistry;
	private readonly events = new StoreEventEmitter();
	private readonly writeLatch = new Latch();
	private lastTimestamp: number;

	constructor(engine: KVStore, registry: FeatureRegistry, lastTimestamp: number) {
		this.engine = engine;
		this.registry = registry;
		this.lastTimestamp = lastTimestamp;
	}

	get isOpen(): boolean {
		return this.engine !== undefined;
	}

	/**
	 * Point lookup. Returns `defaultValue` when the key is absent.
	 */
	async get(key: string): Promise<Value | undefined>;
	async get<D>(key: string, defaultValue: D): Promise<Value | D>;
	async get<D>(key: string, defaultValue?: D): Promise<Value | D | undefined> {
		const record = await this.readRecord(this.requireOpen(), key);
		return record ? decodeValue(record.v) : defaultValue;
	}

	async has(key: string): Promise<boolean> {
		return this.requireOpen().has(buildDataKey(key));
	}

	/**
	 * Full entry, or undefined when the key is absent.
	 */
	async entry(key: string): Promise<Entry | undefined> {
		const record = await this.readRecord(this.requireOpen(), key);
		if (!record) return undefined;
		return {
			key,
			value: decodeValue(record.v),
			timestamp: record.t,
			features: this.registry.materialize(record.f),
		};
	}

	/**
	 * Insert or replace a value, optionally assigning features in the same write.
	 * With no value, only the given features of an existing entry are updated.
	 * @throws FeatureNotFoundError for undeclared features or mistyped values; nothing is written
	 */
	async put(key: string, value?: Value | null, features?: FeatureAssignments): Promise<void> {
		this.requireOpen();
		const assigned = features ? this.registry.toStoredAll(features) : {};
		const changedFeatures = Object.keys(assigned);
		const encoded = value === undefined || value === null ? undefined : encodeValue(value);

		if (encoded === undefined && changedFeatures.length === 0) {
			log('put %s: nothing to write', key);
			return;
		}

		await this.write(async engine => {
			const dataKey = buildDataKey(key);
			const existing = await this.readRecord(engine, key);
			const batch = engine.batch();

			if (existing) {
				batch.put(dataKey, serializeRecord({
					v: encoded ?? existing.v,
					t: existing.t,
					f: { ...existing.f, ...assigned },
				}));
				await batch.write();
				this.events.emitDataChange({ type: 'update', key, changedFeatures, valueChanged: encoded !== undefined });
				return;
			}

			if (encoded === undefined) {
				log('put %s: feature update on a missing key ignored', key);
				return;
			}

			const timestamp = Math.max(Date.now(), this.lastTimestamp + 1);
			batch.put(dataKey, serializeRecord({ v: encoded, t: timestamp, f: assigned }));
			batch.put(buildTimeKey(timestamp, key), encodeText(key));
			batch.put(CLOCK_KEY, serializeClock(timestamp));
			await batch.write();
			this.lastTimestamp = timestamp;
			this.events.emitDataChange({ type: 'insert', key, changedFeatures, valueChanged: true });
		});
	}

	/**
	 * Remove an entry. Removing an absent key is not an error.
	 */
	async delete(key: string): Promise<void> {
		this.requireOpen();
		await this.write(async engine => {
			const existing = await this.readRecord(engine, key);
			if (!existing) return;

			const batch = engine.batch();
			batch.delete(buildDataKey(key));
			batch.delete(buildTimeKey(existing.t, key));
			await batch.write();
			this.events.emitDataChange({ type: 'delete', key });
		});
	}

	/**
	 * Every declared feature of an entry, defaults included.
	 * @throws KeyNotFoundError when the key is absent
	 */
	async features(key: string): Promise<FeatureBag> {
		const record = await this.readRecord(this.requireOpen(), key);
		if (!record) {
			throw new KeyNotFoundError(key);
		}
		return this.registry.materialize(record.f);
	}

	/**
	 * Entries under `namespaceMask` whose feature equals `target`, in key order.
	 * Entries that never set the feature match its declared default.
	 * Errors (closed store, undeclared feature, mistyped target) surface on first iteration.
	 */
	async *select(
		feature: string,
		target: FeatureValue,
		namespaceMask = '',
		limit = -1
	): AsyncGenerator<KeyValue, void, undefined> {
		const engine = this.requireOpen();
		// Validates the feature name and the target's type
		this.registry.toStored(feature, target);
		if (limit === 0) return;

		log('select %s=%o mask=%s limit=%d', feature, target, namespaceMask, limit);
		let produced = 0;
		for await (const entry of this.whileOpen(engine.iterate(buildDataPrefixBounds(namespaceMask)))) {
			const record = deserializeRecord(entry.value);
			const stored = Object.hasOwn(record.f, feature) ? record.f[feature] : undefined;
			if (this.registry.fromStored(feature, stored) !== target) {
				continue;
			}
			yield [parseDataKey(entry.key), decodeValue(record.v)];
			if (++produced === limit) {
				return;
			}
		}
	}

	/**
	 * Range scan anchored on an existing entry.
	 *
	 * `<` and `<=` walk descending, `>` and `>=` ascending, comparing keys or,
	 * with `byTimestamp`, creation timestamps. Only keys starting with
	 * `namespaceMask` are returned. A negative limit is unbounded.
	 * Errors (closed store, bad operator, missing anchor) surface on first iteration.
	 */
	async *keys(
		op: OperatorInput,
		anchorKey: string,
		namespaceMask = '',
		byTimestamp = false,
		limit = -1
	): AsyncGenerator<KeyValue, void, undefined> {
		const engine = this.requireOpen();
		const operator = resolveOperator(op);
		const anchor = await this.readRecord(engine, anchorKey);
		if (!anchor) {
			throw new KeyNotFoundError(anchorKey);
		}
		yield* this.whileOpen(scanRange(engine, { op: operator, anchorKey, anchor, namespaceMask, byTimestamp, limit }));
	}

	/**
	 * Number of entries whose key starts with `namespaceMask`.
	 */
	async count(namespaceMask = ''): Promise<number> {
		let count = 0;
		for await (const _ of this.whileOpen(this.requireOpen().iterate(buildDataPrefixBounds(namespaceMask)))) {
			count++;
		}
		return count;
	}

	/**
	 * View of this store restricted to keys prefixed with `"<mask>:"`.
	 */
	namespace(mask: string): NamespaceProxy {
		return new NamespaceProxy(this, mask);
	}

	/**
	 * Subscribe to committed writes.
	 * @returns Unsubscribe function.
	 */
	onChange(listener: DataChangeListener): () => void {
		this.requireOpen();
		return this.events.onDataChange(listener);
	}

	/**
	 * Release the engine. Scans still in flight, and writes queued behind the
	 * write latch, fail with NotInitializedError on their next step.
	 */
	async close(): Promise<void> {
		const engine = this.requireOpen();
		this.engine = undefined;
		this.events.removeAllListeners();
		log('closing');
		await engine.close();
	}

	private requireOpen(): KVStore {
		if (!this.engine) {
			throw new NotInitializedError();
		}
		return this.engine;
	}

	/**
	 * Run a read-modify-write step behind the write latch.
	 */
	private write(step: (engine: KVStore) => Promise<void>): Promise<void> {
		return this.writeLatch.run(async () => {
			const engine = this.requireOpen();
			try {
				await step(engine);
			} catch (e) {
				throw this.closedError(e);
			}
		});
	}

	/**
	 * Pass engine items through while the store stays open. Each step checks
	 * the store first, and engine failures caused by `close()` surface as
	 * NotInitializedError.
	 */
	private async *whileOpen<T>(source: AsyncIterable<T>): AsyncGenerator<T, void, undefined> {
		try {
			for await (const item of source) {
				this.requireOpen();
				yield item;
			}
		} catch (e) {
			throw this.closedError(e);
		}
	}

	private closedError(e: unknown): unknown {
		if (this.isOpen || e instanceof KeyspanError) {
			return e;
		}
		return new NotInitializedError('Store was closed during the operation', e instanceof Error ? e : undefined);
	}

	private async readRecord(engine: KVStore, key: string): Promise<EntryRecord | undefined> {
		const bytes = await engine.get(buildDataKey(key));
		return bytes ? deserializeRecord(bytes) : undefined;
	}
}
