import type { FeatureAssignments, FeatureBag, FeatureValue } from './features.js';
import type { KeyValue, OperatorInput } from './range-scan.js';
import type { Entry, Store } from './store.js';
import type { Value } from './value-codec.js';

/** Keys inside a namespace may be given as numbers; they are formatted in decimal. */
export type NamespaceKey = string | number;

/**
 * View of a store restricted to keys prefixed with `"<mask>:"`.
 * Holds no state beyond the store and mask; every call is forwarded.
 */
export class NamespaceProxy {
	readonly store: Store;
	readonly mask: string;
	private readonly prefix: string;

	constructor(store: Store, mask: string) {
		this.store = store;
		this.mask = mask;
		this.prefix = `${mask}:`;
	}

	/** Full store key for a key in this namespace. */
	keyFor(key: NamespaceKey): string {
		return `${this.prefix}${key}`;
	}

	get(key: NamespaceKey): Promise<Value | undefined>;
	get<D>(key: NamespaceKey, defaultValue: D): Promise<Value | D>;
	get<D>(key: NamespaceKey, defaultValue?: D): Promise<Value | D | undefined> {
		return this.store.get(this.keyFor(key), defaultValue);
	}

	has(key: NamespaceKey): Promise<boolean> {
		return this.store.has(this.keyFor(key));
	}

	entry(key: NamespaceKey): Promise<Entry | undefined> {
		return this.store.entry(this.keyFor(key));
	}

	put(key: NamespaceKey, value?: Value | null, features?: FeatureAssignments): Promise<void> {
		return this.store.put(this.keyFor(key), value, features);
	}

	delete(key: NamespaceKey): Promise<void> {
		return this.store.delete(this.keyFor(key));
	}

	features(key: NamespaceKey): Promise<FeatureBag> {
		return this.store.features(this.keyFor(key));
	}

	/**
	 * Range scan anchored on `"<mask>:<key>"`, never leaving this namespace.
	 * Yielded keys are full store keys.
	 */
	keys(op: OperatorInput, key: NamespaceKey, byTimestamp = false, limit = -1): AsyncGenerator<KeyValue, void, undefined> {
		return this.store.keys(op, this.keyFor(key), this.prefix, byTimestamp, limit);
	}

	select(feature: string, target: FeatureValue, limit = -1): AsyncGenerator<KeyValue, void, undefined> {
		return this.store.select(feature, target, this.prefix, limit);
	}

	count(): Promise<number> {
		return this.store.count(this.prefix);
	}

	/** Nested namespace `"<mask>:<sub>"`. */
	namespace(sub: string): NamespaceProxy {
		return new NamespaceProxy(this.store, this.keyFor(sub));
	}
}
