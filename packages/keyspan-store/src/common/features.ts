/**
 * Feature registry.
 *
 * Features are typed secondary attributes stored beside an entry's value and
 * used for equality selection. The set is fixed when the store is initialized.
 */

import { FeatureNotFoundError } from './errors.js';

export type FeatureType = 'boolean' | 'integer' | 'string';

export type FeatureDefinition =
	| { name: string; type: 'boolean'; default: boolean }
	| { name: string; type: 'integer'; default: number }
	| { name: string; type: 'string'; default: string };

/** Typed feature value as seen by callers. */
export type FeatureValue = boolean | number | string;

/** Feature value as persisted: booleans become 0/1. */
export type StoredFeatureValue = number | string;

/** Feature assignments accepted by `put`. */
export type FeatureAssignments = Readonly<Record<string, FeatureValue>>;

/** Read-only bag of every declared feature's value for one entry. */
export type FeatureBag = Readonly<Record<string, FeatureValue>>;

const FEATURE_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

function fitsType(type: FeatureType, value: unknown): boolean {
	switch (type) {
		case 'boolean':
			return typeof value === 'boolean';
		case 'integer':
			return typeof value === 'number' && Number.isSafeInteger(value);
		case 'string':
			return typeof value === 'string';
	}
}

function formatValue(value: unknown): string {
	return typeof value === 'string' ? `'${value}'` : String(value);
}

export class FeatureRegistry {
	private readonly definitions = new Map<string, FeatureDefinition>();

	constructor(definitions: readonly FeatureDefinition[] = []) {
		for (const definition of definitions) {
			this.declare(definition);
		}
	}

	private declare(definition: FeatureDefinition): void {
		const { name } = definition;
		if (!FEATURE_NAME.test(name) || name === '__proto__') {
			throw new FeatureNotFoundError(name, `Invalid feature name '${name}'`);
		}
		if (this.definitions.has(name)) {
			throw new FeatureNotFoundError(name, `Feature '${name}' is declared twice`);
		}
		if (!fitsType(definition.type, definition.default)) {
			throw new FeatureNotFoundError(
				name,
				`Default ${formatValue(definition.default)} of feature '${name}' is not a ${definition.type}`
			);
		}
		this.definitions.set(name, { ...definition });
	}

	get names(): string[] {
		return Array.from(this.definitions.keys());
	}

	list(): FeatureDefinition[] {
		return Array.from(this.definitions.values(), d => ({ ...d }));
	}

	lookup(name: string): FeatureDefinition | undefined {
		return this.definitions.get(name);
	}

	require(name: string): FeatureDefinition {
		const definition = this.definitions.get(name);
		if (!definition) {
			throw new FeatureNotFoundError(name);
		}
		return definition;
	}

	/**
	 * Validate a caller-supplied value and convert it to its stored form.
	 */
	toStored(name: string, value: FeatureValue): StoredFeatureValue {
		const definition = this.require(name);
		if (!fitsType(definition.type, value)) {
			throw new FeatureNotFoundError(
				name,
				`Feature '${name}' expects a ${definition.type}, got ${formatValue(value)}`
			);
		}
		if (typeof value === 'boolean') {
			return value ? 1 : 0;
		}
		return value;
	}

	/**
	 * Convert a stored scalar back to its typed value, falling back to the
	 * default when it is absent or does not fit the declaration.
	 */
	fromStored(name: string, stored: StoredFeatureValue | undefined): FeatureValue {
		const definition = this.require(name);
		switch (definition.type) {
			case 'boolean':
				return stored === 0 || stored === 1 ? stored === 1 : definition.default;
			case 'integer':
				return typeof stored === 'number' && Number.isSafeInteger(stored) ? stored : definition.default;
			case 'string':
				return typeof stored === 'string' ? stored : definition.default;
		}
	}

	/**
	 * Validate a batch of assignments, returning their stored forms.
	 * Nothing is returned unless every assignment is valid.
	 */
	toStoredAll(assignments: FeatureAssignments): Record<string, StoredFeatureValue> {
		const stored: Record<string, StoredFeatureValue> = {};
		for (const [name, value] of Object.entries(assignments)) {
			stored[name] = this.toStored(name, value);
		}
		return stored;
	}

	/**
	 * Build the frozen bag of every declared feature from stored scalars.
	 */
	materialize(stored: Readonly<Record<string, StoredFeatureValue>>): FeatureBag {
		const bag: Record<string, FeatureValue> = {};
		for (const name of this.definitions.keys()) {
			bag[name] = this.fromStored(name, Object.hasOwn(stored, name) ? stored[name] : undefined);
		}
		return Object.freeze(bag);
	}
}
