/**
 * Entry record serialization.
 *
 * A record is stored as UTF-8 JSON:
 *   { "v": "<encoded value>", "t": <creation timestamp>, "f": { "<feature>": <scalar> } }
 */

import { KeyspanError } from './errors.js';
import type { StoredFeatureValue } from './features.js';
import { StatusCode } from './types.js';

export interface EntryRecord {
	/** Encoded value text (see value-codec). */
	v: string;
	/** Creation timestamp, set once. */
	t: number;
	/** Explicitly assigned feature scalars. */
	f: Record<string, StoredFeatureValue>;
}

export interface SchemaRecord {
	version: number;
	features: Array<{ name: string; type: string }>;
}

export const SCHEMA_VERSION = 1;

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStoredFeatures(value: unknown): value is Record<string, StoredFeatureValue> {
	return isPlainObject(value)
		&& Object.values(value).every(v => typeof v === 'number' || typeof v === 'string');
}

function isEntryRecord(value: unknown): value is EntryRecord {
	return isPlainObject(value)
		&& typeof value.v === 'string'
		&& typeof value.t === 'number'
		&& isStoredFeatures(value.f);
}

function parseJson(bytes: Uint8Array, what: string): unknown {
	try {
		return JSON.parse(decoder.decode(bytes));
	} catch (e) {
		throw new KeyspanError(`Corrupt ${what}`, StatusCode.CORRUPT, e instanceof Error ? e : undefined);
	}
}

export function serializeRecord(record: EntryRecord): Uint8Array {
	return encoder.encode(JSON.stringify(record));
}

/**
 * Deserialize a record. A malformed record is engine corruption and is raised,
 * unlike an undecodable value inside a well-formed record.
 */
export function deserializeRecord(bytes: Uint8Array): EntryRecord {
	const parsed = parseJson(bytes, 'entry record');
	if (!isEntryRecord(parsed)) {
		throw new KeyspanError('Corrupt entry record', StatusCode.CORRUPT);
	}
	return parsed;
}

export function serializeSchema(schema: SchemaRecord): Uint8Array {
	return encoder.encode(JSON.stringify(schema));
}

export function serializeClock(timestamp: number): Uint8Array {
	return encoder.encode(String(timestamp));
}

export function deserializeClock(bytes: Uint8Array | undefined): number {
	if (!bytes) return 0;
	const parsed = parseJson(bytes, 'clock');
	if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
		throw new KeyspanError('Corrupt clock', StatusCode.CORRUPT);
	}
	return parsed;
}
