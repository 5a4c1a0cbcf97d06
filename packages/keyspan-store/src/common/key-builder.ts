/**
 * Engine key layout.
 *
 * One engine keyspace holds every table of the store, partitioned by prefix:
 *   m:schema                        - schema marker (declared features)
 *   m:clock                         - last issued creation timestamp
 *   d:{key}                         - entry record
 *   t:{timestamp, 8 bytes BE}{key}  - creation-order index, value is the key
 *
 * User keys are UTF-8 encoded, so entry order is byte order of the key.
 */

const encoder = new TextEncoder();
const decoder = new TextDecoder();

/** Keyspace prefixes. */
export const KEY_PREFIX = {
	DATA: encoder.encode('d:'),
	TIME: encoder.encode('t:'),
	META: encoder.encode('m:'),
} as const;

export const SCHEMA_KEY = concatBytes(KEY_PREFIX.META, encoder.encode('schema'));
export const CLOCK_KEY = concatBytes(KEY_PREFIX.META, encoder.encode('clock'));

/** Width of an encoded timestamp. */
const TIMESTAMP_BYTES = 8;

/**
 * Build the record key for an entry.
 */
export function buildDataKey(key: string): Uint8Array {
	return concatBytes(KEY_PREFIX.DATA, encoder.encode(key));
}

/**
 * Recover the user key from a record key.
 */
export function parseDataKey(dataKey: Uint8Array): string {
	return decoder.decode(dataKey.subarray(KEY_PREFIX.DATA.length));
}

/**
 * Encode a creation timestamp as big-endian bytes, so byte order is numeric order.
 */
export function encodeTimestamp(timestamp: number): Uint8Array {
	const buffer = new Uint8Array(TIMESTAMP_BYTES);
	new DataView(buffer.buffer).setBigUint64(0, BigInt(timestamp), false);
	return buffer;
}

/**
 * Build the creation-order index key for an entry.
 */
export function buildTimeKey(timestamp: number, key: string): Uint8Array {
	return concatBytes(KEY_PREFIX.TIME, encodeTimestamp(timestamp), encoder.encode(key));
}

/**
 * Build the prefix shared by every index key with the given timestamp.
 */
export function buildTimePrefix(timestamp: number): Uint8Array {
	return concatBytes(KEY_PREFIX.TIME, encodeTimestamp(timestamp));
}

/**
 * Build range bounds covering every record whose key starts with `mask`.
 */
export function buildDataPrefixBounds(mask: string): { gte: Uint8Array; lt: Uint8Array } {
	const prefix = buildDataKey(mask);
	return { gte: prefix, lt: incrementLastByte(prefix) };
}

/**
 * Build range bounds covering the whole creation-order index.
 */
export function buildTimeScanBounds(): { gte: Uint8Array; lt: Uint8Array } {
	return { gte: KEY_PREFIX.TIME, lt: incrementLastByte(KEY_PREFIX.TIME) };
}

/**
 * Lexicographic byte comparison.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
	const length = Math.min(a.length, b.length);
	for (let i = 0; i < length; i++) {
		if (a[i] !== b[i]) return a[i] - b[i];
	}
	return a.length - b.length;
}

/**
 * Increment the last byte of a key to create an exclusive upper bound.
 * Trailing 0xff bytes are dropped before incrementing.
 */
export function incrementLastByte(key: Uint8Array): Uint8Array {
	for (let i = key.length - 1; i >= 0; i--) {
		if (key[i] < 0xff) {
			const result = key.slice(0, i + 1);
			result[i]++;
			return result;
		}
	}

	// Only reachable for an all-0xff key, which no keyspace prefix produces
	throw new RangeError('Cannot bound a key made only of 0xff bytes');
}

/**
 * Concatenate multiple byte arrays.
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const arr of arrays) {
		result.set(arr, offset);
		offset += arr.length;
	}
	return result;
}

export function encodeText(text: string): Uint8Array {
	return encoder.encode(text);
}

export function decodeText(bytes: Uint8Array): string {
	return decoder.decode(bytes);
}
