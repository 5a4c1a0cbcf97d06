/**
 * Range scans over the entry keyspace.
 *
 * A scan is anchored on an existing entry and walks away from it, either by
 * key or by creation timestamp. The "less than" family always walks
 * descending and the "greater than" family ascending, so a limited scan
 * returns the N entries closest to the anchor on that side.
 */

import { NoOperationsError } from './errors.js';
import {
	buildDataKey,
	buildDataPrefixBounds,
	buildTimePrefix,
	buildTimeScanBounds,
	compareBytes,
	decodeText,
	parseDataKey,
} from './key-builder.js';
import type { IterateOptions, KVStore } from './kv-store.js';
import { createLogger } from './logger.js';
import { deserializeRecord, type EntryRecord } from './record.js';
import { decodeValue, type Value } from './value-codec.js';

const log = createLogger('scan');

/** Range operators. The enum values are the accepted operator symbols. */
export enum Op {
	GT = '>',
	GTE = '>=',
	LT = '<',
	LTE = '<=',
}

/** Range operator, as the enum or one of its symbols. */
export type OperatorInput = Op | `${Op}`;

const OPERATORS: ReadonlyMap<string, Op> = new Map<string, Op>(
	Object.values(Op).map(op => [op, op] as const)
);

/**
 * Resolve an operator symbol.
 * @throws NoOperationsError for anything but >, >=, < and <=
 */
export function resolveOperator(op: string): Op {
	const resolved = OPERATORS.get(op);
	if (resolved === undefined) {
		throw new NoOperationsError(op);
	}
	return resolved;
}

export function isDescending(op: Op): boolean {
	return op === Op.LT || op === Op.LTE;
}

export function isInclusive(op: Op): boolean {
	return op === Op.GTE || op === Op.LTE;
}

export interface RangeScanRequest {
	op: Op;
	anchorKey: string;
	anchor: EntryRecord;
	namespaceMask: string;
	byTimestamp: boolean;
	/** Negative for unbounded. */
	limit: number;
}

/** A decoded entry yielded by scans. */
export type KeyValue = [key: string, value: Value];

/**
 * Run a range scan. The anchor must already be resolved.
 */
export function scanRange(engine: KVStore, request: RangeScanRequest): AsyncGenerator<KeyValue, void, undefined> {
	log('%s %s mask=%s byTimestamp=%s limit=%d',
		request.op, request.anchorKey, request.namespaceMask, request.byTimestamp, request.limit);
	return request.byTimestamp
		? scanByTimestamp(engine, request)
		: scanByKey(engine, request);
}

/**
 * Build engine bounds for a key-ordered scan. The namespace occupies one
 * contiguous run of record keys, so the anchor bound is clamped into it.
 */
export function buildKeyScanOptions(op: Op, anchorKey: string, namespaceMask: string): IterateOptions {
	const anchor = buildDataKey(anchorKey);
	const bounds = buildDataPrefixBounds(namespaceMask);
	const inclusive = isInclusive(op);

	if (isDescending(op)) {
		const upper: IterateOptions = compareBytes(anchor, bounds.lt) >= 0
			? { lt: bounds.lt }
			: inclusive ? { lte: anchor } : { lt: anchor };
		return { gte: bounds.gte, ...upper, reverse: true };
	}

	const lower: IterateOptions = compareBytes(anchor, bounds.gte) < 0
		? { gte: bounds.gte }
		: inclusive ? { gte: anchor } : { gt: anchor };
	return { ...lower, lt: bounds.lt };
}

/**
 * Build engine bounds over the creation-order index. Timestamps are unique,
 * so the anchor's own index entry is exactly the run prefixed by its timestamp.
 */
export function buildTimeScanOptions(op: Op, timestamp: number): IterateOptions {
	const bounds = buildTimeScanBounds();
	const inclusive = isInclusive(op);

	if (isDescending(op)) {
		return {
			gte: bounds.gte,
			lt: buildTimePrefix(inclusive ? timestamp + 1 : timestamp),
			reverse: true,
		};
	}
	return {
		gte: buildTimePrefix(inclusive ? timestamp : timestamp + 1),
		lt: bounds.lt,
	};
}

async function* scanByKey(engine: KVStore, request: RangeScanRequest): AsyncGenerator<KeyValue, void, undefined> {
	if (request.limit === 0) {
		return;
	}
	const options = buildKeyScanOptions(request.op, request.anchorKey, request.namespaceMask);
	if (request.limit > 0) {
		options.limit = request.limit;
	}
	for await (const entry of engine.iterate(options)) {
		const record = deserializeRecord(entry.value);
		yield [parseDataKey(entry.key), decodeValue(record.v)];
	}
}

async function* scanByTimestamp(engine: KVStore, request: RangeScanRequest): AsyncGenerator<KeyValue, void, undefined> {
	const options = buildTimeScanOptions(request.op, request.anchor.t);
	let produced = 0;
	if (request.limit === 0) {
		return;
	}

	for await (const entry of engine.iterate(options)) {
		const key = decodeText(entry.value);
		if (!key.startsWith(request.namespaceMask)) {
			continue;
		}
		const bytes = await engine.get(buildDataKey(key));
		if (!bytes) {
			// Deleted after the cursor was opened
			continue;
		}
		const record = deserializeRecord(bytes);
		yield [key, decodeValue(record.v)];
		if (++produced === request.limit) {
			return;
		}
	}
}
