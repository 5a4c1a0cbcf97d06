/**
 * Value codec for entry payloads.
 *
 * Values are stored as text. Each kind of value has its own encoding rule;
 * decoding is permissive and hands back the raw text when it is not a valid
 * encoding, so content written by other tools never breaks a read.
 */

export type JsonPrimitive = string | number | boolean | null;
export type JsonArray = JsonValue[];
export interface JsonObject {
	[key: string]: JsonValue;
}
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

/** A value that can be stored under a key. */
export type Value = number | string | boolean | JsonArray | JsonObject;

/** A value classified by its encoding rule. */
export type TaggedValue =
	| { kind: 'integer'; value: number }
	| { kind: 'text'; value: string }
	| { kind: 'document'; value: number | boolean | JsonArray | JsonObject };

export function integerValue(value: number): TaggedValue {
	return { kind: 'integer', value };
}

export function textValue(value: string): TaggedValue {
	return { kind: 'text', value };
}

export function documentValue(value: number | boolean | JsonArray | JsonObject): TaggedValue {
	return { kind: 'document', value };
}

/**
 * Classify a value. Safe integers are integers, strings are text, and
 * everything else (fractional numbers, booleans, arrays, objects) is a document.
 */
export function classifyValue(value: Value): TaggedValue {
	if (typeof value === 'number' && Number.isSafeInteger(value)) {
		return integerValue(value);
	}
	if (typeof value === 'string') {
		return textValue(value);
	}
	return documentValue(value);
}

/**
 * Encode a tagged value to its stored text.
 */
export function encodeTagged(tagged: TaggedValue): string {
	switch (tagged.kind) {
		case 'integer':
			return tagged.value.toString(10);
		case 'text':
			return JSON.stringify(tagged.value);
		case 'document': {
			const text = JSON.stringify(tagged.value);
			if (text === undefined || (typeof tagged.value === 'number' && !Number.isFinite(tagged.value))) {
				throw new TypeError(`Value cannot be encoded: ${String(tagged.value)}`);
			}
			return text;
		}
	}
}

/**
 * Encode a value to its stored text.
 */
export function encodeValue(value: Value): string {
	return encodeTagged(classifyValue(value));
}

/**
 * Decode stored text. Text that doesn't parse, or parses to null, is returned as-is.
 */
export function decodeValue(text: string): Value {
	let parsed: JsonValue;
	try {
		parsed = JSON.parse(text);
	} catch {
		return text;
	}
	return parsed === null ? text : parsed;
}
