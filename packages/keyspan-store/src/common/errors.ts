import { StatusCode } from './types.js';

/**
 * Base class for Keyspan specific errors.
 * Every error surfaced by the store carries a status code.
 */
export class KeyspanError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'KeyspanError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, KeyspanError);
		}
	}
}

/**
 * Operation attempted on a store that is closed or was never opened.
 */
export class NotInitializedError extends KeyspanError {
	constructor(message: string = 'Store is not initialized', cause?: Error) {
		super(message, StatusCode.MISUSE, cause);
		this.name = 'NotInitializedError';
		Object.setPrototypeOf(this, NotInitializedError.prototype);
	}
}

/**
 * The schema already exists and strict creation was requested.
 */
export class CantCreateDatabaseError extends KeyspanError {
	constructor(message: string = 'Database already exists', cause?: Error) {
		super(message, StatusCode.CANTOPEN, cause);
		this.name = 'CantCreateDatabaseError';
		Object.setPrototypeOf(this, CantCreateDatabaseError.prototype);
	}
}

/**
 * Unrecognized range operator.
 */
export class NoOperationsError extends KeyspanError {
	public operator: string;

	constructor(operator: string) {
		super(`Unsupported range operator '${operator}'`, StatusCode.RANGE);
		this.name = 'NoOperationsError';
		this.operator = operator;
		Object.setPrototypeOf(this, NoOperationsError.prototype);
	}
}

/**
 * Undeclared feature, or a value whose type does not match the declaration.
 */
export class FeatureNotFoundError extends KeyspanError {
	public feature: string;

	constructor(feature: string, message: string = `Feature '${feature}' is not declared`) {
		super(message, StatusCode.NOTFOUND);
		this.name = 'FeatureNotFoundError';
		this.feature = feature;
		Object.setPrototypeOf(this, FeatureNotFoundError.prototype);
	}
}

/**
 * A key that must exist (range anchor, features lookup) is absent.
 */
export class KeyNotFoundError extends KeyspanError {
	public key: string;

	constructor(key: string) {
		super(`Key '${key}' not found`, StatusCode.NOTFOUND);
		this.name = 'KeyNotFoundError';
		this.key = key;
		Object.setPrototypeOf(this, KeyNotFoundError.prototype);
	}
}

/**
 * Invalid or unreadable configuration.
 */
export class ConfigError extends KeyspanError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.FORMAT, cause);
		this.name = 'ConfigError';
		Object.setPrototypeOf(this, ConfigError.prototype);
	}
}
