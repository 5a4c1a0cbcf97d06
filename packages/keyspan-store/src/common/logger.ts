import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'keyspan';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('store') -> returns a debugger for 'keyspan:store'
 * Example: createLogger('leveldb') -> returns a debugger for 'keyspan:leveldb'
 *
 * Usage:
 * const log = createLogger('scan');
 * log('Scanning from %s', anchorKey);
 * const errorLog = log.extend('error'); // Creates 'keyspan:scan:error'
 * errorLog('Listener failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'store', 'scan', 'init')
 * @returns A debug instance.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable Keyspan debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'keyspan:*')
 *   Examples:
 *   - 'keyspan:*' - all logs
 *   - 'keyspan:scan' - range scans only
 *   - 'keyspan:*,-keyspan:scan' - everything except scans
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all Keyspan debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'keyspan:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
