import debug from 'debug';

// Base namespace for the library
const BASE_NAMESPACE = 'flatkey';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('engine') -> returns a debugger for 'flatkey:engine'
 * Example: createLogger('value:reader') -> returns a debugger for 'flatkey:value:reader'
 *
 * Usage:
 * const log = createLogger('engine');
 * log('Flattening in %s mode', mode);
 * const errorLog = log.extend('error'); // Creates 'flatkey:engine:error'
 * errorLog('Flatten failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'engine', 'value:reader', 'flattener')
 * @returns A debug instance.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable flatkey debug logging programmatically.
 *
 * Useful when the DEBUG environment variable cannot be set before the
 * process starts (embedding hosts, test runners).
 *
 * @param pattern - Debug pattern to enable (default: 'flatkey:*')
 *   Examples:
 *   - 'flatkey:*' - all flatkey logs
 *   - 'flatkey:engine' - traversal passes only
 *   - 'flatkey:*,-flatkey:value:*' - everything except the reader
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from 'flatkey';
 *
 * enableLogging();
 * enableLogging('flatkey:engine', console.log.bind(console));
 * ```
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
 * Disable all debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'flatkey:' prefix)
 *
 * @example
 * ```typescript
 * if (isLoggingEnabled('engine')) {
 *   // Build an expensive trace message
 * }
 * ```
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
