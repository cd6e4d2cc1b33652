import { StatusCode } from './types.js';

/**
 * Base class for flatkey specific errors
 * Provides location information and status code support
 */
export class FlatkeyError extends Error {
	public code: number;
	public cause?: Error;
	public line?: number;
	public column?: number;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error, line?: number, column?: number) {
		super(message);
		this.code = code;
		this.name = 'FlatkeyError';
		this.cause = cause;
		this.line = line;
		this.column = column;

		// Enhance message with location if available
		if (line !== undefined && column !== undefined) {
			this.message = `${message} (at line ${line}, column ${column})`;
		}

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, FlatkeyError);
		}
	}
}

/**
 * Raised when the source text is not valid JSON.
 * Carries the position of the offending character.
 */
export class MalformedJsonError extends FlatkeyError {
	public offset: number;

	constructor(message: string, offset: number, line: number, column: number) {
		super(message, StatusCode.FORMAT, undefined, line, column);
		this.offset = offset;
		this.name = 'MalformedJsonError';
		Object.setPrototypeOf(this, MalformedJsonError.prototype);
	}
}

/**
 * Error thrown when separator, bracket or other option values are rejected
 */
export class ConfigurationError extends FlatkeyError {
	constructor(message: string = "Invalid configuration") {
		super(message, StatusCode.MISUSE);
		this.name = 'ConfigurationError';
		Object.setPrototypeOf(this, ConfigurationError.prototype);
	}
}

/**
 * Error thrown when reading a JSON source stream fails
 */
export class SourceReadError extends FlatkeyError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.IOERR, cause);
		this.name = 'SourceReadError';
		Object.setPrototypeOf(this, SourceReadError.prototype);
	}
}

/**
 * Error thrown when an internal invariant does not hold
 */
export class InternalError extends FlatkeyError {
	constructor(message: string) {
		super(message, StatusCode.INTERNAL);
		this.name = 'InternalError';
		Object.setPrototypeOf(this, InternalError.prototype);
	}
}

export interface ErrorInfo {
	name: string;
	message: string;
	code?: number;
}

/**
 * Flattens an error and its `cause` chain, outermost first.
 */
export function unwrapError(error: unknown): ErrorInfo[] {
	const chain: ErrorInfo[] = [];
	const seen = new Set<unknown>();
	let current: unknown = error;

	while (current !== undefined && current !== null && !seen.has(current)) {
		seen.add(current);
		if (current instanceof Error) {
			chain.push({
				name: current.name,
				message: current.message,
				code: current instanceof FlatkeyError ? current.code : undefined,
			});
			current = current.cause;
		} else {
			chain.push({ name: 'Error', message: String(current) });
			break;
		}
	}

	return chain;
}

/**
 * One line per error in the chain, causes indented beneath their wrapper.
 */
export function formatErrorChain(error: unknown): string {
	return unwrapError(error)
		.map((info, depth) => `${'  '.repeat(depth)}${depth > 0 ? 'caused by ' : ''}${info.name}: ${info.message}`)
		.join('\n');
}
