import { JsonDecimal } from '../value/decimal.js';

/**
 * A value stored in a flattened mapping.
 * Lists and nested maps only appear in KEEP_ARRAYS mode, or for empty containers.
 */
export type OutputValue =
	| null
	| boolean
	| string
	| JsonDecimal
	| OutputValue[]
	| OutputMap;

/** Encoded key to value, in traversal order. */
// eslint-disable-next-line @typescript-eslint/no-empty-interface
export interface OutputMap extends Map<string, OutputValue> {}

export function isOutputMap(value: OutputValue): value is OutputMap {
	return value instanceof Map;
}

export function isOutputList(value: OutputValue): value is OutputValue[] {
	return Array.isArray(value);
}

export function isDecimal(value: OutputValue): value is JsonDecimal {
	return value instanceof JsonDecimal;
}
