import { JsonDecimal, type OutputValue } from '../src/index.js';

/**
 * Converts an output value into plain data for deep comparisons:
 * decimals become numbers, maps become objects.
 * Key order is not preserved here; assert it separately with `[...map.keys()]`.
 */
export function toPlain(value: OutputValue): unknown {
	if (value instanceof JsonDecimal) return value.toNumber();
	if (value instanceof Map) {
		return Object.fromEntries([...value].map(([key, child]) => [key, toPlain(child)]));
	}
	if (Array.isArray(value)) return value.map(toPlain);
	return value;
}
