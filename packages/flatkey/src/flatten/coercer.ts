import { InternalError } from '../common/errors.js';
import { JsonDecimal } from '../value/decimal.js';
import { childCount, type JsonNode } from '../value/json-value.js';
import type { OutputMap, OutputValue } from './output.js';

/**
 * Converts a terminal node (scalar or empty container) into an output value.
 *
 * Strings are passed through unescaped; escaping happens when rendering.
 * Numbers become exact decimals built from their literal text.
 * Non-empty containers are materialized by the engine and are rejected here.
 */
export function coerceLeaf(node: JsonNode): OutputValue {
	switch (node.type) {
		case 'boolean':
		case 'string':
			return node.value;
		case 'number':
			return JsonDecimal.parse(node.text);
		case 'null':
			return null;
		case 'array':
		case 'object':
			if (childCount(node) > 0) {
				throw new InternalError(`Non-empty ${node.type} must be materialized, not coerced as a leaf`);
			}
			return node.type === 'array' ? [] : emptyMap();
	}
}

function emptyMap(): OutputMap {
	return new Map<string, OutputValue>();
}
