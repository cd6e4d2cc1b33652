import { JsonDecimal } from './decimal.js';

/**
 * Represents a JSON-compatible value structure as produced by JSON.parse()
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| JSONValue[]
	| { [key: string]: JSONValue };

export interface JsonMember {
	readonly name: string;
	readonly value: JsonNode;
}

export interface JsonObjectNode {
	readonly type: 'object';
	/** Members in source order; duplicate names are kept. */
	readonly members: JsonMember[];
}

export interface JsonArrayNode {
	readonly type: 'array';
	readonly elements: JsonNode[];
}

export interface JsonStringNode {
	readonly type: 'string';
	readonly value: string;
}

export interface JsonNumberNode {
	readonly type: 'number';
	/** The number literal exactly as it appeared in the source. */
	readonly text: string;
}

export interface JsonBooleanNode {
	readonly type: 'boolean';
	readonly value: boolean;
}

export interface JsonNullNode {
	readonly type: 'null';
}

/** A parsed JSON value. */
export type JsonNode =
	| JsonObjectNode
	| JsonArrayNode
	| JsonStringNode
	| JsonNumberNode
	| JsonBooleanNode
	| JsonNullNode;

export type JsonContainerNode = JsonObjectNode | JsonArrayNode;

export function isObject(node: JsonNode): node is JsonObjectNode {
	return node.type === 'object';
}

export function isArray(node: JsonNode): node is JsonArrayNode {
	return node.type === 'array';
}

export function isString(node: JsonNode): node is JsonStringNode {
	return node.type === 'string';
}

export function isNumber(node: JsonNode): node is JsonNumberNode {
	return node.type === 'number';
}

export function isBoolean(node: JsonNode): node is JsonBooleanNode {
	return node.type === 'boolean';
}

export function isNull(node: JsonNode): node is JsonNullNode {
	return node.type === 'null';
}

export function isContainer(node: JsonNode): node is JsonContainerNode {
	return node.type === 'object' || node.type === 'array';
}

export function childCount(node: JsonContainerNode): number {
	return node.type === 'object' ? node.members.length : node.elements.length;
}

export function isEmptyContainer(node: JsonNode): boolean {
	return isContainer(node) && childCount(node) === 0;
}

function scalarNode(value: string | number | boolean | null): JsonNode {
	if (value === null) return { type: 'null' };
	if (typeof value === 'string') return { type: 'string', value };
	if (typeof value === 'boolean') return { type: 'boolean', value };
	return { type: 'number', text: JsonDecimal.fromNumber(value).text };
}

/**
 * Builds a node tree from an already-parsed JS value.
 * Member order follows the object's own enumeration order.
 */
export function fromJsValue(value: JSONValue): JsonNode {
	const pending: { source: JSONValue; target: JsonContainerNode }[] = [];

	const convert = (source: JSONValue): JsonNode => {
		if (Array.isArray(source)) {
			const node: JsonArrayNode = { type: 'array', elements: [] };
			pending.push({ source, target: node });
			return node;
		}
		if (typeof source === 'object' && source !== null) {
			const node: JsonObjectNode = { type: 'object', members: [] };
			pending.push({ source, target: node });
			return node;
		}
		return scalarNode(source);
	};

	const root = convert(value);
	for (let item = pending.pop(); item !== undefined; item = pending.pop()) {
		const { source, target } = item;
		if (target.type === 'array' && Array.isArray(source)) {
			for (const element of source) {
				target.elements.push(convert(element));
			}
		} else if (target.type === 'object' && typeof source === 'object' && source !== null && !Array.isArray(source)) {
			for (const [name, member] of Object.entries(source)) {
				target.members.push({ name, value: convert(member) });
			}
		}
	}
	return root;
}

/**
 * Structural equality. Numbers compare by literal text, members by order.
 */
export function nodesEqual(a: JsonNode, b: JsonNode): boolean {
	const pairs: [JsonNode, JsonNode][] = [[a, b]];

	for (let pair = pairs.pop(); pair !== undefined; pair = pairs.pop()) {
		const [left, right] = pair;
		switch (left.type) {
			case 'object': {
				if (right.type !== 'object' || left.members.length !== right.members.length) return false;
				for (let i = 0; i < left.members.length; i++) {
					if (left.members[i].name !== right.members[i].name) return false;
					pairs.push([left.members[i].value, right.members[i].value]);
				}
				break;
			}
			case 'array': {
				if (right.type !== 'array' || left.elements.length !== right.elements.length) return false;
				for (let i = 0; i < left.elements.length; i++) {
					pairs.push([left.elements[i], right.elements[i]]);
				}
				break;
			}
			case 'string':
				if (right.type !== 'string' || right.value !== left.value) return false;
				break;
			case 'boolean':
				if (right.type !== 'boolean' || right.value !== left.value) return false;
				break;
			case 'number':
				if (right.type !== 'number' || right.text !== left.text) return false;
				break;
			case 'null':
				if (right.type !== 'null') return false;
				break;
		}
	}
	return true;
}
