import { createLogger } from '../common/logger.js';
import type { JsonContainerNode, JsonNode } from '../value/json-value.js';
import { childCount, isContainer } from '../value/json-value.js';
import { coerceLeaf } from './coercer.js';
import { ROOT_KEY, encodeKey, type PathSegment } from './key-encoder.js';
import { FlattenMode, resolveFlattenOptions, type FlattenOptions, type PartialFlattenOptions } from './options.js';
import { isOutputMap, type OutputMap, type OutputValue } from './output.js';

const log = createLogger('engine');

/**
 * Where a cursor's emissions go. Keys are built from the cursors between
 * `base` and the top of the stack, so a nested scope gets keys relative to
 * its own root object.
 */
interface Scope {
	readonly output: OutputMap;
	readonly base: number;
}

/** Position within one container's children. */
interface CursorFrame {
	readonly kind: 'cursor';
	readonly container: JsonContainerNode;
	readonly scope: Scope;
	position: number;
	/** Segment of the child most recently visited. */
	segment?: PathSegment;
}

/** A kept array being materialized into a list. */
interface ListFrame {
	readonly kind: 'list';
	readonly elements: readonly JsonNode[];
	readonly target: OutputValue[];
	position: number;
}

type Frame = CursorFrame | ListFrame;

/**
 * Walks a node tree depth-first and emits one (key, value) pair per terminal
 * node, in pre-order.
 *
 * All traversal happens on an explicit stack: nesting depth costs heap, never
 * native call stack. This includes materializing kept arrays and re-flattening
 * objects found inside them.
 */
export class FlattenEngine {
	readonly options: FlattenOptions;

	constructor(options: PartialFlattenOptions = {}) {
		this.options = resolveFlattenOptions(options);
	}

	/**
	 * Flattens `root` into a fresh mapping.
	 *
	 * An empty mapping is never stored under ROOT_KEY, so an empty root object
	 * (or a member named `root` holding one) produces no entry. Scalars and empty
	 * arrays at the root are stored under ROOT_KEY, as is a whole root array in
	 * KEEP_ARRAYS mode.
	 */
	flatten(root: JsonNode): OutputMap {
		const output: OutputMap = new Map();
		const stack: Frame[] = [];

		this.reduce(root, { output, base: 0 }, stack);
		this.run(stack);

		log('Flattened %s root into %d entries (%s mode)', root.type, output.size, this.options.flattenMode);
		return output;
	}

	/**
	 * Converts any node into an output value: scalars and empty containers as
	 * leaves, arrays into lists of coerced elements, and non-empty objects into
	 * independently flattened mappings.
	 */
	coerce(node: JsonNode): OutputValue {
		const stack: Frame[] = [];
		const value = this.materialize(node, stack);
		this.run(stack);
		return value;
	}

	private run(stack: Frame[]): void {
		while (stack.length > 0) {
			const frame = stack[stack.length - 1];

			if (frame.kind === 'cursor') {
				const child = this.advance(frame);
				if (child === undefined) {
					stack.pop();
				} else {
					this.reduce(child, frame.scope, stack);
				}
			} else if (frame.position >= frame.elements.length) {
				stack.pop();
			} else {
				const element = frame.elements[frame.position++];
				frame.target.push(this.materialize(element, stack));
			}
		}
	}

	/** Moves the cursor to its next child, recording that child's path segment. */
	private advance(frame: CursorFrame): JsonNode | undefined {
		const { container } = frame;
		if (frame.position >= childCount(container)) return undefined;

		const index = frame.position++;
		if (container.type === 'object') {
			const member = container.members[index];
			frame.segment = { kind: 'name', name: member.name };
			return member.value;
		}
		frame.segment = { kind: 'index', index };
		return container.elements[index];
	}

	private reduce(node: JsonNode, scope: Scope, stack: Frame[]): void {
		if (isContainer(node) && childCount(node) > 0) {
			if (node.type === 'object' || this.options.flattenMode === FlattenMode.NORMAL) {
				stack.push({ kind: 'cursor', container: node, scope, position: 0 });
				return;
			}

			// KEEP_ARRAYS: the whole array is one value under the current key
			const list: OutputValue[] = [];
			scope.output.set(this.currentKey(scope, stack), list);
			stack.push({ kind: 'list', elements: node.elements, target: list, position: 0 });
			return;
		}

		const key = this.currentKey(scope, stack);
		const value = coerceLeaf(node);
		// The root key never carries an empty mapping
		if (key === ROOT_KEY && isOutputMap(value) && value.size === 0) return;

		scope.output.set(key, value);
	}

	/**
	 * Returns the value for a kept-array element, pushing a frame when the
	 * element still has children to fill in.
	 */
	private materialize(node: JsonNode, stack: Frame[]): OutputValue {
		if (!isContainer(node) || childCount(node) === 0) {
			return coerceLeaf(node);
		}

		if (node.type === 'array') {
			const list: OutputValue[] = [];
			stack.push({ kind: 'list', elements: node.elements, target: list, position: 0 });
			return list;
		}

		const output: OutputMap = new Map();
		stack.push({ kind: 'cursor', container: node, scope: { output, base: stack.length }, position: 0 });
		return output;
	}

	private currentPath(scope: Scope, stack: readonly Frame[]): PathSegment[] {
		const path: PathSegment[] = [];
		for (let i = scope.base; i < stack.length; i++) {
			const frame = stack[i];
			if (frame.kind === 'cursor' && frame.segment !== undefined) {
				path.push(frame.segment);
			}
		}
		return path;
	}

	private currentKey(scope: Scope, stack: readonly Frame[]): string {
		return encodeKey(this.currentPath(scope, stack), this.options);
	}
}

/**
 * Stateless form: flattens `root` with the given options.
 */
export function flattenJson(root: JsonNode, options: PartialFlattenOptions = {}): OutputMap {
	return new FlattenEngine(options).flatten(root);
}
