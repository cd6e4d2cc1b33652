import { Cached } from '../common/cached.js';
import { SourceReadError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { EscapePolicy } from '../escape/policy.js';
import type { PrintMode } from '../render/print-mode.js';
import { JsonRenderer, type Renderer } from '../render/renderer.js';
import { fromJsValue, nodesEqual, type JSONValue, type JsonNode } from '../value/json-value.js';
import { parseJson } from '../value/reader.js';
import { FlattenEngine } from './engine.js';
import { ROOT_KEY } from './key-encoder.js';
import {
	DEFAULT_FLATTEN_OPTIONS,
	resolveFlattenOptions,
	type FlattenMode,
	type FlattenOptions,
	type PartialFlattenOptions,
} from './options.js';
import type { OutputMap } from './output.js';

const log = createLogger('flattener');

/** Byte or character chunks, e.g. a Node.js Readable. */
export type JsonChunkSource = AsyncIterable<string | Uint8Array>;

export interface StreamSourceOptions extends PartialFlattenOptions {
	/** Defer parsing (and any malformed-input error) to the first flatten call. */
	lazy?: boolean;
}

/**
 * Flattens a JSON document into a single-level key/value mapping.
 *
 * @example
 * ```typescript
 * JsonFlattener.flatten('{"a":{"b":1,"c":[true]}}');
 * // => '{"a.b":1,"a.c[0]":true}'
 *
 * JsonFlattener.of('{"a":[1,2]}')
 *   .withFlattenMode(FlattenMode.KEEP_ARRAYS)
 *   .flatten();
 * // => '{"a":[1,2]}'
 * ```
 *
 * Instances are immutable. Each `with*` call returns a new flattener that
 * shares the parsed source and computes its own mapping on first use.
 */
export class JsonFlattener {
	private readonly flattened: Cached<OutputMap>;

	private constructor(
		private readonly source: Cached<JsonNode>,
		readonly options: FlattenOptions,
		private readonly customRenderer?: Renderer,
	) {
		this.flattened = new Cached(() => new FlattenEngine(this.options).flatten(this.source.value));
	}

	/** Flattens JSON text with the given options. */
	static flatten(json: string, options: PartialFlattenOptions = {}): string {
		return JsonFlattener.of(json, options).flatten();
	}

	/** Flattens JSON text into a mapping with the given options. */
	static flattenAsMap(json: string, options: PartialFlattenOptions = {}): OutputMap {
		return JsonFlattener.of(json, options).flattenAsMap();
	}

	/**
	 * Creates a flattener over JSON text or an already-parsed node tree.
	 * Text is parsed immediately.
	 * @throws MalformedJsonError when the text is not valid JSON
	 */
	static of(json: string | JsonNode, options: PartialFlattenOptions = {}): JsonFlattener {
		const resolved = resolveFlattenOptions(options);
		if (typeof json !== 'string') {
			return new JsonFlattener(Cached.of(json), resolved);
		}
		return new JsonFlattener(Cached.of(parseJson(json)), resolved);
	}

	/**
	 * Creates a flattener without parsing. Malformed input is only reported
	 * when the first flatten call parses the text.
	 */
	static lazy(json: string, options: PartialFlattenOptions = {}): JsonFlattener {
		return new JsonFlattener(new Cached(() => parseJson(json)), resolveFlattenOptions(options));
	}

	/** Creates a flattener over a value already produced by JSON.parse(). */
	static fromValue(value: JSONValue, options: PartialFlattenOptions = {}): JsonFlattener {
		return new JsonFlattener(Cached.of(fromJsValue(value)), resolveFlattenOptions(options));
	}

	/**
	 * Reads an open stream to its end (UTF-8), then parses eagerly unless
	 * `lazy` is set.
	 * @throws SourceReadError when the stream fails
	 */
	static async fromStream(stream: JsonChunkSource, options: StreamSourceOptions = {}): Promise<JsonFlattener> {
		const { lazy = false, ...flattenOptions } = options;
		const text = await readAll(stream);
		log('Read %d characters from stream', text.length);
		return lazy ? JsonFlattener.lazy(text, flattenOptions) : JsonFlattener.of(text, flattenOptions);
	}

	withFlattenMode(flattenMode: FlattenMode): JsonFlattener {
		return this.derive({ flattenMode });
	}

	withStringEscapePolicy(escapePolicy: EscapePolicy): JsonFlattener {
		return this.derive({ escapePolicy });
	}

	/**
	 * @throws ConfigurationError when the separator is whitespace, a quote, or
	 * one of the current brackets
	 */
	withSeparator(separator: string): JsonFlattener {
		return this.derive({ separator });
	}

	/**
	 * @throws ConfigurationError when the brackets are equal, whitespace, a
	 * quote, or the current separator
	 */
	withLeftAndRightBrackets(leftBracket: string, rightBracket: string): JsonFlattener {
		return this.derive({ leftBracket, rightBracket });
	}

	withPrintMode(printMode: PrintMode): JsonFlattener {
		return this.derive({ printMode });
	}

	/** Replaces the default JSON renderer used by flatten(). */
	withRenderer(renderer: Renderer): JsonFlattener {
		return new JsonFlattener(this.source, this.options, renderer);
	}

	/** The parsed source; parses now if this flattener is lazy. */
	get root(): JsonNode {
		return this.source.value;
	}

	/**
	 * Returns the flattened mapping. Computed once per flattener; callers must
	 * not mutate the returned map.
	 */
	flattenAsMap(): OutputMap {
		return this.flattened.value;
	}

	/**
	 * Renders the flattened mapping as JSON text. When the source cannot be
	 * expressed as a map (a scalar, an empty array, or an array kept whole),
	 * the root value is rendered on its own.
	 */
	flatten(): string {
		const map = this.flattenAsMap();
		const renderer = this.customRenderer ?? new JsonRenderer(this.options.escapePolicy);
		const root = this.source.value;

		if (root.type === 'object' || (root.type === 'array' && !map.has(ROOT_KEY))) {
			return renderer.render(map, this.options.printMode);
		}
		return renderer.render(map.get(ROOT_KEY) ?? null, this.options.printMode);
	}

	/** True when both flatteners read structurally equal documents. */
	equals(other: JsonFlattener): boolean {
		return this === other || nodesEqual(this.source.value, other.source.value);
	}

	private derive(overrides: PartialFlattenOptions): JsonFlattener {
		return new JsonFlattener(this.source, resolveFlattenOptions(overrides, this.options), this.customRenderer);
	}
}

async function readAll(stream: JsonChunkSource): Promise<string> {
	const decoder = new TextDecoder('utf-8');
	let text = '';
	try {
		for await (const chunk of stream) {
			text += typeof chunk === 'string' ? chunk : decoder.decode(chunk, { stream: true });
		}
		text += decoder.decode();
	} catch (e) {
		const cause = e instanceof Error ? e : new Error(String(e));
		throw new SourceReadError(`Failed to read JSON source: ${cause.message}`, cause);
	}
	return text;
}

/**
 * Stateless form over JSON text: parses and flattens in one call.
 */
export function flattenJsonText(text: string, options: PartialFlattenOptions = DEFAULT_FLATTEN_OPTIONS): OutputMap {
	return new FlattenEngine(options).flatten(parseJson(text));
}
