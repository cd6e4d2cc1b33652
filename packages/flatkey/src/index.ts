/**
 * flatkey - flattens nested JSON into single-level key/value mappings
 *
 * Keys encode the path to each value (`a.b[0]`), member names that collide
 * with the key punctuation are fenced (`[\"a.b\"]`), and numbers keep their
 * exact decimal text.
 */

// Flattening
export { JsonFlattener, flattenJsonText } from './flatten/flattener.js';
export type { JsonChunkSource, StreamSourceOptions } from './flatten/flattener.js';
export { FlattenEngine, flattenJson } from './flatten/engine.js';
export { coerceLeaf } from './flatten/coercer.js';
export { ROOT_KEY, encodeKey, needsFencing } from './flatten/key-encoder.js';
export type { PathSegment, KeyEncoding } from './flatten/key-encoder.js';
export {
	FlattenMode,
	DEFAULT_FLATTEN_OPTIONS,
	isFlattenMode,
	resolveFlattenOptions,
	validateKeyPunctuation,
} from './flatten/options.js';
export type { FlattenOptions, PartialFlattenOptions, PunctuationChange } from './flatten/options.js';
export { isOutputMap, isOutputList, isDecimal } from './flatten/output.js';
export type { OutputMap, OutputValue } from './flatten/output.js';

// Value model
export { parseJson, JsonReader } from './value/reader.js';
export { JsonDecimal } from './value/decimal.js';
export {
	fromJsValue,
	nodesEqual,
	isObject,
	isArray,
	isString,
	isNumber,
	isBoolean,
	isNull,
	isContainer,
	isEmptyContainer,
	childCount,
} from './value/json-value.js';
export type {
	JSONValue,
	JsonNode,
	JsonMember,
	JsonObjectNode,
	JsonArrayNode,
	JsonStringNode,
	JsonNumberNode,
	JsonBooleanNode,
	JsonNullNode,
	JsonContainerNode,
} from './value/json-value.js';

// Escaping and rendering
export { StringEscapePolicy, createEscapePolicy, escapePolicyByName } from './escape/policy.js';
export type { EscapePolicy, StringEscapePolicyName } from './escape/policy.js';
export { PrintMode, isPrintMode } from './render/print-mode.js';
export { JsonRenderer } from './render/renderer.js';
export type { Renderer } from './render/renderer.js';

// Errors and logging
export { StatusCode } from './common/types.js';
export {
	FlatkeyError,
	MalformedJsonError,
	ConfigurationError,
	SourceReadError,
	InternalError,
	unwrapError,
	formatErrorChain,
} from './common/errors.js';
export type { ErrorInfo } from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';
