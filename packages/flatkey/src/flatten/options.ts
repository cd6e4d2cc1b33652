import { ConfigurationError } from '../common/errors.js';
import { StringEscapePolicy, type EscapePolicy } from '../escape/policy.js';
import { PrintMode } from '../render/print-mode.js';

/**
 * How arrays are treated during traversal.
 */
export enum FlattenMode {
	/** Descend into every non-empty object and array. */
	NORMAL = 'normal',
	/** Descend into objects only; non-empty arrays are stored whole. */
	KEEP_ARRAYS = 'keep-arrays',
}

const FLATTEN_MODES: readonly FlattenMode[] = Object.values(FlattenMode);

export function isFlattenMode(value: string): value is FlattenMode {
	return FLATTEN_MODES.some(mode => mode === value);
}

/**
 * Configuration of a flatten pass. Immutable once resolved.
 */
export interface FlattenOptions {
	readonly flattenMode: FlattenMode;
	readonly escapePolicy: EscapePolicy;
	/** Joins consecutive member names. */
	readonly separator: string;
	/** Opens an index or a fenced member name. */
	readonly leftBracket: string;
	/** Closes an index or a fenced member name. */
	readonly rightBracket: string;
	readonly printMode: PrintMode;
}

export type PartialFlattenOptions = Partial<FlattenOptions>;

export const DEFAULT_FLATTEN_OPTIONS: FlattenOptions = Object.freeze({
	flattenMode: FlattenMode.NORMAL,
	escapePolicy: StringEscapePolicy.DEFAULT,
	separator: '.',
	leftBracket: '[',
	rightBracket: ']',
	printMode: PrintMode.MINIMAL,
});

function isSingleCharacter(value: string): boolean {
	return [...value].length === 1;
}

function isIllegalPunctuation(value: string): boolean {
	return value === '"' || /\s/u.test(value);
}

/** Which punctuation a change set: decides how a separator/bracket collision is reported. */
export type PunctuationChange = 'separator' | 'brackets';

/**
 * Checks the key punctuation: three distinct single characters, none of them
 * whitespace or a double quote.
 *
 * A bracket equal to the separator is reported against the separator when the
 * separator changed, and against the bracket when the brackets changed.
 * @throws ConfigurationError naming the first offending character
 */
export function validateKeyPunctuation(
	separator: string,
	leftBracket: string,
	rightBracket: string,
	changed: PunctuationChange = 'separator',
): void {
	if (!isSingleCharacter(separator)) {
		throw new ConfigurationError('Separator must be a single character');
	}
	if (isIllegalPunctuation(separator)) {
		throw new ConfigurationError(`Separator contains illegal character (${separator})`);
	}
	if (!isSingleCharacter(leftBracket) || !isSingleCharacter(rightBracket)) {
		throw new ConfigurationError('Brackets must be single characters');
	}
	if (leftBracket === rightBracket) {
		throw new ConfigurationError('Both brackets cannot be the same');
	}
	if (changed === 'separator' && (separator === leftBracket || separator === rightBracket)) {
		throw new ConfigurationError(`Separator (${separator}) is already used in brackets`);
	}
	if (isIllegalPunctuation(leftBracket) || leftBracket === separator) {
		throw new ConfigurationError(`Left bracket contains illegal character (${leftBracket})`);
	}
	if (isIllegalPunctuation(rightBracket) || rightBracket === separator) {
		throw new ConfigurationError(`Right bracket contains illegal character (${rightBracket})`);
	}
}

/**
 * Applies overrides on top of `base` and validates the result.
 * `base` is never modified; a rejected override leaves it usable as before.
 */
export function resolveFlattenOptions(
	overrides: PartialFlattenOptions = {},
	base: FlattenOptions = DEFAULT_FLATTEN_OPTIONS,
): FlattenOptions {
	const resolved: FlattenOptions = {
		flattenMode: overrides.flattenMode ?? base.flattenMode,
		escapePolicy: overrides.escapePolicy ?? base.escapePolicy,
		separator: overrides.separator ?? base.separator,
		leftBracket: overrides.leftBracket ?? base.leftBracket,
		rightBracket: overrides.rightBracket ?? base.rightBracket,
		printMode: overrides.printMode ?? base.printMode,
	};

	if (!isFlattenMode(resolved.flattenMode)) {
		throw new ConfigurationError(`Unknown flatten mode '${String(resolved.flattenMode)}'`);
	}
	const bracketsOnly = overrides.separator === undefined
		&& (overrides.leftBracket !== undefined || overrides.rightBracket !== undefined);
	validateKeyPunctuation(
		resolved.separator,
		resolved.leftBracket,
		resolved.rightBracket,
		bracketsOnly ? 'brackets' : 'separator',
	);

	return Object.freeze(resolved);
}
