import { ConfigurationError } from '../common/errors.js';

/**
 * Translates a raw string into the form embedded between double quotes in
 * rendered JSON, and in flattened keys.
 */
export interface EscapePolicy {
	readonly name: string;
	escape(text: string): string;
}

const SHORT_ESCAPES: Record<string, string> = {
	'"': '\\"',
	'\\': '\\\\',
	'\b': '\\b',
	'\f': '\\f',
	'\n': '\\n',
	'\r': '\\r',
	'\t': '\\t',
};

function unicodeEscape(code: number): string {
	return '\\u' + code.toString(16).padStart(4, '0');
}

/**
 * Builds a JSON string escape policy.
 * Quotes, backslashes and control characters are always escaped.
 */
export function createEscapePolicy(name: string, options: { slashes?: boolean; unicodes?: boolean } = {}): EscapePolicy {
	const { slashes = false, unicodes = false } = options;
	const needsEscape = new RegExp(
		`["\\\\\\u0000-\\u001f${slashes ? '/' : ''}${unicodes ? '\\u007f-\\uffff' : ''}]`
	);

	return {
		name,
		escape(text: string): string {
			if (!needsEscape.test(text)) return text;

			let result = '';
			for (let i = 0; i < text.length; i++) {
				const c = text[i];
				const code = text.charCodeAt(i);
				const short = SHORT_ESCAPES[c];
				if (short !== undefined) {
					result += short;
				} else if (code < 0x20 || (unicodes && code > 0x7e)) {
					result += unicodeEscape(code);
				} else if (slashes && c === '/') {
					result += '\\/';
				} else {
					result += c;
				}
			}
			return result;
		},
	};
}

/** Built-in escape policies. */
export const StringEscapePolicy = Object.freeze({
	/** Quotes, backslashes and control characters only. */
	DEFAULT: createEscapePolicy('default'),
	/** DEFAULT plus `/` as `\/`. */
	ALL_SLASHES: createEscapePolicy('all-slashes', { slashes: true }),
	/** DEFAULT plus every code unit above U+007E as `\uXXXX`. */
	ALL_UNICODES: createEscapePolicy('all-unicodes', { unicodes: true }),
	/** Slashes and non-ASCII both escaped. */
	ALL: createEscapePolicy('all', { slashes: true, unicodes: true }),
});

export type StringEscapePolicyName = keyof typeof StringEscapePolicy;

function isPolicyName(name: string): name is StringEscapePolicyName {
	return Object.prototype.hasOwnProperty.call(StringEscapePolicy, name);
}

/**
 * Resolves a built-in policy from its constant name (`ALL_UNICODES`) or its
 * kebab-case name (`all-unicodes`), ignoring case.
 */
export function escapePolicyByName(name: string): EscapePolicy {
	const constant = name.trim().toUpperCase().replace(/-/g, '_');
	if (!isPolicyName(constant)) {
		throw new ConfigurationError(
			`Unknown escape policy '${name}' (expected one of ${Object.values(StringEscapePolicy).map(p => p.name).join(', ')})`
		);
	}
	return StringEscapePolicy[constant];
}
