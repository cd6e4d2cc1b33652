/**
 * Key encoding for flattened paths.
 *
 * Format:
 *   a.b          - nested member names joined by the separator
 *   a[0]         - array index in brackets
 *   [\"a.b\"]    - member name that collides with the punctuation (or holds
 *                  whitespace), fenced in brackets and escaped quotes
 *   root         - the empty path
 */

import type { EscapePolicy } from '../escape/policy.js';

/** Reserved key for a root value that cannot be expressed as a map. */
export const ROOT_KEY = 'root';

/** One step from the document root to a node. */
export type PathSegment =
	| { readonly kind: 'name'; readonly name: string }
	| { readonly kind: 'index'; readonly index: number };

export interface KeyEncoding {
	readonly separator: string;
	readonly leftBracket: string;
	readonly rightBracket: string;
	readonly escapePolicy: EscapePolicy;
}

const WHITESPACE = /\s/u;

/**
 * True when a member name must be fenced rather than joined with the separator.
 */
export function needsFencing(name: string, encoding: KeyEncoding): boolean {
	return name.includes(encoding.separator)
		|| name.includes(encoding.leftBracket)
		|| name.includes(encoding.rightBracket)
		|| WHITESPACE.test(name);
}

/**
 * Builds the key for a path.
 */
export function encodeKey(path: readonly PathSegment[], encoding: KeyEncoding): string {
	if (path.length === 0) return ROOT_KEY;

	const { separator, leftBracket, rightBracket, escapePolicy } = encoding;
	let key = '';

	for (const segment of path) {
		if (segment.kind === 'index') {
			key += `${leftBracket}${segment.index}${rightBracket}`;
		} else if (needsFencing(segment.name, encoding)) {
			key += `${leftBracket}\\"${escapePolicy.escape(segment.name)}\\"${rightBracket}`;
		} else {
			if (key.length > 0) key += separator;
			key += escapePolicy.escape(segment.name);
		}
	}

	return key;
}
