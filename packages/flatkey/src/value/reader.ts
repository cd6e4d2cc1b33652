import { MalformedJsonError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { JsonArrayNode, JsonNode, JsonObjectNode } from './json-value.js';

const log = createLogger('value:reader');

const NUMBER_LITERAL = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;

const SIMPLE_ESCAPES: Record<string, string> = {
	'"': '"',
	'\\': '\\',
	'/': '/',
	b: '\b',
	f: '\f',
	n: '\n',
	r: '\r',
	t: '\t',
};

/** An object or array whose closing bracket has not been read yet. */
type OpenContainer =
	| { node: JsonObjectNode; memberName: string }
	| { node: JsonArrayNode };

/**
 * Strict JSON (RFC 8259) reader producing the node model.
 *
 * Containers are tracked on an explicit stack so nesting depth is bounded by
 * memory, not by the call stack. Member order, duplicate member names and the
 * literal text of numbers are preserved.
 */
export class JsonReader {
	private current = 0;

	constructor(private readonly source: string) {}

	read(): JsonNode {
		const stack: OpenContainer[] = [];

		for (;;) {
			let value = this.openValue(stack);
			if (value === undefined) {
				continue;	// a non-empty container was opened; read its first child
			}

			// Attach the completed value, closing containers that end with it
			for (;;) {
				const top = stack[stack.length - 1];
				if (top === undefined) {
					this.skipWhitespace();
					if (!this.isAtEnd()) {
						this.fail('Unexpected content after JSON value');
					}
					log('Read %d characters', this.source.length);
					return value;
				}

				if ('memberName' in top) {
					top.node.members.push({ name: top.memberName, value });
				} else {
					top.node.elements.push(value);
				}

				this.skipWhitespace();
				const c = this.advance();
				if (c === ',') {
					if ('memberName' in top) {
						this.skipWhitespace();
						top.memberName = this.memberName();
					}
					break;
				}
				const closing = 'memberName' in top ? '}' : ']';
				if (c === '') {
					this.fail('Unexpected end of input');
				}
				if (c !== closing) {
					this.fail(`Expected ',' or '${closing}' but found '${c}'`, this.current - 1);
				}
				stack.pop();
				value = top.node;
			}
		}
	}

	/**
	 * Reads the start of a value. Returns the finished node, or undefined when a
	 * non-empty container was pushed onto the stack instead.
	 */
	private openValue(stack: OpenContainer[]): JsonNode | undefined {
		this.skipWhitespace();
		const start = this.current;
		const c = this.advance();

		switch (c) {
			case '{': {
				const node: JsonObjectNode = { type: 'object', members: [] };
				this.skipWhitespace();
				if (this.match('}')) return node;
				stack.push({ node, memberName: this.memberName() });
				return undefined;
			}
			case '[': {
				const node: JsonArrayNode = { type: 'array', elements: [] };
				this.skipWhitespace();
				if (this.match(']')) return node;
				stack.push({ node });
				return undefined;
			}
			case '"':
				return { type: 'string', value: this.string() };
			case 't':
				this.literal('true', start);
				return { type: 'boolean', value: true };
			case 'f':
				this.literal('false', start);
				return { type: 'boolean', value: false };
			case 'n':
				this.literal('null', start);
				return { type: 'null' };
			case '':
				return this.fail('Unexpected end of input', start);
			default:
				if (c === '-' || this.isDigit(c)) {
					return { type: 'number', text: this.number(start) };
				}
				return this.fail(`Unexpected character '${c}'`, start);
		}
	}

	/** Reads `"name"` followed by `:`. */
	private memberName(): string {
		const start = this.current;
		if (!this.match('"')) {
			this.fail(this.isAtEnd() ? 'Unexpected end of input' : 'Expected member name', start);
		}
		const name = this.string();
		this.skipWhitespace();
		if (!this.match(':')) {
			this.fail(`Expected ':' after member name "${name}"`);
		}
		return name;
	}

	private string(): string {
		let result = '';
		let chunkStart = this.current;

		for (;;) {
			if (this.isAtEnd()) {
				this.fail('Unterminated string');
			}
			const c = this.source[this.current];
			if (c === '"') {
				result += this.source.substring(chunkStart, this.current);
				this.current++;
				return result;
			}
			if (c === '\\') {
				result += this.source.substring(chunkStart, this.current);
				this.current++;
				result += this.escape();
				chunkStart = this.current;
				continue;
			}
			if (c.charCodeAt(0) < 0x20) {
				this.fail('Unescaped control character in string');
			}
			this.current++;
		}
	}

	private escape(): string {
		const start = this.current - 1;
		const c = this.advance();
		const simple = SIMPLE_ESCAPES[c];
		if (simple !== undefined) return simple;
		if (c === 'u') {
			const hex = this.source.substring(this.current, this.current + 4);
			if (!/^[0-9a-fA-F]{4}$/.test(hex)) {
				this.fail('Invalid unicode escape', start);
			}
			this.current += 4;
			return String.fromCharCode(parseInt(hex, 16));
		}
		return this.fail(c === '' ? 'Unterminated string' : `Invalid escape sequence '\\${c}'`, start);
	}

	private number(start: number): string {
		NUMBER_LITERAL.lastIndex = start;
		const match = NUMBER_LITERAL.exec(this.source);
		if (!match) {
			return this.fail('Invalid number literal', start);
		}
		const end = start + match[0].length;
		// `01`, `1.` and `1e` leave a digit, dot or exponent marker behind
		if (end < this.source.length && /[0-9.eE+-]/.test(this.source[end])) {
			return this.fail('Invalid number literal', start);
		}
		this.current = end;
		return match[0];
	}

	private literal(word: string, start: number): void {
		if (this.source.startsWith(word, start)) {
			this.current = start + word.length;
			return;
		}
		this.fail('Unexpected token', start);
	}

	private skipWhitespace(): void {
		while (!this.isAtEnd()) {
			const c = this.source[this.current];
			if (c !== ' ' && c !== '\t' && c !== '\n' && c !== '\r') return;
			this.current++;
		}
	}

	private isAtEnd(): boolean {
		return this.current >= this.source.length;
	}

	private advance(): string {
		if (this.isAtEnd()) return '';
		return this.source[this.current++];
	}

	private match(expected: string): boolean {
		if (this.source[this.current] !== expected) return false;
		this.current++;
		return true;
	}

	private isDigit(c: string): boolean {
		return c >= '0' && c <= '9';
	}

	private fail(message: string, offset: number = this.current): never {
		const { line, column } = this.locate(offset);
		log.extend('error')('%s at offset %d', message, offset);
		throw new MalformedJsonError(message, offset, line, column);
	}

	private locate(offset: number): { line: number; column: number } {
		let line = 1;
		let lineStart = 0;
		for (let i = 0; i < offset && i < this.source.length; i++) {
			if (this.source[i] === '\n') {
				line++;
				lineStart = i + 1;
			}
		}
		return { line, column: offset - lineStart + 1 };
	}
}

/**
 * Parses JSON text into a node tree.
 * @throws MalformedJsonError when the text is not a single valid JSON value
 */
export function parseJson(text: string): JsonNode {
	return new JsonReader(text).read();
}
