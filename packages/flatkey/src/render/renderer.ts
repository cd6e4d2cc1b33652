import type { EscapePolicy } from '../escape/policy.js';
import type { OutputValue } from '../flatten/output.js';
import { isOutputList, isOutputMap } from '../flatten/output.js';
import type { JsonDecimal } from '../value/decimal.js';
import { PrintMode } from './print-mode.js';

/**
 * Turns a flattened mapping, or a single stored value, into text.
 */
export interface Renderer {
	render(value: OutputValue, printMode: PrintMode): string;
}

interface Layout {
	/** Written after the comma between entries. */
	readonly entrySpacing: string;
	/** Written between a key and its value. */
	readonly keySeparator: string;
	/** Indentation unit; null keeps everything on one line. */
	readonly indent: string | null;
}

const LAYOUTS: Record<PrintMode, Layout> = {
	[PrintMode.MINIMAL]: { entrySpacing: '', keySeparator: ':', indent: null },
	[PrintMode.REGULAR]: { entrySpacing: ' ', keySeparator: ': ', indent: null },
	[PrintMode.PRETTY]: { entrySpacing: '', keySeparator: ': ', indent: '  ' },
};

type RenderFrame =
	| { kind: 'map'; entries: [string, OutputValue][]; position: number }
	| { kind: 'list'; items: OutputValue[]; position: number };

/**
 * Renders output values as JSON.
 *
 * Map keys are written verbatim: they come out of the key encoder already
 * escaped. String values are escaped with the configured policy.
 */
export class JsonRenderer implements Renderer {
	constructor(private readonly escapePolicy: EscapePolicy) {}

	render(value: OutputValue, printMode: PrintMode = PrintMode.MINIMAL): string {
		const layout = LAYOUTS[printMode];
		const out: string[] = [];
		const stack: RenderFrame[] = [];

		const open = (item: OutputValue): void => {
			if (isOutputMap(item)) {
				if (item.size === 0) {
					out.push('{}');
				} else {
					out.push('{');
					stack.push({ kind: 'map', entries: [...item], position: 0 });
				}
			} else if (isOutputList(item)) {
				if (item.length === 0) {
					out.push('[]');
				} else {
					out.push('[');
					stack.push({ kind: 'list', items: item, position: 0 });
				}
			} else {
				out.push(this.scalar(item));
			}
		};

		const newline = (depth: number): void => {
			if (layout.indent !== null) {
				out.push('\n' + layout.indent.repeat(depth));
			}
		};

		open(value);
		while (stack.length > 0) {
			const frame = stack[stack.length - 1];
			const size = frame.kind === 'map' ? frame.entries.length : frame.items.length;

			if (frame.position >= size) {
				stack.pop();
				newline(stack.length);
				out.push(frame.kind === 'map' ? '}' : ']');
				continue;
			}

			if (frame.position > 0) {
				out.push(',' + layout.entrySpacing);
			}
			newline(stack.length);

			if (frame.kind === 'map') {
				const [key, child] = frame.entries[frame.position++];
				out.push(`"${key}"${layout.keySeparator}`);
				open(child);
			} else {
				open(frame.items[frame.position++]);
			}
		}

		return out.join('');
	}

	private scalar(value: string | boolean | null | JsonDecimal): string {
		if (value === null) return 'null';
		if (typeof value === 'string') return `"${this.escapePolicy.escape(value)}"`;
		if (typeof value === 'boolean') return value ? 'true' : 'false';
		return value.toString();
	}
}
