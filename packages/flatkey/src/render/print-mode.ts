/**
 * Layout of rendered JSON text.
 */
export enum PrintMode {
	/** No whitespace at all: `{"a":1,"b":[1,2]}` */
	MINIMAL = 'minimal',
	/** Single line with a space after `,` and `:`: `{"a": 1, "b": [1, 2]}` */
	REGULAR = 'regular',
	/** One entry per line, two-space indentation. */
	PRETTY = 'pretty',
}

const PRINT_MODES: readonly PrintMode[] = Object.values(PrintMode);

export function isPrintMode(value: string): value is PrintMode {
	return PRINT_MODES.some(mode => mode === value);
}
