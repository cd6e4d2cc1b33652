import { FlatkeyError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

const DECIMAL_LITERAL = /^(-?)(0|[1-9]\d*)(?:\.(\d+))?(?:[eE]([+-]?\d+))?$/;

/**
 * Exact decimal number backed by its JSON literal.
 *
 * The literal text is kept as written, so `2.30` renders as `2.30` and
 * `1E+3` as `1E+3`. Numeric identity is `unscaled * 10^-scale`.
 */
export class JsonDecimal {
	private constructor(
		public readonly text: string,
		public readonly unscaled: bigint,
		public readonly scale: number,
	) {}

	/**
	 * Parses a JSON number literal.
	 * @throws FlatkeyError (FORMAT) when the text is not a JSON number
	 */
	static parse(text: string): JsonDecimal {
		const match = DECIMAL_LITERAL.exec(text);
		if (!match) {
			throw new FlatkeyError(`Not a JSON number literal: '${text}'`, StatusCode.FORMAT);
		}
		const [, sign, integerPart, fraction = '', exponent = '0'] = match;
		const digits = BigInt(integerPart + fraction);
		const scale = fraction.length - parseInt(exponent, 10);
		return new JsonDecimal(text, sign === '-' ? -digits : digits, scale);
	}

	/** Converts a finite JS number through its shortest round-trip text. */
	static fromNumber(value: number): JsonDecimal {
		if (!Number.isFinite(value)) {
			throw new FlatkeyError(`Cannot represent ${value} as a JSON number`, StatusCode.FORMAT);
		}
		return JsonDecimal.parse(String(value));
	}

	toString(): string {
		return this.text;
	}

	/** Nearest binary double; may lose precision. */
	toNumber(): number {
		return Number(this.text);
	}

	/** Value equality: `2.30`, `2.3` and `23e-1` are equal. */
	equals(other: JsonDecimal): boolean {
		const a = normalize(this.unscaled, this.scale);
		const b = normalize(other.unscaled, other.scale);
		return a.unscaled === b.unscaled && a.scale === b.scale;
	}
}

function normalize(unscaled: bigint, scale: number): { unscaled: bigint; scale: number } {
	if (unscaled === 0n) return { unscaled, scale: 0 };
	while (unscaled % 10n === 0n) {
		unscaled /= 10n;
		scale--;
	}
	return { unscaled, scale };
}
