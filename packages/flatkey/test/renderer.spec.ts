import { expect } from 'chai';
import { JsonRenderer } from '../src/render/renderer.js';
import { PrintMode, isPrintMode } from '../src/render/print-mode.js';
import { StringEscapePolicy } from '../src/escape/policy.js';
import { JsonDecimal } from '../src/value/decimal.js';
import type { OutputMap, OutputValue } from '../src/flatten/output.js';

describe('JsonRenderer', () => {
	const renderer = new JsonRenderer(StringEscapePolicy.DEFAULT);

	function sample(): OutputMap {
		return new Map<string, OutputValue>([
			['a.b', JsonDecimal.parse('1')],
			['c', 'x"y'],
			['d', [true, null]],
		]);
	}

	it('renders compactly in MINIMAL mode', () => {
		expect(renderer.render(sample(), PrintMode.MINIMAL)).to.equal('{"a.b":1,"c":"x\\"y","d":[true,null]}');
	});

	it('adds single spaces in REGULAR mode', () => {
		expect(renderer.render(sample(), PrintMode.REGULAR)).to.equal('{"a.b": 1, "c": "x\\"y", "d": [true, null]}');
	});

	it('indents by two spaces in PRETTY mode', () => {
		expect(renderer.render(sample(), PrintMode.PRETTY)).to.equal(
			'{\n  "a.b": 1,\n  "c": "x\\"y",\n  "d": [\n    true,\n    null\n  ]\n}'
		);
	});

	it('renders empty containers inline in every mode', () => {
		for (const mode of [PrintMode.MINIMAL, PrintMode.REGULAR, PrintMode.PRETTY]) {
			expect(renderer.render(new Map(), mode)).to.equal('{}');
			expect(renderer.render([], mode)).to.equal('[]');
		}
		expect(renderer.render(new Map<string, OutputValue>([['a', []]]), PrintMode.PRETTY)).to.equal('{\n  "a": []\n}');
	});

	it('writes keys verbatim', () => {
		const map: OutputMap = new Map([['[\\"a b\\"]', JsonDecimal.parse('1')]]);
		expect(renderer.render(map, PrintMode.MINIMAL)).to.equal('{"[\\"a b\\"]":1}');
	});

	it('renders scalars on their own', () => {
		expect(renderer.render(JsonDecimal.parse('1E+3'), PrintMode.MINIMAL)).to.equal('1E+3');
		expect(renderer.render('hi', PrintMode.PRETTY)).to.equal('"hi"');
		expect(renderer.render(false, PrintMode.MINIMAL)).to.equal('false');
		expect(renderer.render(null, PrintMode.MINIMAL)).to.equal('null');
	});

	it('escapes string values with its policy', () => {
		const all = new JsonRenderer(StringEscapePolicy.ALL);
		expect(all.render('a/é', PrintMode.MINIMAL)).to.equal('"a\\/\\u00e9"');
		expect(renderer.render('a/é', PrintMode.MINIMAL)).to.equal('"a/é"');
	});

	it('renders deep nesting without recursion', () => {
		const depth = 100000;
		const root: OutputValue[] = [];
		let current = root;
		for (let i = 1; i < depth; i++) {
			const next: OutputValue[] = [];
			current.push(next);
			current = next;
		}
		expect(renderer.render(root, PrintMode.MINIMAL)).to.equal('['.repeat(depth - 1) + '[]' + ']'.repeat(depth - 1));
	});

	it('recognizes print modes by value', () => {
		expect(isPrintMode('pretty')).to.equal(true);
		expect(isPrintMode('PRETTY')).to.equal(false);
	});
});
