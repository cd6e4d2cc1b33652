import { expect } from 'chai';
import {
	childCount,
	fromJsValue,
	isArray,
	isBoolean,
	isContainer,
	isEmptyContainer,
	isNull,
	isNumber,
	isObject,
	isString,
	nodesEqual,
} from '../src/value/json-value.js';
import { parseJson } from '../src/value/reader.js';
import { isDecimal } from '../src/flatten/output.js';
import { JsonDecimal } from '../src/value/decimal.js';
import { FlatkeyError } from '../src/common/errors.js';

describe('JSON value model', () => {
	it('classifies nodes', () => {
		const node = parseJson('[{}, [], "s", 1, true, null]');
		if (!isArray(node)) throw new Error('expected array');
		const [obj, arr, str, num, bool, nil] = node.elements;
		expect(isObject(obj)).to.equal(true);
		expect(isArray(arr)).to.equal(true);
		expect(isString(str)).to.equal(true);
		expect(isNumber(num)).to.equal(true);
		expect(isBoolean(bool)).to.equal(true);
		expect(isNull(nil)).to.equal(true);
		expect(isContainer(obj) && isContainer(arr)).to.equal(true);
		expect(isContainer(str)).to.equal(false);
		expect(childCount(node)).to.equal(6);
	});

	it('recognizes empty containers only', () => {
		expect(isEmptyContainer(parseJson('{}'))).to.equal(true);
		expect(isEmptyContainer(parseJson('[]'))).to.equal(true);
		expect(isEmptyContainer(parseJson('[0]'))).to.equal(false);
		expect(isEmptyContainer(parseJson('""'))).to.equal(false);
	});

	describe('fromJsValue', () => {
		it('converts parsed values in enumeration order', () => {
			expect(fromJsValue({ b: [1, 'x'], a: { c: null, d: false } })).to.deep.equal({
				type: 'object',
				members: [
					{
						name: 'b',
						value: { type: 'array', elements: [{ type: 'number', text: '1' }, { type: 'string', value: 'x' }] },
					},
					{
						name: 'a',
						value: {
							type: 'object',
							members: [
								{ name: 'c', value: { type: 'null' } },
								{ name: 'd', value: { type: 'boolean', value: false } },
							],
						},
					},
				],
			});
		});

		it('writes numbers as their shortest text', () => {
			expect(fromJsValue(0.5)).to.deep.equal({ type: 'number', text: '0.5' });
			expect(fromJsValue(1e21)).to.deep.equal({ type: 'number', text: '1e+21' });
		});

		it('rejects non-finite numbers', () => {
			expect(() => fromJsValue([NaN])).to.throw(FlatkeyError, 'Cannot represent NaN as a JSON number');
		});

		it('matches the reader for the same document', () => {
			expect(nodesEqual(fromJsValue({ a: [1, { b: 'c' }] }), parseJson('{"a":[1,{"b":"c"}]}'))).to.equal(true);
		});
	});

	describe('nodesEqual', () => {
		it('compares structure, member order and number text', () => {
			expect(nodesEqual(parseJson('{"a":[1,2]}'), parseJson('{ "a" : [ 1 , 2 ] }'))).to.equal(true);
			expect(nodesEqual(parseJson('{"a":1,"b":2}'), parseJson('{"b":2,"a":1}'))).to.equal(false);
			expect(nodesEqual(parseJson('[1.0]'), parseJson('[1]'))).to.equal(false);
			expect(nodesEqual(parseJson('[1]'), parseJson('[1,2]'))).to.equal(false);
			expect(nodesEqual(parseJson('null'), parseJson('false'))).to.equal(false);
		});
	});

	it('identifies decimals among output values', () => {
		expect(isDecimal(JsonDecimal.parse('1'))).to.equal(true);
		expect(isDecimal('1')).to.equal(false);
	});
});
