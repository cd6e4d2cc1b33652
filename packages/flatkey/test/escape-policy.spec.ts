import { expect } from 'chai';
import { StringEscapePolicy, createEscapePolicy, escapePolicyByName } from '../src/escape/policy.js';
import { ConfigurationError } from '../src/common/errors.js';

describe('Escape policies', () => {
	describe('DEFAULT', () => {
		const policy = StringEscapePolicy.DEFAULT;

		it('escapes quotes, backslashes and short control characters', () => {
			expect(policy.escape('a"b\\c\n')).to.equal('a\\"b\\\\c\\n');
			expect(policy.escape('\b\f\r\t')).to.equal('\\b\\f\\r\\t');
		});

		it('escapes other control characters as lowercase unicode escapes', () => {
			expect(policy.escape('\u0001\u001f')).to.equal('\\u0001\\u001f');
		});

		it('leaves slashes and non-ASCII text alone', () => {
			expect(policy.escape('a/é')).to.equal('a/é');
		});

		it('returns plain text unchanged', () => {
			expect(policy.escape('plain')).to.equal('plain');
		});
	});

	it('ALL_SLASHES escapes forward slashes', () => {
		expect(StringEscapePolicy.ALL_SLASHES.escape('a/b')).to.equal('a\\/b');
		expect(StringEscapePolicy.ALL_SLASHES.escape('é')).to.equal('é');
	});

	it('ALL_UNICODES escapes every code unit above tilde', () => {
		expect(StringEscapePolicy.ALL_UNICODES.escape('é/')).to.equal('\\u00e9/');
		expect(StringEscapePolicy.ALL_UNICODES.escape('😀')).to.equal('\\ud83d\\ude00');
		expect(StringEscapePolicy.ALL_UNICODES.escape('\u007f~')).to.equal('\\u007f~');
	});

	it('ALL escapes both slashes and non-ASCII text', () => {
		expect(StringEscapePolicy.ALL.escape('é/')).to.equal('\\u00e9\\/');
	});

	it('custom policies carry their name', () => {
		const policy = createEscapePolicy('slashes-only', { slashes: true });
		expect(policy.name).to.equal('slashes-only');
		expect(policy.escape('"/"')).to.equal('\\"\\/\\"');
	});

	describe('escapePolicyByName', () => {
		it('accepts kebab-case and constant names, ignoring case', () => {
			expect(escapePolicyByName('all-unicodes')).to.equal(StringEscapePolicy.ALL_UNICODES);
			expect(escapePolicyByName('ALL_SLASHES')).to.equal(StringEscapePolicy.ALL_SLASHES);
			expect(escapePolicyByName(' Default ')).to.equal(StringEscapePolicy.DEFAULT);
			expect(escapePolicyByName('all')).to.equal(StringEscapePolicy.ALL);
		});

		it('rejects unknown names', () => {
			expect(() => escapePolicyByName('nope')).to.throw(
				ConfigurationError,
				"Unknown escape policy 'nope' (expected one of default, all-slashes, all-unicodes, all)"
			);
		});
	});
});
