import { expect } from 'chai';
import { Cached } from '../src/common/cached.js';

describe('Cached', () => {
	it('computes on first access only', () => {
		let calls = 0;
		const cached = new Cached(() => ++calls);
		expect(cached.hasValue).to.equal(false);
		expect(cached.value).to.equal(1);
		expect(cached.value).to.equal(1);
		expect(cached.hasValue).to.equal(true);
		expect(calls).to.equal(1);
	});

	it('retries after a failed computation', () => {
		let calls = 0;
		const cached = new Cached(() => {
			calls++;
			throw new Error('not yet');
		});
		expect(() => cached.value).to.throw('not yet');
		expect(() => cached.value).to.throw('not yet');
		expect(calls).to.equal(2);
		expect(cached.hasValue).to.equal(false);
	});

	it('wraps a known value', () => {
		const cached = Cached.of(undefined);
		expect(cached.hasValue).to.equal(true);
		expect(cached.value).to.equal(undefined);
	});
});
