import { expect } from 'chai';
import {
	ConfigurationError,
	FlatkeyError,
	MalformedJsonError,
	SourceReadError,
	formatErrorChain,
	unwrapError,
} from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';

describe('Errors', () => {
	it('appends the location to the message when one is given', () => {
		const error = new FlatkeyError('Bad thing', StatusCode.ERROR, undefined, 3, 7);
		expect(error.message).to.equal('Bad thing (at line 3, column 7)');
		expect(new FlatkeyError('Bad thing').message).to.equal('Bad thing');
	});

	it('gives each subclass its name and status code', () => {
		const malformed = new MalformedJsonError('Unexpected token', 4, 1, 5);
		expect(malformed).to.be.instanceOf(FlatkeyError);
		expect(malformed.name).to.equal('MalformedJsonError');
		expect(malformed.code).to.equal(StatusCode.FORMAT);
		expect(malformed.offset).to.equal(4);

		const config = new ConfigurationError('Separator must be a single character');
		expect(config.name).to.equal('ConfigurationError');
		expect(config.code).to.equal(StatusCode.MISUSE);
		expect(new ConfigurationError().message).to.equal('Invalid configuration');
	});

	it('unwraps the cause chain outermost first', () => {
		const error = new SourceReadError('read failed', new Error('boom'));
		expect(unwrapError(error)).to.deep.equal([
			{ name: 'SourceReadError', message: 'read failed', code: StatusCode.IOERR },
			{ name: 'Error', message: 'boom', code: undefined },
		]);
	});

	it('unwraps non-error values', () => {
		expect(unwrapError('plain')).to.deep.equal([{ name: 'Error', message: 'plain' }]);
	});

	it('formats the chain with indented causes', () => {
		const error = new SourceReadError('read failed', new Error('boom'));
		expect(formatErrorChain(error)).to.equal('SourceReadError: read failed\n  caused by Error: boom');
	});
});
