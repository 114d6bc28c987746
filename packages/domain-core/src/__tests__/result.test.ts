import { describe, it, expect } from 'vitest';
import { Result, RESULT_SUCCESS_TOKEN } from '../result.js';
import { UseCaseError } from '../errors.js';

describe('Result', () => {
	it('should create a success with the token', () => {
		const result = Result.success(RESULT_SUCCESS_TOKEN, 42);
		expect(Result.isSuccess(result)).toBe(true);
		expect(result.value).toBe(42);
	});

	it('should create a failure', () => {
		const result = Result.failure<number>(UseCaseError.notFound('MISSING', 'missing'));
		expect(Result.isFailure(result)).toBe(true);
		expect(result.error.code).toBe('MISSING');
	});

	it('should map successes and pass failures through', () => {
		const mapped = Result.map(Result.success(RESULT_SUCCESS_TOKEN, 2), (v) => v * 10);
		expect(Result.unwrap(mapped)).toBe(20);

		const failure = Result.failure<number>(UseCaseError.conflict('C', 'conflict'));
		const mappedFailure = Result.map(failure, (v) => v * 10);
		expect(Result.isFailure(mappedFailure)).toBe(true);
	});

	it('should match both branches', () => {
		const ok = Result.match(
			Result.success(RESULT_SUCCESS_TOKEN, 'a'),
			(v) => `ok:${v}`,
			(e) => `err:${e.code}`,
		);
		const err = Result.match(
			Result.failure<string>(UseCaseError.internal('BOOM', 'boom')),
			(v) => `ok:${v}`,
			(e) => `err:${e.code}`,
		);
		expect(ok).toBe('ok:a');
		expect(err).toBe('err:BOOM');
	});

	it('should throw when unwrapping a failure', () => {
		expect(() => Result.unwrap(Result.failure(UseCaseError.validation('BAD', 'bad input')))).toThrow(
			'Cannot unwrap failure result: BAD - bad input',
		);
	});
});
