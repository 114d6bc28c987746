/**
 * Result Type for Use Case Execution
 *
 * This is a discriminated union with two variants:
 * - Success<T> - contains the successful result value
 * - Failure<T> - contains the error details
 *
 * **IMPORTANT:** The `success()` factory is restricted. Only UnitOfWork can create
 * successful results, guaranteeing that a domain event and an audit record are
 * written whenever state changes.
 *
 * Usage in use cases:
 * ```typescript
 * if (command.roleKeys.length === 0) {
 *     return Result.failure(UseCaseError.validation('ROLE_KEYS_REQUIRED', 'At least one role key is required'));
 * }
 *
 * return unitOfWork.commit(grant, event, command, { deadline: context.deadline });
 * ```
 */

import type { UseCaseError } from './errors.js';

/**
 * Token for authorizing Result.success() creation.
 * Only UnitOfWork implementations should have access to this token.
 *
 * @internal
 */
export const RESULT_SUCCESS_TOKEN: unique symbol = Symbol('RESULT_SUCCESS_TOKEN');

/**
 * @internal
 */
export type ResultSuccessToken = typeof RESULT_SUCCESS_TOKEN;

export interface Success<T> {
	readonly _tag: 'success';
	readonly value: T;
}

export interface Failure<T> {
	readonly _tag: 'failure';
	readonly error: UseCaseError;
}

export type Result<T> = Success<T> | Failure<T>;

export function isSuccess<T>(result: Result<T>): result is Success<T> {
	return result._tag === 'success';
}

export function isFailure<T>(result: Result<T>): result is Failure<T> {
	return result._tag === 'failure';
}

/**
 * Result factory functions.
 */
export const Result = {
	/**
	 * Create a successful result.
	 *
	 * **RESTRICTED:** Requires the success token. Use cases must return success
	 * through `unitOfWork.commit()`.
	 *
	 * @throws Error if token is invalid
	 * @internal
	 */
	success<T>(token: ResultSuccessToken, value: T): Success<T> {
		if (token !== RESULT_SUCCESS_TOKEN) {
			throw new Error(
				'Result.success() is restricted. Use UnitOfWork.commit() to create successful results. ' +
					'This ensures domain events and audit logs are always created with state changes.',
			);
		}
		return { _tag: 'success', value };
	},

	/**
	 * Create a failed result. Any code may do this.
	 */
	failure<T>(error: UseCaseError): Failure<T> {
		return { _tag: 'failure', error };
	},

	isSuccess,

	isFailure,

	/**
	 * Map a successful result to a new value.
	 */
	map<T, U>(result: Result<T>, fn: (value: T) => U): Result<U> {
		if (isSuccess(result)) {
			return { _tag: 'success', value: fn(result.value) };
		}
		return { _tag: 'failure', error: result.error };
	},

	/**
	 * Match on a result, handling both success and failure cases.
	 */
	match<T, U>(result: Result<T>, onSuccess: (value: T) => U, onFailure: (error: UseCaseError) => U): U {
		if (isSuccess(result)) {
			return onSuccess(result.value);
		}
		return onFailure(result.error);
	},

	/**
	 * Get the value from a success result, or throw.
	 */
	unwrap<T>(result: Result<T>): T {
		if (isSuccess(result)) {
			return result.value;
		}
		throw new Error(`Cannot unwrap failure result: ${result.error.code} - ${result.error.message}`);
	},
};
