/**
 * Validation Utilities
 *
 * Helper functions for common validation patterns in use cases.
 * All validation functions return Result types for consistent error handling.
 *
 * @example
 * ```typescript
 * const userId = validateRequired(command.userId, 'userId', 'USER_ID_REQUIRED');
 * if (Result.isFailure(userId)) return Result.failure(userId.error);
 *
 * const roleKeys = validateNonEmptyList(command.roleKeys, 'roleKeys', 'ROLE_KEYS_REQUIRED');
 * if (Result.isFailure(roleKeys)) return Result.failure(roleKeys.error);
 * ```
 */

import { Result, UseCaseError } from '@castellan/domain-core';

/**
 * Validate that a value is not null, undefined, or a blank string.
 */
export function validateRequired<T>(
	value: T | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<T> {
	if (value === null || value === undefined || (typeof value === 'string' && value.trim() === '')) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} is required`, { field: fieldName }),
		);
	}

	return unsafeSuccess(value);
}

/**
 * Validate that a list of strings has at least one non-blank entry, returning
 * the entries trimmed with duplicates collapsed to their first occurrence.
 */
export function validateNonEmptyList(
	values: readonly string[] | null | undefined,
	fieldName: string,
	errorCode: string,
	errorMessage?: string,
): Result<string[]> {
	const cleaned = uniqueInOrder((values ?? []).map((v) => v.trim()).filter((v) => v !== ''));

	if (cleaned.length === 0) {
		return Result.failure(
			UseCaseError.validation(errorCode, errorMessage ?? `${fieldName} must contain at least one entry`, {
				field: fieldName,
			}),
		);
	}

	return unsafeSuccess(cleaned);
}

/**
 * Validate that a value is within a numeric range.
 */
export function validateRange(
	value: number,
	min: number,
	max: number,
	fieldName: string,
	errorCode: string,
): Result<number> {
	if (!Number.isFinite(value) || value < min || value > max) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be between ${min} and ${max}`, {
				field: fieldName,
				value,
				min,
				max,
			}),
		);
	}

	return unsafeSuccess(value);
}

/**
 * Validate that a value is a whole number within a range.
 */
export function validateIntegerRange(
	value: number,
	min: number,
	max: number,
	fieldName: string,
	errorCode: string,
): Result<number> {
	if (!Number.isInteger(value)) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be a whole number`, {
				field: fieldName,
				value,
			}),
		);
	}
	return validateRange(value, min, max, fieldName, errorCode);
}

/**
 * Validate that a value is one of the allowed values.
 */
export function validateOneOf<T>(
	value: T,
	allowedValues: readonly T[],
	fieldName: string,
	errorCode: string,
): Result<T> {
	if (!allowedValues.includes(value)) {
		return Result.failure(
			UseCaseError.validation(errorCode, `${fieldName} must be one of: ${allowedValues.join(', ')}`, {
				field: fieldName,
				value,
				allowedValues,
			}),
		);
	}

	return unsafeSuccess(value);
}

/**
 * Chain multiple validations together.
 * Stops at the first failure.
 */
export function validateAll(...validations: Array<() => Result<unknown>>): Result<void> {
	for (const validation of validations) {
		const result = validation();
		if (Result.isFailure(result)) {
			return Result.failure(result.error);
		}
	}

	return unsafeSuccess(undefined);
}

/**
 * Collapse duplicates, keeping the first occurrence of each value.
 */
export function uniqueInOrder<T>(values: readonly T[]): T[] {
	return [...new Set(values)];
}

/**
 * Success results for validation.
 *
 * Validation runs before the unit of work and changes no state, so it may
 * create successes without the token. The success a use case returns still
 * comes from UnitOfWork.commit().
 */
function unsafeSuccess<T>(value: T): Result<T> {
	return { _tag: 'success', value };
}
