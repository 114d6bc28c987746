/**
 * Use Case Error Types
 *
 * Sealed error hierarchy for use case failures. Errors are categorized by type
 * to enable consistent HTTP status mapping and client-side handling.
 *
 * HTTP Status Mapping:
 * - PermissionDeniedError → 403 Forbidden
 * - ValidationError → 400 Bad Request
 * - NotFoundError → 404 Not Found
 * - FailedPreconditionError → 412 Precondition Failed
 * - ConflictError → 409 Conflict
 * - DeadlineExceededError → 504 Gateway Timeout
 * - InternalError → 500 Internal Server Error
 */

/**
 * Base interface for all use case errors.
 */
export interface UseCaseErrorBase {
	readonly type: string;
	readonly code: string;
	readonly message: string;
	readonly details: Record<string, unknown>;
}

/**
 * Caller lacks the role or scope for the action. Checked before anything is
 * read, so it never reveals whether the target exists.
 */
export interface PermissionDeniedError extends UseCaseErrorBase {
	readonly type: 'permission_denied';
}

/**
 * Malformed or contradictory input (InvalidArgument).
 */
export interface ValidationError extends UseCaseErrorBase {
	readonly type: 'validation';
}

/**
 * Target absent, owned by another tenant, or no longer eligible.
 */
export interface NotFoundError extends UseCaseErrorBase {
	readonly type: 'not_found';
}

/**
 * Target exists but its current state disallows the transition.
 */
export interface FailedPreconditionError extends UseCaseErrorBase {
	readonly type: 'failed_precondition';
}

/**
 * Optimistic concurrency collision. Nothing was applied; re-read and retry.
 */
export interface ConflictError extends UseCaseErrorBase {
	readonly type: 'conflict';
}

/**
 * The caller's deadline passed before the operation completed.
 */
export interface DeadlineExceededError extends UseCaseErrorBase {
	readonly type: 'deadline_exceeded';
}

/**
 * Collaborator failure (storage unavailable, etc.).
 */
export interface InternalError extends UseCaseErrorBase {
	readonly type: 'internal';
}

/**
 * Union type for all use case errors.
 */
export type UseCaseError =
	| PermissionDeniedError
	| ValidationError
	| NotFoundError
	| FailedPreconditionError
	| ConflictError
	| DeadlineExceededError
	| InternalError;

export type UseCaseErrorType = UseCaseError['type'];

const ERROR_TYPES: ReadonlySet<string> = new Set<UseCaseErrorType>([
	'permission_denied',
	'validation',
	'not_found',
	'failed_precondition',
	'conflict',
	'deadline_exceeded',
	'internal',
]);

/**
 * Factory functions for creating errors.
 */
export const UseCaseError = {
	/**
	 * @example
	 * ```typescript
	 * UseCaseError.permissionDenied('PERMISSION_DENIED', 'Missing permission', { permission: 'iam:policy:security:write' })
	 * ```
	 */
	permissionDenied(code: string, message: string, details: Record<string, unknown> = {}): PermissionDeniedError {
		return { type: 'permission_denied', code, message, details };
	},

	/**
	 * @example
	 * ```typescript
	 * UseCaseError.validation('ROLE_KEYS_REQUIRED', 'At least one role key is required')
	 * ```
	 */
	validation(code: string, message: string, details: Record<string, unknown> = {}): ValidationError {
		return { type: 'validation', code, message, details };
	},

	notFound(code: string, message: string, details: Record<string, unknown> = {}): NotFoundError {
		return { type: 'not_found', code, message, details };
	},

	/**
	 * @example
	 * ```typescript
	 * UseCaseError.failedPrecondition('GRANT_NOT_ACTIVE', 'User grant is not active', { state: 'INACTIVE' })
	 * ```
	 */
	failedPrecondition(code: string, message: string, details: Record<string, unknown> = {}): FailedPreconditionError {
		return { type: 'failed_precondition', code, message, details };
	},

	/**
	 * @example
	 * ```typescript
	 * UseCaseError.conflict('SEQUENCE_CONFLICT', 'Aggregate was modified concurrently', { expected: 1, actual: 2 })
	 * ```
	 */
	conflict(code: string, message: string, details: Record<string, unknown> = {}): ConflictError {
		return { type: 'conflict', code, message, details };
	},

	deadlineExceeded(code: string, message: string, details: Record<string, unknown> = {}): DeadlineExceededError {
		return { type: 'deadline_exceeded', code, message, details };
	},

	internal(code: string, message: string, details: Record<string, unknown> = {}): InternalError {
		return { type: 'internal', code, message, details };
	},

	/**
	 * Get the HTTP status code for an error.
	 */
	httpStatus(error: UseCaseError): number {
		switch (error.type) {
			case 'permission_denied':
				return 403;
			case 'validation':
				return 400;
			case 'not_found':
				return 404;
			case 'failed_precondition':
				return 412;
			case 'conflict':
				return 409;
			case 'deadline_exceeded':
				return 504;
			case 'internal':
				return 500;
		}
	},

	/**
	 * Whether a caller may retry the same request unchanged.
	 */
	isRetryable(error: UseCaseError): boolean {
		return error.type === 'conflict' || error.type === 'internal';
	},

	/**
	 * Check if an unknown value is a UseCaseError.
	 */
	isUseCaseError(value: unknown): value is UseCaseError {
		if (typeof value !== 'object' || value === null) return false;
		return (
			'type' in value &&
			typeof value.type === 'string' &&
			ERROR_TYPES.has(value.type) &&
			'code' in value &&
			typeof value.code === 'string' &&
			'message' in value &&
			typeof value.message === 'string' &&
			'details' in value &&
			typeof value.details === 'object'
		);
	},
};
