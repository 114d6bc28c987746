/**
 * @castellan/application
 *
 * Application layer patterns:
 * - Command types for write operation inputs
 * - UseCase and Query interfaces
 * - Validation utilities for input validation
 * - Bounded read-after-write polling
 *
 * @example
 * ```typescript
 * import { type UseCase, validateNonEmptyList } from '@castellan/application';
 * import { Result, type UnitOfWork } from '@castellan/domain-core';
 *
 * export function createUpdateUserGrantUseCase(deps: Deps): UseCase<UpdateUserGrantCommand, UserGrantChanged> {
 *     return {
 *         async execute(command, context) {
 *             const roleKeys = validateNonEmptyList(command.roleKeys, 'roleKeys', 'ROLE_KEYS_REQUIRED');
 *             if (Result.isFailure(roleKeys)) return Result.failure(roleKeys.error);
 *             // ...
 *             return deps.unitOfWork.commit(updated, event, command, { deadline: context.deadline });
 *         },
 *     };
 * }
 * ```
 */

export { type Command, createCommand } from './command.js';

export { type UseCase, type UseCaseCommand, type UseCaseEvent } from './use-case.js';

export { type Query, queryResult } from './query.js';

export {
	validateRequired,
	validateNonEmptyList,
	validateRange,
	validateIntegerRange,
	validateOneOf,
	validateAll,
	uniqueInOrder,
} from './validation.js';

export {
	awaitConsistency,
	nextInterval,
	DEFAULT_CONSISTENCY_TIMEOUT_MS,
	type BackoffStrategy,
	type ConsistencyOptions,
	type ConsistencyProgress,
} from './await-consistency.js';

export {
	Result,
	isSuccess,
	isFailure,
	type Success,
	type Failure,
	UseCaseError,
	ExecutionContext,
	type DomainEvent,
	type UnitOfWork,
} from '@castellan/domain-core';
