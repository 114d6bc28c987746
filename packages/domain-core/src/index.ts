/**
 * @castellan/domain-core
 *
 * Core domain types: Result, error taxonomy, resource scopes, execution and
 * caller context, domain events, change details and the unit of work.
 */

export {
	UseCaseError,
	type UseCaseErrorBase,
	type UseCaseErrorType,
	type PermissionDeniedError,
	type ValidationError,
	type NotFoundError,
	type FailedPreconditionError,
	type ConflictError,
	type DeadlineExceededError,
	type InternalError,
} from './errors.js';

export {
	Result,
	type Success,
	type Failure,
	isSuccess,
	isFailure,
	RESULT_SUCCESS_TOKEN,
	type ResultSuccessToken,
} from './result.js';

export { ResourceScope, type ResourceScopeKind } from './resource-scope.js';

export {
	ExecutionContext,
	type Caller,
	type Membership,
	type ExecutionContextOptions,
} from './execution-context.js';

export {
	DomainEvent,
	BaseDomainEvent,
	type DomainEventBase,
	type DomainEventMetadata,
	type ParsedSubject,
} from './domain-event.js';

export { ChangeDetails } from './change-details.js';

export { type Aggregate, type CommitOptions, type UnitOfWork } from './unit-of-work.js';
