/**
 * UseCase Interface
 *
 * UseCases encapsulate a single business operation. Each use case:
 * - Takes a command (input data) and execution context (caller, tracing, deadline)
 * - Performs validation and business rule checks
 * - Creates or modifies one aggregate
 * - Returns a Result containing a domain event on success
 *
 * Key Constraint: UseCases can ONLY return success through UnitOfWork.commit(),
 * which guarantees domain events and audit logs are always created.
 *
 * Authorization is not a use case concern: the command dispatcher checks
 * permissions before a use case runs.
 *
 * @example
 * ```typescript
 * export function createDeactivateUserGrantUseCase(deps: Deps): UseCase<DeactivateUserGrantCommand, UserGrantDeactivated> {
 *     return {
 *         async execute(command, context) {
 *             const grant = await deps.userGrants.findById(command.grantId);
 *             if (!grant || grant.state === 'REMOVED') {
 *                 return Result.failure(UseCaseError.notFound('USER_GRANT_NOT_FOUND', 'User grant not found'));
 *             }
 *             const deactivated = UserGrant.deactivate(grant, new Date());
 *             const event = new UserGrantDeactivated(context, deactivated);
 *             return deps.unitOfWork.commit(deactivated, event, command, { deadline: context.deadline });
 *         },
 *     };
 * }
 * ```
 */

import type { Result, DomainEvent, ExecutionContext } from '@castellan/domain-core';
import type { Command } from './command.js';

/**
 * @typeParam TCommand - The command type (input data)
 * @typeParam TEvent - The domain event type (output on success)
 */
export interface UseCase<TCommand extends Command, TEvent extends DomainEvent> {
	execute(command: TCommand, context: ExecutionContext): Promise<Result<TEvent>>;
}

/**
 * @example
 * ```typescript
 * type Cmd = UseCaseCommand<typeof addUserGrant>; // AddUserGrantCommand
 * ```
 */
export type UseCaseCommand<T> = T extends UseCase<infer TCommand, DomainEvent> ? TCommand : never;

export type UseCaseEvent<T> = T extends UseCase<Command, infer TEvent> ? TEvent : never;
