/**
 * Unit of Work Pattern
 *
 * Ensures that the aggregate snapshot, its domain event and the audit record
 * are committed atomically.
 *
 * **This is the ONLY way to create a successful Result.** The Result.success()
 * factory requires a token that only UnitOfWork implementations hold.
 *
 * Commits are guarded by optimistic concurrency: the stored sequence of the
 * aggregate must be exactly one below the sequence being written (zero for a
 * new aggregate). Anything else means another writer got there first and the
 * commit fails with a `conflict` error without applying anything.
 *
 * Usage in a use case:
 * ```typescript
 * const deactivated = UserGrant.deactivate(grant, new Date());
 * const event = new UserGrantDeactivated(ctx, deactivated);
 * return unitOfWork.commit(deactivated, event, command, { deadline: ctx.deadline });
 * ```
 */

import type { DomainEvent } from './domain-event.js';
import type { Result } from './result.js';

/**
 * Aggregate root as seen by the unit of work.
 */
export interface Aggregate {
	readonly id: string;
	/** Version after the change being committed */
	readonly sequence: number;
	readonly resourceOwner: string;
	readonly changeDate: Date;
}

export interface CommitOptions {
	/** Refuse to commit once this point in time has passed */
	readonly deadline?: Date | null;
}

export interface UnitOfWork {
	/**
	 * Commit an aggregate change with its domain event atomically.
	 *
	 * 1. Checks the deadline and the expected stored sequence
	 * 2. Persists the aggregate snapshot and its unique constraints
	 * 3. Appends the domain event to the event store (and so the change feed)
	 * 4. Writes the audit log entry
	 *
	 * If any step fails nothing is applied.
	 *
	 * @param command - The command that was executed (for the audit log)
	 */
	commit<T extends DomainEvent>(
		aggregate: Aggregate,
		event: T,
		command: unknown,
		options?: CommitOptions,
	): Promise<Result<T>>;
}

export { RESULT_SUCCESS_TOKEN, type ResultSuccessToken } from './result.js';
