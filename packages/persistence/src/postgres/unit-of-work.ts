/**
 * Drizzle Transactional Unit of Work
 *
 * Writes the aggregate snapshot, its unique constraint claims, the event and
 * the audit record in one transaction. The snapshot row is only updated when
 * its stored sequence is still the one the aggregate was loaded at.
 */

import {
	type Aggregate,
	type CommitOptions,
	type DomainEvent,
	type UnitOfWork,
	Result,
	RESULT_SUCCESS_TOKEN,
	UseCaseError,
} from '@castellan/domain-core';
import type { Logger } from '@castellan/logging';
import { and, eq, inArray } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import { type AggregateRegistry, type UniqueConstraint, toSnapshot } from '../aggregate-registry.js';
import { buildAuditLogEntry } from '../audit-log.js';
import { aggregates, uniqueConstraints } from '../schema/aggregates.js';
import { auditLogs } from '../schema/audit-logs.js';
import { events } from '../schema/events.js';
import { toPendingEvent } from '../stored-event.js';
import { lockEventAppends } from './event-append.js';
import { toEventRow } from './rows.js';

type Transaction = Parameters<Parameters<PostgresJsDatabase['transaction']>[0]>[0];

export interface DrizzleUnitOfWorkConfig {
	readonly db: PostgresJsDatabase;
	readonly registry: AggregateRegistry;
	readonly logger: Logger;
}

class SequenceConflict extends Error {
	constructor(
		readonly aggregateId: string,
		readonly expectedSequence: number,
		readonly actualSequence: number | null,
	) {
		super(`Aggregate ${aggregateId} was modified concurrently`);
		this.name = 'SequenceConflict';
	}
}

class ConstraintViolation extends Error {
	constructor(readonly constraint: UniqueConstraint) {
		super(constraint.errorMessage);
		this.name = 'ConstraintViolation';
	}
}

class DeadlinePassed extends Error {
	constructor(readonly deadline: Date) {
		super('Deadline passed during commit');
		this.name = 'DeadlinePassed';
	}
}

const UNIQUE_VIOLATION = '23505';

function isUniqueViolation(error: unknown): boolean {
	if (error instanceof postgres.PostgresError) {
		return error.code === UNIQUE_VIOLATION;
	}
	if (error instanceof Error && error.cause !== undefined) {
		return isUniqueViolation(error.cause);
	}
	return false;
}

export function createDrizzleUnitOfWork(config: DrizzleUnitOfWorkConfig): UnitOfWork {
	const { db, registry } = config;
	const logger = config.logger.child({ component: 'persistence', driver: 'postgres' });

	return {
		async commit<T extends DomainEvent>(
			aggregate: Aggregate,
			event: T,
			command: unknown,
			options: CommitOptions = {},
		): Promise<Result<T>> {
			const deadline = options.deadline;
			if (deadline && Date.now() >= deadline.getTime()) {
				return Result.failure(
					UseCaseError.deadlineExceeded('DEADLINE_EXCEEDED', 'Deadline passed before commit', {
						deadline: deadline.toISOString(),
					}),
				);
			}

			const pending = toPendingEvent(event);
			if (!pending) {
				return Result.failure(
					UseCaseError.internal('INVALID_EVENT_SUBJECT', `Cannot derive aggregate from subject '${event.subject}'`),
				);
			}

			const handler = registry.get(pending.aggregateType);
			if (!handler) {
				return Result.failure(
					UseCaseError.internal('UNKNOWN_AGGREGATE_TYPE', `No handler registered for '${pending.aggregateType}'`),
				);
			}
			const typeName = handler.typeName;

			try {
				const constraints = handler.uniqueConstraints?.(aggregate) ?? [];
				const snapshot = toSnapshot(aggregate);
				const audit = buildAuditLogEntry(pending, command);

				await db.transaction(async (tx: Transaction) => {
					const [current] = await tx
						.select({ sequence: aggregates.sequence })
						.from(aggregates)
						.where(and(eq(aggregates.aggregateType, typeName), eq(aggregates.id, aggregate.id)));
					const storedSequence = current?.sequence ?? 0;

					if (aggregate.sequence !== storedSequence + 1) {
						throw new SequenceConflict(aggregate.id, aggregate.sequence - 1, storedSequence);
					}

					if (constraints.length > 0) {
						const owners = await tx
							.select()
							.from(uniqueConstraints)
							.where(
								inArray(
									uniqueConstraints.constraintKey,
									constraints.map((c) => c.key),
								),
							);
						for (const owner of owners) {
							if (owner.aggregateType === typeName && owner.aggregateId === aggregate.id) continue;
							const constraint = constraints.find((c) => c.key === owner.constraintKey);
							if (constraint) {
								throw new ConstraintViolation(constraint);
							}
						}
					}

					await tx
						.delete(uniqueConstraints)
						.where(and(eq(uniqueConstraints.aggregateType, typeName), eq(uniqueConstraints.aggregateId, aggregate.id)));
					if (constraints.length > 0) {
						await tx.insert(uniqueConstraints).values(
							constraints.map((c) => ({ constraintKey: c.key, aggregateType: typeName, aggregateId: aggregate.id })),
						);
					}

					const values = {
						instanceId: pending.instanceId,
						resourceOwner: aggregate.resourceOwner,
						sequence: aggregate.sequence,
						changeDate: aggregate.changeDate,
						snapshot,
					};

					if (!current) {
						await tx.insert(aggregates).values({ aggregateType: typeName, id: aggregate.id, ...values });
					} else {
						const updated = await tx
							.update(aggregates)
							.set(values)
							.where(
								and(
									eq(aggregates.aggregateType, typeName),
									eq(aggregates.id, aggregate.id),
									eq(aggregates.sequence, storedSequence),
								),
							)
							.returning({ sequence: aggregates.sequence });
						if (updated.length === 0) {
							throw new SequenceConflict(aggregate.id, storedSequence, null);
						}
					}

					await lockEventAppends(tx);
					await tx.insert(events).values(toEventRow(pending));
					await tx.insert(auditLogs).values(audit);

					if (deadline && Date.now() >= deadline.getTime()) {
						throw new DeadlinePassed(deadline);
					}
				});

				logger.debug({ aggregateId: aggregate.id, sequence: aggregate.sequence }, 'Committed');
				return Result.success(RESULT_SUCCESS_TOKEN, event);
			} catch (error) {
				return Result.failure(toCommitError(error, aggregate));
			}
		},
	};

	function toCommitError(error: unknown, aggregate: Aggregate): UseCaseError {
		if (error instanceof SequenceConflict) {
			logger.debug({ aggregateId: error.aggregateId }, 'Sequence conflict');
			return UseCaseError.conflict('SEQUENCE_CONFLICT', 'Aggregate was modified concurrently', {
				aggregateId: error.aggregateId,
				expectedSequence: error.expectedSequence,
				actualSequence: error.actualSequence,
			});
		}
		if (error instanceof ConstraintViolation) {
			return UseCaseError.failedPrecondition(error.constraint.errorCode, error.constraint.errorMessage, {
				aggregateId: aggregate.id,
			});
		}
		if (error instanceof DeadlinePassed) {
			return UseCaseError.deadlineExceeded('DEADLINE_EXCEEDED', error.message, {
				deadline: error.deadline.toISOString(),
			});
		}
		if (isUniqueViolation(error)) {
			// a concurrent writer inserted the same aggregate, event or constraint key first
			return UseCaseError.conflict('SEQUENCE_CONFLICT', 'Aggregate was modified concurrently', {
				aggregateId: aggregate.id,
			});
		}

		logger.error({ err: error, aggregateId: aggregate.id }, 'Commit failed');
		return UseCaseError.internal('COMMIT_FAILED', error instanceof Error ? error.message : 'Unknown error during commit', {
			cause: error instanceof Error ? error.name : 'Unknown',
		});
	}
}
