/**
 * In-memory persistence driver.
 *
 * Used for embedded mode and tests. Each commit runs its checks and writes
 * without yielding to the event loop, which makes it atomic with respect to
 * every other commit in the process.
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
import { type AggregateHandler, type AggregateRegistry, type UniqueConstraint, toSnapshot } from '../aggregate-registry.js';
import { type AuditLogEntry, buildAuditLogEntry } from '../audit-log.js';
import type { AggregateReader, EventWriter, PersistenceDriver } from '../driver.js';
import { toPendingEvent } from '../stored-event.js';
import { type InMemoryChangeFeed, createInMemoryChangeFeed } from './change-feed.js';

interface AggregateRecord {
	readonly sequence: number;
	readonly resourceOwner: string;
	readonly instanceId: string;
	readonly snapshot: unknown;
	readonly constraintKeys: readonly string[];
}

export interface InMemoryDriverOptions {
	readonly registry: AggregateRegistry;
	readonly logger: Logger;
	/** Redelivery delay of the change feed. Default: 100. */
	readonly retryDelayMs?: number;
	/**
	 * Runs inside every commit before anything is written. Throwing aborts the
	 * commit with an internal error, which is how storage faults are simulated.
	 */
	readonly beforeCommit?: (aggregate: Aggregate, event: DomainEvent) => void;
}

export interface InMemoryDriver extends PersistenceDriver {
	readonly kind: 'memory';
	readonly changeFeed: InMemoryChangeFeed;
	auditLogs(): readonly AuditLogEntry[];
}

export function createInMemoryDriver(options: InMemoryDriverOptions): InMemoryDriver {
	const { registry } = options;
	const logger = options.logger.child({ component: 'persistence', driver: 'memory' });
	const changeFeed = createInMemoryChangeFeed({ logger: options.logger, retryDelayMs: options.retryDelayMs });

	const records = new Map<string, AggregateRecord>();
	const constraintOwners = new Map<string, string>();
	const audit: AuditLogEntry[] = [];

	const recordKey = (typeName: string, id: string) => `${typeName}:${id}`;

	const unitOfWork: UnitOfWork = {
		async commit<T extends DomainEvent>(
			aggregate: Aggregate,
			event: T,
			command: unknown,
			commitOptions: CommitOptions = {},
		): Promise<Result<T>> {
			const deadline = commitOptions.deadline;
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

			const key = recordKey(handler.typeName, aggregate.id);
			const current = records.get(key);
			const storedSequence = current?.sequence ?? 0;

			if (aggregate.sequence !== storedSequence + 1) {
				logger.debug(
					{ aggregateId: aggregate.id, expected: aggregate.sequence - 1, actual: storedSequence },
					'Sequence conflict',
				);
				return Result.failure(
					UseCaseError.conflict('SEQUENCE_CONFLICT', 'Aggregate was modified concurrently', {
						aggregateId: aggregate.id,
						expectedSequence: aggregate.sequence - 1,
						actualSequence: storedSequence,
					}),
				);
			}

			let constraints: readonly UniqueConstraint[];
			let snapshot: unknown;
			let entry: AuditLogEntry;
			try {
				options.beforeCommit?.(aggregate, event);
				constraints = handler.uniqueConstraints?.(aggregate) ?? [];
				snapshot = toSnapshot(aggregate);
				entry = buildAuditLogEntry(pending, command);
			} catch (error) {
				logger.error({ err: error, aggregateId: aggregate.id }, 'Commit failed');
				return Result.failure(
					UseCaseError.internal(
						'COMMIT_FAILED',
						error instanceof Error ? error.message : 'Unknown error during commit',
						{ cause: error instanceof Error ? error.name : 'Unknown' },
					),
				);
			}

			for (const constraint of constraints) {
				const owner = constraintOwners.get(constraint.key);
				if (owner !== undefined && owner !== key) {
					return Result.failure(
						UseCaseError.failedPrecondition(constraint.errorCode, constraint.errorMessage, {
							aggregateId: aggregate.id,
						}),
					);
				}
			}

			// all checks passed: apply
			for (const previous of current?.constraintKeys ?? []) {
				if (constraintOwners.get(previous) === key) {
					constraintOwners.delete(previous);
				}
			}
			for (const constraint of constraints) {
				constraintOwners.set(constraint.key, key);
			}

			records.set(key, {
				sequence: aggregate.sequence,
				resourceOwner: aggregate.resourceOwner,
				instanceId: pending.instanceId,
				snapshot,
				constraintKeys: constraints.map((c) => c.key),
			});
			audit.push(entry);
			const stored = changeFeed.publish(pending);

			logger.debug(
				{ aggregateId: aggregate.id, sequence: aggregate.sequence, position: stored.position },
				'Committed',
			);

			return Result.success(RESULT_SUCCESS_TOKEN, event);
		},
	};

	const aggregates: AggregateReader = {
		async find<T extends Aggregate>(handler: AggregateHandler<T>, id: string): Promise<T | null> {
			const record = records.get(recordKey(handler.typeName, id));
			if (!record) {
				return null;
			}
			return handler.fromSnapshot(record.snapshot);
		},
	};

	const events: EventWriter = {
		async append(event) {
			return changeFeed.publish(event);
		},
	};

	return {
		kind: 'memory',
		unitOfWork,
		aggregates,
		events,
		changeFeed,
		auditLogs: () => audit,
		async close() {
			logger.debug({ events: changeFeed.events().length }, 'In-memory driver closed');
		},
	};
}
