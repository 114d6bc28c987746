/**
 * Persistence Driver
 *
 * What the application needs from storage: a unit of work for writes, a way
 * to load the current state of an aggregate, an event writer for events that
 * originate outside this service and the change feed.
 */

import type { Aggregate, UnitOfWork } from '@castellan/domain-core';
import type { AggregateHandler } from './aggregate-registry.js';
import type { ChangeFeed } from './change-feed.js';
import type { PendingEvent, StoredEvent } from './stored-event.js';

export interface AggregateReader {
	/**
	 * Current state of an aggregate, or null if it was never committed.
	 */
	find<T extends Aggregate>(handler: AggregateHandler<T>, id: string): Promise<T | null>;
}

export interface EventWriter {
	/**
	 * Append an event produced elsewhere (e.g. provider management) so that it
	 * reaches the change feed.
	 */
	append(event: PendingEvent): Promise<StoredEvent>;
}

export interface PersistenceDriver {
	readonly kind: 'memory' | 'postgres';
	readonly unitOfWork: UnitOfWork;
	readonly aggregates: AggregateReader;
	readonly events: EventWriter;
	readonly changeFeed: ChangeFeed;
	close(): Promise<void>;
}
