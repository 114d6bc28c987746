/**
 * Change Feed
 *
 * Ordered, at-least-once delivery of stored events to subscribers. Events are
 * delivered one at a time in position order; a handler that throws gets the
 * same event again after a delay, so handlers must tolerate redelivery.
 */

import type { StoredEvent } from './stored-event.js';

export type ChangeFeedHandler = (event: StoredEvent) => Promise<void>;

export interface SubscribeOptions {
	/** Deliver events after this position. Default: 0 (from the beginning). */
	readonly fromPosition?: number;
	/** Name used in logs */
	readonly name?: string;
}

export interface ChangeFeedSubscription {
	/** Position of the last event the handler completed */
	position(): number;
	/** Stop delivery. Resolves once an in-flight handler call has finished. */
	close(): Promise<void>;
}

export interface ChangeFeed {
	subscribe(handler: ChangeFeedHandler, options?: SubscribeOptions): ChangeFeedSubscription;
}
