/**
 * In-memory change feed.
 *
 * Keeps the full event log in memory and drives one delivery loop per
 * subscription, FIFO, one event at a time. Delivery always starts on a later
 * turn of the event loop, so publishing never runs subscriber code inline
 * with the commit.
 */

import { setImmediate as nextTurn, setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '@castellan/logging';
import type { ChangeFeed, ChangeFeedHandler, ChangeFeedSubscription, SubscribeOptions } from '../change-feed.js';
import type { PendingEvent, StoredEvent } from '../stored-event.js';

export interface InMemoryChangeFeed extends ChangeFeed {
	/** Assign the next position and deliver to subscribers. */
	publish(event: PendingEvent): StoredEvent;
	/** Resolves once every open subscription has handled every published event. */
	settled(): Promise<void>;
	/** Everything published so far, in position order */
	events(): readonly StoredEvent[];
}

export interface InMemoryChangeFeedOptions {
	readonly logger: Logger;
	/** Wait before redelivering an event whose handler threw. Default: 100. */
	readonly retryDelayMs?: number;
}

interface MemorySubscription extends ChangeFeedSubscription {
	wake(): void;
	idle(): Promise<boolean>;
}

export function createInMemoryChangeFeed(options: InMemoryChangeFeedOptions): InMemoryChangeFeed {
	const retryDelayMs = options.retryDelayMs ?? 100;
	const log: StoredEvent[] = [];
	const subscriptions = new Set<MemorySubscription>();

	function subscribe(handler: ChangeFeedHandler, subscribeOptions: SubscribeOptions = {}): ChangeFeedSubscription {
		const name = subscribeOptions.name ?? 'subscriber';
		const logger = options.logger.child({ component: 'change-feed', subscription: name });

		// positions are 1-based and contiguous, so position N sits at index N - 1
		let cursor = Math.max(0, subscribeOptions.fromPosition ?? 0);
		let closed = false;
		let running = false;
		let loop: Promise<void> = Promise.resolve();

		async function drain(): Promise<void> {
			await nextTurn();
			while (!closed && cursor < log.length) {
				const event = log[cursor];
				if (!event) break;
				try {
					await handler(event);
					cursor++;
				} catch (err) {
					logger.error(
						{ err, position: event.position, eventType: event.eventType, aggregateId: event.aggregateId },
						'Change feed handler failed, redelivering',
					);
					await sleep(retryDelayMs);
				}
			}
		}

		const subscription: MemorySubscription = {
			position: () => cursor,

			wake(): void {
				if (running || closed || cursor >= log.length) return;
				running = true;
				loop = drain().finally(() => {
					running = false;
					subscription.wake();
				});
			},

			async idle(): Promise<boolean> {
				if (closed || (!running && cursor >= log.length)) {
					return true;
				}
				await loop;
				return false;
			},

			async close(): Promise<void> {
				closed = true;
				subscriptions.delete(subscription);
				await loop;
				logger.debug({ position: cursor }, 'Subscription closed');
			},
		};

		subscriptions.add(subscription);
		subscription.wake();
		return subscription;
	}

	return {
		subscribe,

		publish(event: PendingEvent): StoredEvent {
			const stored: StoredEvent = { ...event, position: log.length + 1 };
			log.push(stored);
			for (const subscription of subscriptions) {
				subscription.wake();
			}
			return stored;
		},

		async settled(): Promise<void> {
			for (;;) {
				const done = await Promise.all(Array.from(subscriptions, (s) => s.idle()));
				if (done.every(Boolean)) return;
			}
		},

		events: () => log,
	};
}
