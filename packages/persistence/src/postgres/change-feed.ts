/**
 * Postgres change feed.
 *
 * Each subscription polls the events table past its cursor in position
 * order. The cursor only moves after the handler completes, so a failing
 * handler sees the same event again on the next poll.
 *
 * Sleep between polls: none after a full batch, `idleIntervalMs` when
 * nothing new was found, `retryDelayMs` after a handler or query failure.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { Logger } from '@castellan/logging';
import { asc, gt } from 'drizzle-orm';
import type { PostgresJsDatabase } from 'drizzle-orm/postgres-js';
import type { ChangeFeed, ChangeFeedHandler, ChangeFeedSubscription, SubscribeOptions } from '../change-feed.js';
import { events } from '../schema/events.js';
import { fromEventRow } from './rows.js';

export interface PostgresChangeFeedConfig {
	readonly db: PostgresJsDatabase;
	readonly logger: Logger;
	/** Default: 100 */
	readonly batchSize?: number;
	/** Default: 250 */
	readonly idleIntervalMs?: number;
	/** Default: 1000 */
	readonly retryDelayMs?: number;
}

export interface PostgresChangeFeed extends ChangeFeed {
	/** Close every open subscription */
	closeAll(): Promise<void>;
}

export function createPostgresChangeFeed(config: PostgresChangeFeedConfig): PostgresChangeFeed {
	const batchSize = config.batchSize ?? 100;
	const idleIntervalMs = config.idleIntervalMs ?? 250;
	const retryDelayMs = config.retryDelayMs ?? 1000;
	const open = new Set<ChangeFeedSubscription>();

	function subscribe(handler: ChangeFeedHandler, options: SubscribeOptions = {}): ChangeFeedSubscription {
		const logger = config.logger.child({ component: 'change-feed', subscription: options.name ?? 'subscriber' });
		let cursor = Math.max(0, options.fromPosition ?? 0);
		let running = true;

		/** @returns events handled, or -1 when the batch stopped on a failure */
		async function pollOnce(): Promise<number> {
			const rows = await config.db
				.select()
				.from(events)
				.where(gt(events.position, cursor))
				.orderBy(asc(events.position))
				.limit(batchSize);

			let handled = 0;
			for (const row of rows) {
				if (!running) break;
				const event = fromEventRow(row);
				try {
					await handler(event);
				} catch (err) {
					logger.error(
						{ err, position: event.position, eventType: event.eventType, aggregateId: event.aggregateId },
						'Change feed handler failed, redelivering',
					);
					return -1;
				}
				cursor = event.position;
				handled++;
			}
			return handled;
		}

		async function pollLoop(): Promise<void> {
			while (running) {
				try {
					const handled = await pollOnce();
					if (handled < 0) {
						await sleep(retryDelayMs);
					} else if (handled === 0) {
						await sleep(idleIntervalMs);
					} else if (handled < batchSize) {
						await sleep(idleIntervalMs);
					}
				} catch (err) {
					if (!running) break;
					logger.error({ err }, 'Error in change feed poll loop');
					await sleep(retryDelayMs);
				}
			}
		}

		const loop = pollLoop().catch((err: unknown) => {
			logger.error({ err }, 'Change feed poll loop exited unexpectedly');
			running = false;
		});
		logger.info({ fromPosition: cursor }, 'Change feed subscription started');

		const subscription: ChangeFeedSubscription = {
			position: () => cursor,
			async close() {
				if (!running) return;
				running = false;
				open.delete(subscription);
				await loop;
				logger.info({ position: cursor }, 'Change feed subscription stopped');
			},
		};
		open.add(subscription);
		return subscription;
	}

	return {
		subscribe,
		async closeAll() {
			await Promise.all(Array.from(open, (s) => s.close()));
		},
	};
}
