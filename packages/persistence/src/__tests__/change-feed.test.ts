import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '@castellan/logging';
import { createInMemoryChangeFeed } from '../memory/change-feed.js';
import { type PendingEvent, type StoredEvent, toPendingEvent } from '../stored-event.js';
import { WidgetSaved, ctx, widget } from './fixtures.js';

function pending(id: string, sequence: number): PendingEvent {
	const event = toPendingEvent(new WidgetSaved(ctx, widget(id, sequence, `name-${id}`)));
	if (!event) throw new Error('subject did not parse');
	return event;
}

describe('InMemoryChangeFeed', () => {
	it('should deliver events in position order', async () => {
		const feed = createInMemoryChangeFeed({ logger: createSilentLogger(), retryDelayMs: 1 });
		const seen: string[] = [];
		feed.subscribe(async (event) => {
			seen.push(`${event.position}:${event.aggregateId}:${event.sequence}`);
		});

		feed.publish(pending('a', 1));
		feed.publish(pending('b', 1));
		feed.publish(pending('a', 2));
		await feed.settled();

		expect(seen).toEqual(['1:a:1', '2:b:1', '3:a:2']);
	});

	it('should not deliver inline with publish', () => {
		const feed = createInMemoryChangeFeed({ logger: createSilentLogger() });
		const seen: StoredEvent[] = [];
		feed.subscribe(async (event) => {
			seen.push(event);
		});

		feed.publish(pending('a', 1));

		expect(seen).toHaveLength(0);
	});

	it('should start after the given position', async () => {
		const feed = createInMemoryChangeFeed({ logger: createSilentLogger() });
		feed.publish(pending('a', 1));
		feed.publish(pending('b', 1));

		const seen: number[] = [];
		const subscription = feed.subscribe(
			async (event) => {
				seen.push(event.position);
			},
			{ fromPosition: 1 },
		);
		await feed.settled();

		expect(seen).toEqual([2]);
		expect(subscription.position()).toBe(2);
	});

	it('should redeliver an event whose handler failed before moving on', async () => {
		const feed = createInMemoryChangeFeed({ logger: createSilentLogger(), retryDelayMs: 1 });
		const attempts: number[] = [];
		let failures = 0;
		feed.subscribe(async (event) => {
			attempts.push(event.position);
			if (event.position === 1 && failures < 2) {
				failures++;
				throw new Error('projection unavailable');
			}
		});

		feed.publish(pending('a', 1));
		feed.publish(pending('b', 1));
		await feed.settled();

		expect(attempts).toEqual([1, 1, 1, 2]);
	});

	it('should stop delivering after close', async () => {
		const feed = createInMemoryChangeFeed({ logger: createSilentLogger() });
		const seen: number[] = [];
		const subscription = feed.subscribe(async (event) => {
			seen.push(event.position);
		});
		feed.publish(pending('a', 1));
		await feed.settled();

		await subscription.close();
		feed.publish(pending('a', 2));
		await feed.settled();

		expect(seen).toEqual([1]);
	});
});
