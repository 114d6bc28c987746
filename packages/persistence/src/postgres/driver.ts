/**
 * Postgres persistence driver.
 */

import type { Aggregate } from '@castellan/domain-core';
import type { Logger } from '@castellan/logging';
import { and, eq } from 'drizzle-orm';
import type { AggregateHandler, AggregateRegistry } from '../aggregate-registry.js';
import type { AggregateReader, EventWriter, PersistenceDriver } from '../driver.js';
import { aggregates } from '../schema/aggregates.js';
import { events } from '../schema/events.js';
import { type PostgresChangeFeedConfig, createPostgresChangeFeed } from './change-feed.js';
import { type Database, applySchema, createDatabase } from './connection.js';
import { lockEventAppends } from './event-append.js';
import { toEventRow } from './rows.js';
import { createDrizzleUnitOfWork } from './unit-of-work.js';

export interface PostgresDriverOptions {
	readonly url: string;
	readonly registry: AggregateRegistry;
	readonly logger: Logger;
	readonly maxConnections?: number;
	/** Create missing tables on startup. Default: true */
	readonly applySchema?: boolean;
	readonly changeFeed?: Omit<PostgresChangeFeedConfig, 'db' | 'logger'>;
}

export async function createPostgresDriver(options: PostgresDriverOptions): Promise<PersistenceDriver> {
	const logger = options.logger.child({ component: 'persistence', driver: 'postgres' });
	const database: Database = createDatabase({ url: options.url, maxConnections: options.maxConnections });
	const { db } = database;

	if (options.applySchema ?? true) {
		await applySchema(database.client);
		logger.info('Schema applied');
	}

	const reader: AggregateReader = {
		async find<T extends Aggregate>(handler: AggregateHandler<T>, id: string): Promise<T | null> {
			const [row] = await db
				.select({ snapshot: aggregates.snapshot })
				.from(aggregates)
				.where(and(eq(aggregates.aggregateType, handler.typeName), eq(aggregates.id, id)));
			return row ? handler.fromSnapshot(row.snapshot) : null;
		},
	};

	const writer: EventWriter = {
		async append(event) {
			const position = await db.transaction(async (tx) => {
				await lockEventAppends(tx);
				const [row] = await tx.insert(events).values(toEventRow(event)).returning({ position: events.position });
				return row?.position;
			});
			if (position === undefined) {
				throw new Error(`Event ${event.eventId} was not stored`);
			}
			return { ...event, position };
		},
	};

	const changeFeed = createPostgresChangeFeed({ db, logger: options.logger, ...options.changeFeed });

	return {
		kind: 'postgres',
		unitOfWork: createDrizzleUnitOfWork({ db, registry: options.registry, logger: options.logger }),
		aggregates: reader,
		events: writer,
		changeFeed,
		async close() {
			await changeFeed.closeAll();
			await database.close();
			logger.info('Postgres driver closed');
		},
	};
}
