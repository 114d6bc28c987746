/**
 * Event appends take a transaction-scoped advisory lock before inserting, so
 * `position` values become visible in the order they were drawn and a feed
 * reading `position > cursor` never steps over a row still in flight.
 */

import { type SQL, sql } from 'drizzle-orm';

export const EVENT_APPEND_LOCK_KEY = 7_413_001;

export interface SqlExecutor {
	execute(query: SQL): PromiseLike<unknown>;
}

export function eventAppendLock(): SQL {
	return sql`select pg_advisory_xact_lock(${EVENT_APPEND_LOCK_KEY}::bigint)`;
}

/** Must run inside the transaction that inserts the event; released on commit or rollback. */
export async function lockEventAppends(tx: SqlExecutor): Promise<void> {
	await tx.execute(eventAppendLock());
}
