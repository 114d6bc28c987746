/**
 * @castellan/persistence
 *
 * Storage for aggregates, events and audit records behind the UnitOfWork
 * port, with an in-memory driver for embedded mode and tests and a
 * Postgres driver (DrizzleORM over postgres.js) for deployments.
 */

export {
	type UniqueConstraint,
	type AggregateHandler,
	type AggregateRegistry,
	createAggregateRegistry,
	toSnapshot,
} from './aggregate-registry.js';
export { type AuditLogEntry, buildAuditLogEntry, getOperationName } from './audit-log.js';
export type { ChangeFeed, ChangeFeedHandler, ChangeFeedSubscription, SubscribeOptions } from './change-feed.js';
export type { AggregateReader, EventWriter, PersistenceDriver } from './driver.js';
export { type StoredEvent, type PendingEvent, toPendingEvent } from './stored-event.js';

export { type InMemoryChangeFeed, type InMemoryChangeFeedOptions, createInMemoryChangeFeed } from './memory/change-feed.js';
export { type InMemoryDriver, type InMemoryDriverOptions, createInMemoryDriver } from './memory/driver.js';

export { type DatabaseConfig, type Database, createDatabase, applySchema } from './postgres/connection.js';
export { type SqlExecutor, EVENT_APPEND_LOCK_KEY, eventAppendLock, lockEventAppends } from './postgres/event-append.js';
export { type DrizzleUnitOfWorkConfig, createDrizzleUnitOfWork } from './postgres/unit-of-work.js';
export { type PostgresChangeFeed, type PostgresChangeFeedConfig, createPostgresChangeFeed } from './postgres/change-feed.js';
export { type PostgresDriverOptions, createPostgresDriver } from './postgres/driver.js';

export * from './schema/index.js';
