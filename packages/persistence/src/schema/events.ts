/**
 * Events Schema
 *
 * Append-only event store. `position` gives the global commit order the
 * change feed follows; (aggregate_type, aggregate_id, sequence) is unique so
 * that two writers can never both append version N of the same aggregate.
 */

import { pgTable, varchar, integer, bigserial, jsonb, index, uniqueIndex } from 'drizzle-orm/pg-core';
import { tsidColumn, externalIdColumn, timestampColumn } from './common.js';

export const events = pgTable(
	'events',
	{
		position: bigserial('position', { mode: 'number' }).primaryKey(),
		id: tsidColumn('id').notNull(),

		specVersion: varchar('spec_version', { length: 20 }).notNull().default('1.0'),
		type: varchar('type', { length: 200 }).notNull(),
		source: varchar('source', { length: 500 }).notNull(),
		subject: varchar('subject', { length: 500 }).notNull(),
		time: timestampColumn('time').notNull(),

		aggregateType: varchar('aggregate_type', { length: 100 }).notNull(),
		aggregateId: externalIdColumn('aggregate_id').notNull(),
		sequence: integer('sequence').notNull(),
		instanceId: externalIdColumn('instance_id').notNull(),
		resourceOwner: externalIdColumn('resource_owner').notNull(),

		data: jsonb('data'),

		executionId: varchar('execution_id', { length: 100 }).notNull(),
		correlationId: varchar('correlation_id', { length: 100 }).notNull(),
		causationId: varchar('causation_id', { length: 100 }),
		principalId: externalIdColumn('principal_id').notNull(),
		messageGroup: varchar('message_group', { length: 200 }).notNull(),

		createdAt: timestampColumn('created_at').notNull().defaultNow(),
	},
	(table) => [
		uniqueIndex('idx_events_id').on(table.id),
		uniqueIndex('idx_events_aggregate_sequence').on(table.aggregateType, table.aggregateId, table.sequence),
		index('idx_events_type').on(table.type),
		index('idx_events_correlation').on(table.correlationId),
	],
);

export type EventRow = typeof events.$inferSelect;
export type NewEventRow = typeof events.$inferInsert;
