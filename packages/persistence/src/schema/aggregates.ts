/**
 * Aggregate Snapshots Schema
 *
 * Current state of every aggregate as a JSON snapshot. Writes are guarded by
 * the sequence column.
 */

import { pgTable, varchar, integer, jsonb, index, primaryKey } from 'drizzle-orm/pg-core';
import { externalIdColumn, timestampColumn } from './common.js';

export const aggregates = pgTable(
	'aggregates',
	{
		aggregateType: varchar('aggregate_type', { length: 100 }).notNull(),
		id: externalIdColumn('id').notNull(),
		instanceId: externalIdColumn('instance_id').notNull(),
		resourceOwner: externalIdColumn('resource_owner').notNull(),
		sequence: integer('sequence').notNull(),
		changeDate: timestampColumn('change_date').notNull(),
		snapshot: jsonb('snapshot').notNull(),
	},
	(table) => [
		primaryKey({ name: 'aggregates_pkey', columns: [table.aggregateType, table.id] }),
		index('idx_aggregates_owner').on(table.aggregateType, table.resourceOwner),
	],
);

export type AggregateRow = typeof aggregates.$inferSelect;

/**
 * Unique values claimed by aggregates (see UniqueConstraint).
 */
export const uniqueConstraints = pgTable(
	'unique_constraints',
	{
		constraintKey: varchar('constraint_key', { length: 500 }).primaryKey(),
		aggregateType: varchar('aggregate_type', { length: 100 }).notNull(),
		aggregateId: externalIdColumn('aggregate_id').notNull(),
	},
	(table) => [index('idx_unique_constraints_aggregate').on(table.aggregateType, table.aggregateId)],
);
