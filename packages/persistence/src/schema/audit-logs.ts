/**
 * Audit Logs Schema
 *
 * Every state change creates an audit log entry linking the entity,
 * operation, and principal.
 */

import { pgTable, varchar, jsonb, index } from 'drizzle-orm/pg-core';
import { tsidColumn, externalIdColumn, timestampColumn } from './common.js';

export const auditLogs = pgTable(
	'audit_logs',
	{
		id: tsidColumn('id').primaryKey(),

		entityType: varchar('entity_type', { length: 100 }).notNull(),
		entityId: externalIdColumn('entity_id').notNull(),

		operation: varchar('operation', { length: 100 }).notNull(),
		operationJson: jsonb('operation_json'),

		principalId: externalIdColumn('principal_id').notNull(),
		executionId: varchar('execution_id', { length: 100 }).notNull(),

		performedAt: timestampColumn('performed_at').notNull().defaultNow(),
	},
	(table) => [
		index('idx_audit_logs_entity').on(table.entityType, table.entityId),
		index('idx_audit_logs_performed').on(table.performedAt),
		index('idx_audit_logs_principal').on(table.principalId),
	],
);

export type AuditLogRow = typeof auditLogs.$inferSelect;
export type NewAuditLogRow = typeof auditLogs.$inferInsert;
