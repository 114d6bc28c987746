export { tsidColumn, externalIdColumn, timestampColumn } from './common.js';
export { events, type EventRow, type NewEventRow } from './events.js';
export { aggregates, uniqueConstraints, type AggregateRow } from './aggregates.js';
export { auditLogs, type AuditLogRow, type NewAuditLogRow } from './audit-logs.js';
