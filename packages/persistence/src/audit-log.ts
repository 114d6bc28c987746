/**
 * Audit Log Records
 *
 * Every commit writes one audit record linking the entity, the operation and
 * the principal that performed it.
 */

import { generate } from '@castellan/tsid';
import type { PendingEvent } from './stored-event.js';

export interface AuditLogEntry {
	readonly id: string;
	readonly entityType: string;
	readonly entityId: string;
	readonly operation: string;
	readonly operationJson: unknown;
	readonly principalId: string;
	readonly executionId: string;
	readonly performedAt: Date;
}

export function buildAuditLogEntry(event: PendingEvent, command: unknown): AuditLogEntry {
	return {
		id: generate('AUDIT_LOG'),
		entityType: event.aggregateType,
		entityId: event.aggregateId,
		operation: getOperationName(command),
		operationJson: command === null || command === undefined ? null : JSON.parse(JSON.stringify(command)),
		principalId: event.principalId,
		executionId: event.executionId,
		performedAt: event.time,
	};
}

/**
 * Operation name of a command: its `_type`, else its class name.
 */
export function getOperationName(command: unknown): string {
	if (typeof command !== 'object' || command === null) {
		return 'Unknown';
	}

	if ('_type' in command && typeof command._type === 'string') {
		return command._type;
	}

	const ctor: unknown = command.constructor;
	if (typeof ctor === 'function' && ctor.name && ctor.name !== 'Object') {
		return ctor.name;
	}

	return 'Unknown';
}
