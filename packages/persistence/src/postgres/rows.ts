/**
 * Row mapping between the events table and StoredEvent.
 */

import type { EventRow, NewEventRow } from '../schema/events.js';
import type { PendingEvent, StoredEvent } from '../stored-event.js';

export function toEventRow(event: PendingEvent): NewEventRow {
	return {
		id: event.eventId,
		specVersion: event.specVersion,
		type: event.eventType,
		source: event.source,
		subject: event.subject,
		time: event.time,
		aggregateType: event.aggregateType,
		aggregateId: event.aggregateId,
		sequence: event.sequence,
		instanceId: event.instanceId,
		resourceOwner: event.resourceOwner,
		data: event.data,
		executionId: event.executionId,
		correlationId: event.correlationId,
		causationId: event.causationId,
		principalId: event.principalId,
		messageGroup: event.messageGroup,
	};
}

export function fromEventRow(row: EventRow): StoredEvent {
	return {
		position: row.position,
		eventId: row.id,
		eventType: row.type,
		specVersion: row.specVersion,
		source: row.source,
		subject: row.subject,
		aggregateType: row.aggregateType,
		aggregateId: row.aggregateId,
		sequence: row.sequence,
		instanceId: row.instanceId,
		resourceOwner: row.resourceOwner,
		time: row.time,
		executionId: row.executionId,
		correlationId: row.correlationId,
		causationId: row.causationId,
		principalId: row.principalId,
		messageGroup: row.messageGroup,
		data: row.data,
	};
}
