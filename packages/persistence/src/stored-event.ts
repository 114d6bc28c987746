/**
 * Stored Events
 *
 * Shape of a domain event once it is in the event store and on the change
 * feed. `position` is the store-wide commit order; `sequence` is the version
 * of the aggregate the event belongs to.
 */

import { DomainEvent } from '@castellan/domain-core';

export interface StoredEvent {
	readonly position: number;
	readonly eventId: string;
	readonly eventType: string;
	readonly specVersion: string;
	readonly source: string;
	readonly subject: string;
	readonly aggregateType: string;
	readonly aggregateId: string;
	readonly sequence: number;
	readonly instanceId: string;
	readonly resourceOwner: string;
	readonly time: Date;
	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;
	readonly messageGroup: string;
	/** Event payload, as decoded from JSON */
	readonly data: unknown;
}

export type PendingEvent = Omit<StoredEvent, 'position'>;

/**
 * Convert a domain event to its storable form. Returns null when the subject
 * does not follow `{domain}.{aggregate}.{id}`.
 */
export function toPendingEvent(event: DomainEvent): PendingEvent | null {
	const subject = DomainEvent.parseSubject(event.subject);
	if (!subject) {
		return null;
	}

	const data: unknown = JSON.parse(event.toDataJson());

	return {
		eventId: event.eventId,
		eventType: event.eventType,
		specVersion: event.specVersion,
		source: event.source,
		subject: event.subject,
		aggregateType: subject.aggregate,
		aggregateId: subject.id,
		sequence: event.sequence,
		instanceId: event.instanceId,
		resourceOwner: event.resourceOwner,
		time: event.time,
		executionId: event.executionId,
		correlationId: event.correlationId,
		causationId: event.causationId,
		principalId: event.principalId,
		messageGroup: event.messageGroup,
		data,
	};
}
