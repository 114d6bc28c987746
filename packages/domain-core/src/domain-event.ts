/**
 * Domain Event Interface
 *
 * Base interface for all domain events. Domain events represent facts about
 * what happened in the domain (past tense) and are appended to the event
 * store in the same commit as the aggregate they describe.
 *
 * Naming convention: Events are named in past tense describing what happened.
 * - `UserGrantAdded` (not AddUserGrant)
 * - `SecuritySettingsChanged` (not SetSecuritySettings)
 *
 * Every event carries the aggregate's new sequence and resource owner, which
 * is all a caller needs to build a change descriptor.
 */

import { generate } from '@castellan/tsid';
import type { ExecutionContext } from './execution-context.js';

export interface DomainEvent {
	/** Unique identifier for this event (typed TSID) */
	readonly eventId: string;

	/**
	 * Event type code following the format: {app}:{domain}:{aggregate}:{action}
	 * Example: "identity:management:usergrant:added"
	 */
	readonly eventType: string;

	/** Schema version of this event type (e.g., "1.0") */
	readonly specVersion: string;

	/** Source system that generated this event, e.g. "identity:management" */
	readonly source: string;

	/**
	 * Qualified aggregate identifier.
	 * Format: {domain}.{aggregate}.{id}
	 * Example: "identity.usergrant.ugr_0HZXEQ5Y8JY5Z"
	 */
	readonly subject: string;

	/** When the event occurred; equals the aggregate's change date */
	readonly time: Date;

	/** Aggregate version after this event */
	readonly sequence: number;

	/** Organization (or instance) owning the aggregate */
	readonly resourceOwner: string;

	readonly instanceId: string;

	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;

	/**
	 * Message group for ordering guarantees.
	 * Events in the same message group are projected in order.
	 */
	readonly messageGroup: string;

	/**
	 * Serialize the event-specific data payload to JSON.
	 */
	toDataJson(): string;
}

/**
 * Base fields required to construct a domain event.
 */
export interface DomainEventBase {
	eventType: string;
	specVersion: string;
	source: string;
	subject: string;
	messageGroup: string;
	sequence: number;
	resourceOwner: string;
	time?: Date;
}

export interface DomainEventMetadata {
	eventId: string;
	instanceId: string;
	executionId: string;
	correlationId: string;
	causationId: string | null;
	principalId: string;
}

export interface ParsedSubject {
	readonly domain: string;
	readonly aggregate: string;
	readonly id: string;
}

/**
 * DomainEvent factory helpers.
 */
export const DomainEvent = {
	generateId(): string {
		return generate('EVENT');
	},

	/**
	 * Create event metadata from an execution context.
	 */
	metadataFrom(ctx: ExecutionContext): DomainEventMetadata {
		return {
			eventId: generate('EVENT'),
			instanceId: ctx.caller.instanceId,
			executionId: ctx.executionId,
			correlationId: ctx.correlationId,
			causationId: ctx.causationId,
			principalId: ctx.principalId,
		};
	},

	/**
	 * @example DomainEvent.subject('identity', 'usergrant', id) // "identity.usergrant.<id>"
	 */
	subject(domain: string, aggregate: string, id: string): string {
		return `${domain}.${aggregate}.${id}`;
	},

	/**
	 * @example DomainEvent.messageGroup('identity', 'usergrant', id) // "identity:usergrant:<id>"
	 */
	messageGroup(domain: string, aggregate: string, id: string): string {
		return `${domain}:${aggregate}:${id}`;
	},

	/**
	 * @example DomainEvent.eventType('identity', 'management', 'usergrant', 'added')
	 */
	eventType(app: string, domain: string, aggregate: string, action: string): string {
		return `${app}:${domain}:${aggregate}:${action}`;
	},

	/**
	 * Split a subject into its parts. The id may itself contain dots.
	 */
	parseSubject(subject: string): ParsedSubject | null {
		const first = subject.indexOf('.');
		const second = first === -1 ? -1 : subject.indexOf('.', first + 1);
		if (first <= 0 || second === -1 || second === first + 1 || second === subject.length - 1) {
			return null;
		}
		return {
			domain: subject.slice(0, first),
			aggregate: subject.slice(first + 1, second),
			id: subject.slice(second + 1),
		};
	},
};

/**
 * Abstract base class for domain events.
 *
 * @example
 * ```typescript
 * class UserGrantDeactivated extends BaseDomainEvent<UserGrantDeactivatedData> {
 *     constructor(ctx: ExecutionContext, grant: UserGrant) {
 *         super({
 *             eventType: 'identity:management:usergrant:deactivated',
 *             specVersion: '1.0',
 *             source: 'identity:management',
 *             subject: DomainEvent.subject('identity', 'usergrant', grant.id),
 *             messageGroup: DomainEvent.messageGroup('identity', 'usergrant', grant.id),
 *             sequence: grant.sequence,
 *             resourceOwner: grant.resourceOwner,
 *             time: grant.changeDate,
 *         }, ctx, { grantId: grant.id });
 *     }
 * }
 * ```
 */
export abstract class BaseDomainEvent<TData extends Record<string, unknown>> implements DomainEvent {
	readonly eventId: string;
	readonly eventType: string;
	readonly specVersion: string;
	readonly source: string;
	readonly subject: string;
	readonly time: Date;
	readonly sequence: number;
	readonly resourceOwner: string;
	readonly instanceId: string;
	readonly executionId: string;
	readonly correlationId: string;
	readonly causationId: string | null;
	readonly principalId: string;
	readonly messageGroup: string;

	protected readonly data: TData;

	constructor(base: DomainEventBase, ctx: ExecutionContext, data: TData) {
		const metadata = DomainEvent.metadataFrom(ctx);

		this.eventId = metadata.eventId;
		this.eventType = base.eventType;
		this.specVersion = base.specVersion;
		this.source = base.source;
		this.subject = base.subject;
		this.time = base.time ?? new Date();
		this.sequence = base.sequence;
		this.resourceOwner = base.resourceOwner;
		this.instanceId = metadata.instanceId;
		this.executionId = metadata.executionId;
		this.correlationId = metadata.correlationId;
		this.causationId = metadata.causationId;
		this.principalId = metadata.principalId;
		this.messageGroup = base.messageGroup;
		this.data = data;
	}

	toDataJson(): string {
		return JSON.stringify(this.data);
	}

	getData(): TData {
		return this.data;
	}
}
