/**
 * User Grant Domain Events
 */

import { BaseDomainEvent, DomainEvent, type ExecutionContext } from '@castellan/domain-core';
import type { UserGrant, UserGrantState } from './user-grant.js';

const APP = 'identity';
const DOMAIN = 'management';
const AGGREGATE = 'usergrant';
const SOURCE = `${APP}:${DOMAIN}`;

export const USER_GRANT_EVENT_TYPES = {
	ADDED: DomainEvent.eventType(APP, DOMAIN, AGGREGATE, 'added'),
	CHANGED: DomainEvent.eventType(APP, DOMAIN, AGGREGATE, 'changed'),
	DEACTIVATED: DomainEvent.eventType(APP, DOMAIN, AGGREGATE, 'deactivated'),
	REACTIVATED: DomainEvent.eventType(APP, DOMAIN, AGGREGATE, 'reactivated'),
	REMOVED: DomainEvent.eventType(APP, DOMAIN, AGGREGATE, 'removed'),
} as const;

function base(eventType: string, grant: UserGrant) {
	return {
		eventType,
		specVersion: '1.0',
		source: SOURCE,
		subject: DomainEvent.subject(APP, AGGREGATE, grant.id),
		messageGroup: DomainEvent.messageGroup(APP, AGGREGATE, grant.id),
		sequence: grant.sequence,
		resourceOwner: grant.resourceOwner,
		time: grant.changeDate,
	};
}

/**
 * Payload of UserGrantAdded: the full grant.
 */
export interface UserGrantAddedData {
	readonly grantId: string;
	readonly userId: string;
	readonly projectId: string;
	readonly projectGrantId: string | null;
	readonly roleKeys: readonly string[];
	readonly creationDate: string;
	readonly [key: string]: unknown;
}

export class UserGrantAdded extends BaseDomainEvent<UserGrantAddedData> {
	constructor(ctx: ExecutionContext, grant: UserGrant) {
		super(base(USER_GRANT_EVENT_TYPES.ADDED, grant), ctx, {
			grantId: grant.id,
			userId: grant.userId,
			projectId: grant.projectId,
			projectGrantId: grant.projectGrantId,
			roleKeys: grant.roleKeys,
			creationDate: grant.creationDate.toISOString(),
		});
	}

	get grantId(): string {
		return this.data.grantId;
	}
}

export interface UserGrantChangedData {
	readonly grantId: string;
	readonly roleKeys: readonly string[];
	readonly [key: string]: unknown;
}

export class UserGrantChanged extends BaseDomainEvent<UserGrantChangedData> {
	constructor(ctx: ExecutionContext, grant: UserGrant) {
		super(base(USER_GRANT_EVENT_TYPES.CHANGED, grant), ctx, {
			grantId: grant.id,
			roleKeys: grant.roleKeys,
		});
	}
}

export interface UserGrantStateChangedData {
	readonly grantId: string;
	readonly state: UserGrantState;
	readonly [key: string]: unknown;
}

export class UserGrantDeactivated extends BaseDomainEvent<UserGrantStateChangedData> {
	constructor(ctx: ExecutionContext, grant: UserGrant) {
		super(base(USER_GRANT_EVENT_TYPES.DEACTIVATED, grant), ctx, { grantId: grant.id, state: 'INACTIVE' });
	}
}

export class UserGrantReactivated extends BaseDomainEvent<UserGrantStateChangedData> {
	constructor(ctx: ExecutionContext, grant: UserGrant) {
		super(base(USER_GRANT_EVENT_TYPES.REACTIVATED, grant), ctx, { grantId: grant.id, state: 'ACTIVE' });
	}
}

export class UserGrantRemoved extends BaseDomainEvent<UserGrantStateChangedData> {
	constructor(ctx: ExecutionContext, grant: UserGrant) {
		super(base(USER_GRANT_EVENT_TYPES.REMOVED, grant), ctx, { grantId: grant.id, state: 'REMOVED' });
	}
}

export type UserGrantEvent =
	| UserGrantAdded
	| UserGrantChanged
	| UserGrantDeactivated
	| UserGrantReactivated
	| UserGrantRemoved;
