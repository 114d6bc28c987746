/**
 * User Grant Aggregate
 *
 * Role keys granted to a user on a project, either directly or through a
 * project grant delegated to the owning organization.
 *
 * State machine:
 *   ACTIVE ⇄ INACTIVE
 *   ACTIVE | INACTIVE → REMOVED (terminal)
 */

import { type Aggregate, ResourceScope } from '@castellan/domain-core';
import { generate } from '@castellan/tsid';

export const USER_GRANT_STATES = ['ACTIVE', 'INACTIVE', 'REMOVED'] as const;

export type UserGrantState = (typeof USER_GRANT_STATES)[number];

/**
 * What authorizes the grant. Exactly one of the two.
 */
export type GrantTarget =
	| { readonly kind: 'project'; readonly projectId: string }
	| { readonly kind: 'projectGrant'; readonly projectGrantId: string };

export interface UserGrant extends Aggregate {
	readonly id: string;
	readonly userId: string;
	readonly projectId: string;
	/** Set only when granted through a project grant */
	readonly projectGrantId: string | null;
	readonly roleKeys: readonly string[];
	readonly state: UserGrantState;
	readonly resourceOwner: string;
	readonly sequence: number;
	readonly changeDate: Date;
	readonly creationDate: Date;
}

export type NewUserGrant = Pick<UserGrant, 'userId' | 'projectId' | 'projectGrantId' | 'roleKeys' | 'resourceOwner'>;

export const UserGrant = {
	create(params: NewUserGrant, now: Date = new Date()): UserGrant {
		return {
			id: generate('USER_GRANT'),
			userId: params.userId,
			projectId: params.projectId,
			projectGrantId: params.projectGrantId,
			roleKeys: [...params.roleKeys],
			state: 'ACTIVE',
			resourceOwner: params.resourceOwner,
			sequence: 1,
			changeDate: now,
			creationDate: now,
		};
	},

	changeRoles(grant: UserGrant, roleKeys: readonly string[], now: Date = new Date()): UserGrant {
		return { ...grant, roleKeys: [...roleKeys], sequence: grant.sequence + 1, changeDate: now };
	},

	deactivate(grant: UserGrant, now: Date = new Date()): UserGrant {
		return { ...grant, state: 'INACTIVE', sequence: grant.sequence + 1, changeDate: now };
	},

	reactivate(grant: UserGrant, now: Date = new Date()): UserGrant {
		return { ...grant, state: 'ACTIVE', sequence: grant.sequence + 1, changeDate: now };
	},

	remove(grant: UserGrant, now: Date = new Date()): UserGrant {
		return { ...grant, state: 'REMOVED', sequence: grant.sequence + 1, changeDate: now };
	},

	isRemoved(grant: UserGrant): boolean {
		return grant.state === 'REMOVED';
	},

	/**
	 * Same role keys regardless of order.
	 */
	hasSameRoles(grant: UserGrant, roleKeys: readonly string[]): boolean {
		if (grant.roleKeys.length !== roleKeys.length) return false;
		const current = new Set(grant.roleKeys);
		return roleKeys.every((key) => current.has(key));
	},

	/**
	 * Key of the "one non-removed grant per user and target" constraint.
	 */
	uniqueKey(grant: Pick<UserGrant, 'userId' | 'projectId' | 'projectGrantId'>): string {
		return `usergrant:${grant.userId}:${grant.projectId}:${grant.projectGrantId ?? '-'}`;
	},

	/**
	 * Where the grant is managed: its project grant when it has one, else its
	 * project, within the owning organization.
	 */
	scopeOf(grant: Pick<UserGrant, 'resourceOwner' | 'projectId' | 'projectGrantId'>): ResourceScope {
		return grant.projectGrantId
			? ResourceScope.projectGrant(grant.resourceOwner, grant.projectGrantId)
			: ResourceScope.project(grant.resourceOwner, grant.projectId);
	},
};

export function scopeOfTarget(orgId: string, target: GrantTarget): ResourceScope {
	return target.kind === 'project'
		? ResourceScope.project(orgId, target.projectId)
		: ResourceScope.projectGrant(orgId, target.projectGrantId);
}
