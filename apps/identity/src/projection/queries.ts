/**
 * Read queries over the projected views.
 *
 * These never touch the write model, so a read right after a command may not
 * reflect it yet. Callers that must observe their own write poll with
 * awaitConsistency against the returned sequence.
 */

import { ResourceScope } from '@castellan/domain-core';
import {
	type IdentityProviderConfig,
	type ProviderPredicates,
	filterActiveProviders,
} from '../domain/identity-provider/index.js';
import { UserGrant } from '../domain/user-grant/index.js';
import type { ReadViews, SecuritySettingsView, UserGrantView } from './views.js';

export const DEFAULT_LIST_LIMIT = 100;
export const MAX_LIST_LIMIT = 1000;

export type ListableGrantState = 'ACTIVE' | 'INACTIVE';

export interface UserGrantFilter {
	readonly userId?: string;
	readonly projectId?: string;
	readonly projectGrantId?: string;
	/** Grants carrying this role key */
	readonly roleKey?: string;
	readonly state?: ListableGrantState;
	readonly offset?: number;
	readonly limit?: number;
	/** Oldest first. Default: newest first. */
	readonly asc?: boolean;
}

export interface ListDetails {
	readonly totalCount: number;
	/** Feed position of the newest change the views have processed */
	readonly latestSequence: number;
	readonly latestTimestamp: Date | null;
}

export interface UserGrantList extends ListDetails {
	readonly grants: readonly UserGrantView[];
}

export interface ActiveProviders {
	readonly providers: readonly IdentityProviderConfig[];
	readonly totalCount: number;
	readonly timestamp: Date | null;
}

export interface IdentityReadModel {
	/**
	 * With `within`, only grants managed at one of those scopes are listed.
	 */
	listUserGrants(orgId: string, filter: UserGrantFilter, within?: readonly ResourceScope[]): UserGrantList;
	/** Null when absent, removed or owned by another organization */
	getUserGrant(orgId: string, grantId: string): UserGrantView | null;
	/** Like getUserGrant, but removed grants are returned too */
	findUserGrant(orgId: string, grantId: string): UserGrantView | null;
	getSecuritySettings(instanceId: string): SecuritySettingsView;
	getActiveIdentityProviders(instanceId: string, orgId: string, predicates: ProviderPredicates): ActiveProviders;
}

function matches(grant: UserGrantView, orgId: string, filter: UserGrantFilter): boolean {
	return (
		grant.resourceOwner === orgId &&
		grant.state !== 'REMOVED' &&
		(filter.userId === undefined || grant.userId === filter.userId) &&
		(filter.projectId === undefined || grant.projectId === filter.projectId) &&
		(filter.projectGrantId === undefined || grant.projectGrantId === filter.projectGrantId) &&
		(filter.roleKey === undefined || grant.roleKeys.includes(filter.roleKey)) &&
		(filter.state === undefined || grant.state === filter.state)
	);
}

function compareByCreation(a: UserGrantView, b: UserGrantView): number {
	const byDate = a.creationDate.getTime() - b.creationDate.getTime();
	if (byDate !== 0) return byDate;
	return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export function createIdentityReadModel(views: ReadViews): IdentityReadModel {
	function findUserGrant(orgId: string, grantId: string): UserGrantView | null {
		const grant = views.userGrants.get(grantId);
		return grant && grant.resourceOwner === orgId ? grant : null;
	}

	return {
		listUserGrants(orgId, filter, within) {
			const offset = filter.offset ?? 0;
			const limit = filter.limit ?? DEFAULT_LIST_LIMIT;
			const reachable = (grant: UserGrantView) =>
				within === undefined || within.some((scope) => ResourceScope.covers(scope, UserGrant.scopeOf(grant)));

			const matching = Array.from(views.userGrants.values()).filter(
				(grant) => matches(grant, orgId, filter) && reachable(grant),
			);
			matching.sort(filter.asc ? compareByCreation : (a, b) => compareByCreation(b, a));

			return {
				grants: matching.slice(offset, offset + limit),
				totalCount: matching.length,
				latestSequence: views.latestPosition,
				latestTimestamp: views.latestTimestamp,
			};
		},

		getUserGrant(orgId, grantId) {
			const grant = findUserGrant(orgId, grantId);
			return grant && grant.state !== 'REMOVED' ? grant : null;
		},

		findUserGrant,

		getSecuritySettings(instanceId) {
			return (
				views.securitySettings.get(instanceId) ?? {
					embeddedIframeEnabled: false,
					allowedOrigins: [],
					impersonationEnabled: false,
					resourceOwner: instanceId,
					sequence: 0,
					changeDate: null,
				}
			);
		},

		getActiveIdentityProviders(instanceId, orgId, predicates) {
			// the organization's own policy replaces the instance default
			const policy = views.loginPolicies.get(orgId) ?? views.loginPolicies.get(instanceId);
			const attached = new Set(policy?.idpIds ?? []);

			const configs: IdentityProviderConfig[] = [];
			for (const provider of views.providers.values()) {
				if (provider.resourceOwner !== instanceId && provider.resourceOwner !== orgId) continue;
				configs.push({
					id: provider.id,
					name: provider.name,
					type: provider.type,
					isActive: attached.has(provider.id),
					linkingAllowed: provider.linkingAllowed,
					creationAllowed: provider.creationAllowed,
					autoCreation: provider.autoCreation,
					autoLinking: provider.autoLinking,
				});
			}

			const providers = filterActiveProviders(configs, predicates);
			return { providers, totalCount: providers.length, timestamp: views.latestTimestamp };
		},
	};
}
