/**
 * Permission Evaluator
 *
 * Decides whether a caller may perform an action on a resource scope. A
 * membership allows the action when its role grants the permission and its
 * scope covers the target; one such membership is enough.
 *
 * Pure: the answer depends only on the caller, the action, the scope and
 * the registered roles.
 */

import { type Caller, ResourceScope } from '@castellan/domain-core';
import type { PermissionDefinition } from './permission-definition.js';
import { permissionToString } from './permission-definition.js';
import type { PermissionRegistry } from './permission-registry.js';
import { roleHasPermission } from './role-definition.js';

export type Decision = 'allow' | 'deny';

export interface PermissionEvaluator {
	check(caller: Caller, action: PermissionDefinition | string, scope: ResourceScope): Decision;
	/**
	 * Scopes strictly inside `scope` where the caller holds the permission,
	 * such as the projects of an organization it does not own.
	 */
	scopesBelow(caller: Caller, action: PermissionDefinition | string, scope: ResourceScope): readonly ResourceScope[];
}

export function createPermissionEvaluator(registry: PermissionRegistry): PermissionEvaluator {
	function heldScopes(caller: Caller, action: PermissionDefinition | string): ResourceScope[] {
		const permission = typeof action === 'string' ? action : permissionToString(action);
		const scopes: ResourceScope[] = [];
		for (const membership of caller.memberships) {
			const role = registry.getRole(membership.role);
			if (role && roleHasPermission(role, permission)) {
				scopes.push(membership.scope);
			}
		}
		return scopes;
	}

	return {
		check(caller, action, scope) {
			return heldScopes(caller, action).some((held) => ResourceScope.covers(held, scope)) ? 'allow' : 'deny';
		},

		scopesBelow(caller, action, scope) {
			return heldScopes(caller, action).filter(
				(held) => ResourceScope.covers(scope, held) && !ResourceScope.covers(held, scope),
			);
		},
	};
}
