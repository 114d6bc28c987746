/**
 * Role Definition
 *
 * Roles are named collections of permission patterns. Where a role applies
 * is decided by the scope of the membership that carries it, not by the role.
 */

import { type PermissionDefinition, matchesPattern, permissionToString } from './permission-definition.js';

export interface RoleDefinition {
	/** Unique role code (e.g., "ORG_OWNER") */
	readonly code: string;
	readonly name: string;
	readonly description: string;
	/** Permission strings this role grants (can include wildcards) */
	readonly permissions: readonly string[];
}

export function makeRole(
	code: string,
	name: string,
	description: string,
	permissions: readonly (PermissionDefinition | string)[],
): RoleDefinition {
	return {
		code,
		name,
		description,
		permissions: permissions.map((p) => (typeof p === 'string' ? p : permissionToString(p))),
	};
}

export function roleHasPermission(role: RoleDefinition, permission: string): boolean {
	return role.permissions.some((pattern) => matchesPattern(permission, pattern));
}
