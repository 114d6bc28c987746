/**
 * Permission Registry
 *
 * Holds the permission and role definitions the evaluator consults.
 */

import { type PermissionDefinition, permissionToString } from './permission-definition.js';
import type { RoleDefinition } from './role-definition.js';

export class PermissionRegistry {
	private readonly permissions = new Map<string, PermissionDefinition>();
	private readonly roles = new Map<string, RoleDefinition>();

	registerPermission(permission: PermissionDefinition): void {
		this.permissions.set(permissionToString(permission), permission);
	}

	registerPermissions(permissions: readonly PermissionDefinition[]): void {
		for (const permission of permissions) {
			this.registerPermission(permission);
		}
	}

	registerRole(role: RoleDefinition): void {
		this.roles.set(role.code, role);
	}

	registerRoles(roles: readonly RoleDefinition[]): void {
		for (const role of roles) {
			this.registerRole(role);
		}
	}

	getPermission(permissionString: string): PermissionDefinition | undefined {
		return this.permissions.get(permissionString);
	}

	getRole(code: string): RoleDefinition | undefined {
		return this.roles.get(code);
	}

	getAllPermissions(): readonly PermissionDefinition[] {
		return Array.from(this.permissions.values());
	}

	getAllRoles(): readonly RoleDefinition[] {
		return Array.from(this.roles.values());
	}

	hasPermission(permissionString: string): boolean {
		return this.permissions.has(permissionString);
	}
}
