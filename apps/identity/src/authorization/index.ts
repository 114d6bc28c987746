/**
 * Authorization Module
 */

export * from './permission-definition.js';
export * from './role-definition.js';
export * from './permission-registry.js';
export * from './permission-evaluator.js';
export * from './permissions.js';
export * from './roles.js';

import { PermissionRegistry } from './permission-registry.js';
import { ALL_PERMISSIONS } from './permissions.js';
import { ALL_ROLES } from './roles.js';

/**
 * Registry with every built-in permission and role.
 */
export function createDefaultPermissionRegistry(): PermissionRegistry {
	const registry = new PermissionRegistry();
	registry.registerPermissions(ALL_PERMISSIONS);
	registry.registerRoles(ALL_ROLES);
	return registry;
}
