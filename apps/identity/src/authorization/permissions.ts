/**
 * Identity Permissions
 *
 * Every permission an operation of this service checks.
 */

import { makePermission, type PermissionDefinition } from './permission-definition.js';

/**
 * Instance-wide security policy.
 */
export const SECURITY_POLICY_PERMISSIONS = {
	READ: makePermission('iam', 'policy', 'security', 'read', 'Read instance security settings'),
	WRITE: makePermission('iam', 'policy', 'security', 'write', 'Change instance security settings'),
} as const;

export const USER_GRANT_PERMISSIONS = {
	READ: makePermission('management', 'user', 'grant', 'read', 'List and read user grants'),
	WRITE: makePermission('management', 'user', 'grant', 'write', 'Add, update, deactivate and reactivate user grants'),
	DELETE: makePermission('management', 'user', 'grant', 'delete', 'Remove user grants'),
} as const;

export const LOGIN_POLICY_PERMISSIONS = {
	READ: makePermission('management', 'policy', 'login', 'read', 'Read the login policy and its identity providers'),
} as const;

/**
 * Used by the login client only; no operation of this service accepts it.
 */
export const LOGIN_SESSION_PERMISSIONS = {
	WRITE: makePermission('session', 'login', 'session', 'write', 'Drive login sessions'),
} as const;

export const ALL_PERMISSIONS: readonly PermissionDefinition[] = [
	...Object.values(SECURITY_POLICY_PERMISSIONS),
	...Object.values(USER_GRANT_PERMISSIONS),
	...Object.values(LOGIN_POLICY_PERMISSIONS),
	...Object.values(LOGIN_SESSION_PERMISSIONS),
];
