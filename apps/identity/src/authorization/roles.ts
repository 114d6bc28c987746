/**
 * Built-in Roles
 */

import { makeRole, type RoleDefinition } from './role-definition.js';
import {
	LOGIN_POLICY_PERMISSIONS,
	LOGIN_SESSION_PERMISSIONS,
	SECURITY_POLICY_PERMISSIONS,
	USER_GRANT_PERMISSIONS,
} from './permissions.js';

export const IAM_OWNER = makeRole('IAM_OWNER', 'Instance Owner', 'Full control over the instance', [
	'iam:*:*:*',
	'management:*:*:*',
]);

export const IAM_OWNER_VIEWER = makeRole('IAM_OWNER_VIEWER', 'Instance Viewer', 'Read access to the instance', [
	'iam:*:*:read',
	'management:*:*:read',
]);

export const ORG_OWNER = makeRole('ORG_OWNER', 'Organization Owner', 'Full control over an organization', [
	'management:*:*:*',
]);

export const ORG_OWNER_VIEWER = makeRole('ORG_OWNER_VIEWER', 'Organization Viewer', 'Read access to an organization', [
	'management:*:*:read',
]);

export const ORG_USER_MANAGER = makeRole(
	'ORG_USER_MANAGER',
	'Organization User Manager',
	'Manages the users of an organization and their grants',
	['management:user:*:*'],
);

export const PROJECT_OWNER = makeRole('PROJECT_OWNER', 'Project Owner', 'Grants roles on an owned project', [
	USER_GRANT_PERMISSIONS.READ,
	USER_GRANT_PERMISSIONS.WRITE,
	USER_GRANT_PERMISSIONS.DELETE,
]);

export const PROJECT_OWNER_GLOBAL = makeRole(
	'PROJECT_OWNER_GLOBAL',
	'Global Project Owner',
	'Grants roles on a project, including to users of other organizations',
	['management:user:grant:*'],
);

export const PROJECT_GRANT_OWNER = makeRole(
	'PROJECT_GRANT_OWNER',
	'Project Grant Owner',
	'Grants the roles delegated by a project grant',
	[USER_GRANT_PERMISSIONS.READ, USER_GRANT_PERMISSIONS.WRITE, USER_GRANT_PERMISSIONS.DELETE],
);

export const LOGIN_CLIENT = makeRole('LOGIN_CLIENT', 'Login Client', 'Service account of the login UI', [
	LOGIN_SESSION_PERMISSIONS.WRITE,
]);

/**
 * Read-only administrators of the security policy.
 */
export const SECURITY_POLICY_VIEWER = makeRole(
	'SECURITY_POLICY_VIEWER',
	'Security Policy Viewer',
	'Reads the instance security settings and login providers',
	[SECURITY_POLICY_PERMISSIONS.READ, LOGIN_POLICY_PERMISSIONS.READ],
);

export const ALL_ROLES: readonly RoleDefinition[] = [
	IAM_OWNER,
	IAM_OWNER_VIEWER,
	ORG_OWNER,
	ORG_OWNER_VIEWER,
	ORG_USER_MANAGER,
	PROJECT_OWNER,
	PROJECT_OWNER_GLOBAL,
	PROJECT_GRANT_OWNER,
	LOGIN_CLIENT,
	SECURITY_POLICY_VIEWER,
];
