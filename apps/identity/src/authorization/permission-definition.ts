/**
 * Permission Definition
 *
 * Permissions use a hierarchical naming scheme:
 * {subdomain}:{context}:{aggregate}:{action}
 *
 * Example: "management:user:grant:write"
 */

export interface PermissionDefinition {
	/** Subdomain (e.g., "management") */
	readonly subdomain: string;
	/** Context (e.g., "user") */
	readonly context: string;
	/** Aggregate/resource (e.g., "grant") */
	readonly aggregate: string;
	/** Action (e.g., "read", "write", "delete") */
	readonly action: string;
	readonly description: string;
}

export function permissionToString(permission: PermissionDefinition): string {
	return `${permission.subdomain}:${permission.context}:${permission.aggregate}:${permission.action}`;
}

export function makePermission(
	subdomain: string,
	context: string,
	aggregate: string,
	action: string,
	description: string,
): PermissionDefinition {
	return { subdomain, context, aggregate, action, description };
}

/**
 * Check if a permission matches a pattern. Patterns support wildcards (*)
 * at any level.
 *
 * @example
 * matchesPattern("management:user:grant:write", "management:user:*:*") // true
 * matchesPattern("management:user:grant:write", "iam:*:*:*") // false
 */
export function matchesPattern(permission: string, pattern: string): boolean {
	const permParts = permission.split(':');
	const patternParts = pattern.split(':');

	if (permParts.length !== 4 || patternParts.length !== 4) {
		return false;
	}

	for (let i = 0; i < 4; i++) {
		if (patternParts[i] !== '*' && patternParts[i] !== permParts[i]) {
			return false;
		}
	}

	return true;
}
