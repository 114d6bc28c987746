import { describe, it, expect } from 'vitest';
import { ResourceScope } from '@castellan/domain-core';
import {
	createDefaultPermissionRegistry,
	createPermissionEvaluator,
	matchesPattern,
	LOGIN_POLICY_PERMISSIONS,
	SECURITY_POLICY_PERMISSIONS,
	USER_GRANT_PERMISSIONS,
} from '../authorization/index.js';
import { callerOf, callers } from './fixtures.js';

const evaluator = createPermissionEvaluator(createDefaultPermissionRegistry());

describe('matchesPattern', () => {
	it('should match wildcards per segment', () => {
		expect(matchesPattern('management:user:grant:write', 'management:user:*:*')).toBe(true);
		expect(matchesPattern('management:user:grant:write', 'management:*:*:read')).toBe(false);
		expect(matchesPattern('management:user:grant:write', 'iam:*:*:*')).toBe(false);
	});

	it('should reject malformed permissions and patterns', () => {
		expect(matchesPattern('management:user:grant', 'management:*:*:*')).toBe(false);
		expect(matchesPattern('management:user:grant:write', '*')).toBe(false);
	});
});

describe('PermissionEvaluator', () => {
	it('should let the instance owner do everything anywhere', () => {
		const scope = ResourceScope.organization('org-z');

		expect(evaluator.check(callers.instanceOwner, SECURITY_POLICY_PERMISSIONS.WRITE, ResourceScope.instance())).toBe(
			'allow',
		);
		expect(evaluator.check(callers.instanceOwner, USER_GRANT_PERMISSIONS.DELETE, scope)).toBe('allow');
	});

	it('should keep organization owners inside their organization', () => {
		const own = ResourceScope.organization('org-a');

		expect(evaluator.check(callers.ownerA, USER_GRANT_PERMISSIONS.WRITE, own)).toBe('allow');
		expect(evaluator.check(callers.ownerA, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.project('org-a', 'prj-1'))).toBe(
			'allow',
		);
		expect(
			evaluator.check(callers.ownerA, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.projectGrant('org-a', 'pg-1')),
		).toBe('allow');
		expect(evaluator.check(callers.ownerA, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.organization('org-b'))).toBe(
			'deny',
		);
	});

	it('should deny organization owners the instance security policy', () => {
		expect(evaluator.check(callers.ownerA, SECURITY_POLICY_PERMISSIONS.READ, ResourceScope.instance())).toBe('deny');
		expect(evaluator.check(callers.ownerA, SECURITY_POLICY_PERMISSIONS.WRITE, ResourceScope.instance())).toBe('deny');
	});

	it('should give viewers read access only', () => {
		const own = ResourceScope.organization('org-a');

		expect(evaluator.check(callers.viewerA, USER_GRANT_PERMISSIONS.READ, own)).toBe('allow');
		expect(evaluator.check(callers.viewerA, LOGIN_POLICY_PERMISSIONS.READ, own)).toBe('allow');
		expect(evaluator.check(callers.viewerA, USER_GRANT_PERMISSIONS.WRITE, own)).toBe('deny');
		expect(evaluator.check(callers.instanceViewer, SECURITY_POLICY_PERMISSIONS.READ, ResourceScope.instance())).toBe(
			'allow',
		);
		expect(evaluator.check(callers.instanceViewer, SECURITY_POLICY_PERMISSIONS.WRITE, ResourceScope.instance())).toBe(
			'deny',
		);
	});

	it('should confine project memberships to their project', () => {
		const projectOwner = callerOf('org-a', [{ role: 'PROJECT_OWNER', scope: ResourceScope.project('org-a', 'prj-1') }]);

		expect(evaluator.check(projectOwner, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.project('org-a', 'prj-1'))).toBe(
			'allow',
		);
		expect(evaluator.check(projectOwner, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.project('org-a', 'prj-9'))).toBe(
			'deny',
		);
		expect(evaluator.check(projectOwner, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.organization('org-a'))).toBe(
			'deny',
		);
	});

	it('should confine project grant memberships to their project grant', () => {
		const grantOwner = callerOf('org-a', [
			{ role: 'PROJECT_GRANT_OWNER', scope: ResourceScope.projectGrant('org-a', 'pg-1') },
		]);

		expect(
			evaluator.check(grantOwner, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.projectGrant('org-a', 'pg-1')),
		).toBe('allow');
		expect(evaluator.check(grantOwner, USER_GRANT_PERMISSIONS.WRITE, ResourceScope.project('org-a', 'prj-2'))).toBe(
			'deny',
		);
	});

	it('should list the project scopes held inside an organization', () => {
		const projectOwner = callerOf('org-a', [
			{ role: 'PROJECT_OWNER', scope: ResourceScope.project('org-a', 'prj-1') },
			{ role: 'PROJECT_OWNER', scope: ResourceScope.project('org-b', 'prj-2') },
			{ role: 'LOGIN_CLIENT', scope: ResourceScope.project('org-a', 'prj-3') },
		]);
		const own = ResourceScope.organization('org-a');

		expect(evaluator.scopesBelow(projectOwner, USER_GRANT_PERMISSIONS.DELETE, own)).toEqual([
			ResourceScope.project('org-a', 'prj-1'),
		]);
		expect(evaluator.scopesBelow(callers.ownerA, USER_GRANT_PERMISSIONS.DELETE, own)).toEqual([]);
		expect(evaluator.scopesBelow(callers.loginClient, USER_GRANT_PERMISSIONS.READ, own)).toEqual([]);
	});

	it('should deny the login client every identity operation', () => {
		const own = ResourceScope.organization('org-a');

		expect(evaluator.check(callers.loginClient, LOGIN_POLICY_PERMISSIONS.READ, own)).toBe('deny');
		expect(evaluator.check(callers.loginClient, USER_GRANT_PERMISSIONS.READ, own)).toBe('deny');
		expect(evaluator.check(callers.loginClient, SECURITY_POLICY_PERMISSIONS.READ, ResourceScope.instance())).toBe(
			'deny',
		);
	});

	it('should allow when any one membership grants the action', () => {
		const mixed = callerOf('org-a', [
			{ role: 'LOGIN_CLIENT', scope: ResourceScope.instance() },
			{ role: 'ORG_USER_MANAGER', scope: ResourceScope.organization('org-a') },
		]);

		expect(evaluator.check(mixed, USER_GRANT_PERMISSIONS.DELETE, ResourceScope.organization('org-a'))).toBe('allow');
		expect(evaluator.check(mixed, LOGIN_POLICY_PERMISSIONS.READ, ResourceScope.organization('org-a'))).toBe('deny');
	});

	it('should deny roles that are not registered', () => {
		const unknown = callerOf('org-a', [{ role: 'SUPER_USER', scope: ResourceScope.instance() }]);

		expect(evaluator.check(unknown, 'management:user:grant:read', ResourceScope.organization('org-a'))).toBe('deny');
	});
});
