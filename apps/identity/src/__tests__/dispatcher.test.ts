import { describe, it, expect, vi } from 'vitest';
import { queryResult } from '@castellan/application';
import { RESULT_SUCCESS_TOKEN, ResourceScope, Result, type UseCaseError } from '@castellan/domain-core';
import { createSilentLogger } from '@castellan/logging';
import { type Access, createCommandDispatcher } from '../application/index.js';
import {
	SECURITY_POLICY_PERMISSIONS,
	USER_GRANT_PERMISSIONS,
	createDefaultPermissionRegistry,
	createPermissionEvaluator,
} from '../authorization/index.js';
import { UserGrant, UserGrantAdded } from '../domain/user-grant/index.js';
import { callerOf, callers, contextOf, failureOf } from './fixtures.js';

describe('CommandDispatcher', () => {
	const dispatcher = createCommandDispatcher({
		evaluator: createPermissionEvaluator(createDefaultPermissionRegistry()),
		logger: createSilentLogger(),
	});
	const ctx = contextOf(callers.ownerA);
	const orgScope = ResourceScope.organization('org-a');

	it('should run an allowed operation and return its result', async () => {
		const run = vi.fn(async () => queryResult('done'));

		const result = await dispatcher.dispatch(ctx, {
			operation: 'ListUserGrants',
			permission: USER_GRANT_PERMISSIONS.READ,
			scope: orgScope,
			run,
		});

		expect(Result.unwrap(result)).toBe('done');
		expect(run).toHaveBeenCalledTimes(1);
	});

	it('should not run a denied operation', async () => {
		const run = vi.fn(async () => queryResult('done'));

		const result = await dispatcher.dispatch(ctx, {
			operation: 'SetSecuritySettings',
			permission: SECURITY_POLICY_PERMISSIONS.WRITE,
			scope: ResourceScope.instance(),
			run,
		});

		expect(failureOf(result)).toEqual({
			type: 'permission_denied',
			code: 'PERMISSION_DENIED',
			message: 'Caller is not allowed to perform this operation',
			details: { permission: 'iam:policy:security:write' },
		});
		expect(run).not.toHaveBeenCalled();
	});

	it('should admit a project-scoped caller when the target is within reach', async () => {
		const projectOwner = contextOf(
			callerOf('org-a', [{ role: 'PROJECT_OWNER', scope: ResourceScope.project('org-a', 'prj-1') }]),
		);
		const admitWithin = vi.fn(async () => true);
		const run = vi.fn(async (access: Access) => queryResult(access));

		const result = await dispatcher.dispatch(projectOwner, {
			operation: 'ListUserGrants',
			permission: USER_GRANT_PERMISSIONS.READ,
			scope: orgScope,
			admitWithin,
			run,
		});

		expect(Result.unwrap(result)).toEqual({ kind: 'within', scopes: [ResourceScope.project('org-a', 'prj-1')] });
		expect(admitWithin).toHaveBeenCalledWith([ResourceScope.project('org-a', 'prj-1')]);
	});

	it('should deny without consulting admitWithin when nothing is held inside the scope', async () => {
		const admitWithin = vi.fn(async () => true);
		const run = vi.fn(async () => queryResult('done'));

		const result = await dispatcher.dispatch(contextOf(callers.loginClient), {
			operation: 'RemoveUserGrant',
			permission: USER_GRANT_PERMISSIONS.DELETE,
			scope: orgScope,
			admitWithin,
			run,
		});

		expect(failureOf(result)).toMatchObject({ code: 'PERMISSION_DENIED' });
		expect(admitWithin).not.toHaveBeenCalled();
		expect(run).not.toHaveBeenCalled();
	});

	it('should not run an operation whose deadline has passed', async () => {
		const run = vi.fn(async () => queryResult('done'));
		const expired = contextOf(callers.ownerA, new Date(Date.now() - 1));

		const result = await dispatcher.dispatch(expired, {
			operation: 'ListUserGrants',
			permission: USER_GRANT_PERMISSIONS.READ,
			scope: orgScope,
			run,
		});

		expect(failureOf(result)).toMatchObject({ type: 'deadline_exceeded', code: 'DEADLINE_EXCEEDED' });
		expect(run).not.toHaveBeenCalled();
	});

	it('should turn a thrown error into an internal failure', async () => {
		const result = await dispatcher.dispatch<string>(ctx, {
			operation: 'ListUserGrants',
			permission: USER_GRANT_PERMISSIONS.READ,
			scope: orgScope,
			run: async () => {
				throw new Error('storage offline');
			},
		});

		const error: UseCaseError = failureOf(result);
		expect(error).toMatchObject({ type: 'internal', code: 'UNEXPECTED_ERROR', message: 'storage offline' });
	});

	it('should describe a committed event', async () => {
		const grant = UserGrant.create({
			userId: 'usr-1',
			projectId: 'prj-1',
			projectGrantId: null,
			roleKeys: ['viewer'],
			resourceOwner: 'org-a',
		});
		const event = new UserGrantAdded(ctx, grant);

		const result = await dispatcher.command(ctx, {
			operation: 'AddUserGrant',
			permission: USER_GRANT_PERMISSIONS.WRITE,
			scope: orgScope,
			run: async () => Result.success(RESULT_SUCCESS_TOKEN, event),
		});

		const committed = Result.unwrap(result);
		expect(committed.event).toBe(event);
		expect(committed.details).toEqual({ sequence: 1, changeDate: grant.changeDate, resourceOwner: 'org-a' });
	});
});
