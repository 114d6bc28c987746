import {
	type Caller,
	ExecutionContext,
	type Membership,
	ResourceScope,
	Result,
	type UseCaseError,
} from '@castellan/domain-core';
import { createSilentLogger } from '@castellan/logging';
import { type InMemoryDriver, createInMemoryDriver } from '@castellan/persistence';
import { type IdentityCore, createIdentityCore } from '../core.js';
import {
	type InMemoryResourceDirectory,
	type ProviderEventPublisher,
	createIdentityAggregateRegistry,
	createInMemoryResourceDirectory,
	createProviderEventPublisher,
} from '../infrastructure/index.js';

export const INSTANCE = 'inst-1';

export function callerOf(orgId: string, memberships: Membership[], principalId = `usr-${orgId}-admin`): Caller {
	return { principalId, instanceId: INSTANCE, orgId, memberships };
}

export const callers = {
	instanceOwner: callerOf('org-a', [{ role: 'IAM_OWNER', scope: ResourceScope.instance() }]),
	instanceViewer: callerOf('org-a', [{ role: 'IAM_OWNER_VIEWER', scope: ResourceScope.instance() }]),
	ownerA: callerOf('org-a', [{ role: 'ORG_OWNER', scope: ResourceScope.organization('org-a') }]),
	viewerA: callerOf('org-a', [{ role: 'ORG_OWNER_VIEWER', scope: ResourceScope.organization('org-a') }]),
	ownerB: callerOf('org-b', [{ role: 'ORG_OWNER', scope: ResourceScope.organization('org-b') }]),
	loginClient: callerOf('org-a', [{ role: 'LOGIN_CLIENT', scope: ResourceScope.instance() }], 'usr-login-client'),
};

export function contextOf(caller: Caller, deadline: Date | null = null): ExecutionContext {
	return ExecutionContext.create(caller, { correlationId: 'corr-test', deadline });
}

/**
 * org-a owns prj-1; org-b owns prj-2 and delegated it to org-a twice, once
 * actively (pg-1) and once inactive (pg-2).
 */
export function createResources(): InMemoryResourceDirectory {
	return createInMemoryResourceDirectory({
		users: [
			{ id: 'usr-1', orgId: 'org-a' },
			{ id: 'usr-2', orgId: 'org-a' },
			{ id: 'usr-3', orgId: 'org-b' },
		],
		projects: [
			{ id: 'prj-1', resourceOwner: 'org-a', roleKeys: ['viewer', 'editor', 'admin'] },
			{ id: 'prj-2', resourceOwner: 'org-b', roleKeys: ['reader', 'writer'] },
		],
		projectGrants: [
			{ id: 'pg-1', projectId: 'prj-2', grantedOrgId: 'org-a', roleKeys: ['reader'], state: 'ACTIVE' },
			{ id: 'pg-2', projectId: 'prj-2', grantedOrgId: 'org-a', roleKeys: ['reader'], state: 'INACTIVE' },
		],
	});
}

export interface Harness {
	readonly driver: InMemoryDriver;
	readonly core: IdentityCore;
	readonly resources: InMemoryResourceDirectory;
	readonly providers: ProviderEventPublisher;
	/** Wait until the read views have processed every committed event */
	settle(): Promise<void>;
	close(): Promise<void>;
}

export function createHarness(): Harness {
	const logger = createSilentLogger();
	const driver = createInMemoryDriver({ registry: createIdentityAggregateRegistry(), logger, retryDelayMs: 1 });
	const resources = createResources();
	const core = createIdentityCore({ driver, resources, logger, consistencyTimeoutMs: 2_000 });

	return {
		driver,
		core,
		resources,
		providers: createProviderEventPublisher(driver.events, logger),
		settle: () => driver.changeFeed.settled(),
		async close() {
			await core.close();
			await driver.close();
		},
	};
}

export function failureOf(result: Result<unknown>): UseCaseError {
	if (Result.isSuccess(result)) {
		throw new Error(`Expected a failure, got ${JSON.stringify(result.value)}`);
	}
	return result.error;
}
