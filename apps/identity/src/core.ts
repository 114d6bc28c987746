/**
 * Identity Core
 *
 * Transport-independent entry point. Every operation takes the caller's
 * execution context, goes through the command dispatcher (deadline and
 * permission first) and returns a Result.
 */

import {
	awaitConsistency,
	createCommand,
	DEFAULT_CONSISTENCY_TIMEOUT_MS,
	queryResult,
	validateIntegerRange,
} from '@castellan/application';
import {
	ChangeDetails,
	type DomainEvent,
	type ExecutionContext,
	ResourceScope,
	Result,
	UseCaseError,
} from '@castellan/domain-core';
import type { Logger } from '@castellan/logging';
import type { PersistenceDriver } from '@castellan/persistence';

import {
	createBulkRemoveUserGrants,
	createAddUserGrantUseCase,
	createCommandDispatcher,
	createDeactivateUserGrantUseCase,
	createReactivateUserGrantUseCase,
	createRemoveUserGrantUseCase,
	createSetSecuritySettingsUseCase,
	createUpdateUserGrantUseCase,
	grantTargetFrom,
} from './application/index.js';
import {
	createDefaultPermissionRegistry,
	createPermissionEvaluator,
	LOGIN_POLICY_PERMISSIONS,
	type PermissionDefinition,
	type PermissionRegistry,
	SECURITY_POLICY_PERMISSIONS,
	USER_GRANT_PERMISSIONS,
} from './authorization/index.js';
import type { ProviderPredicates } from './domain/identity-provider/index.js';
import type { ResourceLookup } from './domain/resource-lookup.js';
import { scopeOfTarget, UserGrant, type UserGrantAdded } from './domain/user-grant/index.js';
import { createSecuritySettingsRepository, createUserGrantRepository } from './infrastructure/repositories.js';
import {
	type ActiveProviders,
	createIdentityReadModel,
	createQueryProjector,
	MAX_LIST_LIMIT,
	type QueryProjector,
	ReadViews,
	type SecuritySettingsView,
	type UserGrantFilter,
	type UserGrantList,
	type UserGrantView,
} from './projection/index.js';

export interface SetSecuritySettingsInput {
	readonly embeddedIframeEnabled?: boolean;
	readonly allowedOrigins?: readonly string[];
	readonly impersonationEnabled?: boolean;
}

/**
 * Exactly one of projectId and projectGrantId names the target.
 */
export interface AddUserGrantInput {
	readonly userId: string;
	readonly projectId?: string | null;
	readonly projectGrantId?: string | null;
	readonly roleKeys: readonly string[];
}

export interface AddedUserGrant {
	readonly grantId: string;
	readonly details: ChangeDetails;
}

/**
 * Wait until the read view has caught up with a known write.
 */
export interface ReadOptions {
	/** Smallest acceptable sequence of the returned resource */
	readonly minSequence?: number;
}

export interface IdentityCore {
	getSecuritySettings(ctx: ExecutionContext, options?: ReadOptions): Promise<Result<SecuritySettingsView>>;
	setSecuritySettings(ctx: ExecutionContext, input: SetSecuritySettingsInput): Promise<Result<ChangeDetails>>;
	addUserGrant(ctx: ExecutionContext, input: AddUserGrantInput): Promise<Result<AddedUserGrant>>;
	updateUserGrant(ctx: ExecutionContext, grantId: string, roleKeys: readonly string[]): Promise<Result<ChangeDetails>>;
	deactivateUserGrant(ctx: ExecutionContext, grantId: string): Promise<Result<ChangeDetails>>;
	reactivateUserGrant(ctx: ExecutionContext, grantId: string): Promise<Result<ChangeDetails>>;
	removeUserGrant(ctx: ExecutionContext, grantId: string): Promise<Result<ChangeDetails>>;
	bulkRemoveUserGrants(ctx: ExecutionContext, grantIds: readonly string[]): Promise<Result<void>>;
	listUserGrants(ctx: ExecutionContext, filter?: UserGrantFilter): Promise<Result<UserGrantList>>;
	getUserGrantById(ctx: ExecutionContext, grantId: string, options?: ReadOptions): Promise<Result<UserGrantView>>;
	getActiveIdentityProviders(
		ctx: ExecutionContext,
		predicates?: ProviderPredicates,
	): Promise<Result<ActiveProviders>>;

	readonly views: ReadViews;
	readonly projector: QueryProjector;
	/** Stop the projector. The driver is closed by its owner. */
	close(): Promise<void>;
}

export interface IdentityCoreDeps {
	readonly driver: PersistenceDriver;
	readonly resources: ResourceLookup;
	readonly logger: Logger;
	readonly permissions?: PermissionRegistry;
	/** Upper bound for reads waiting on minSequence. Default: 60s. */
	readonly consistencyTimeoutMs?: number;
	/** Default: true */
	readonly startProjector?: boolean;
}

export function createIdentityCore(deps: IdentityCoreDeps): IdentityCore {
	const { driver, resources } = deps;
	const logger = deps.logger.child({ component: 'identity-core' });
	const consistencyTimeoutMs = deps.consistencyTimeoutMs ?? DEFAULT_CONSISTENCY_TIMEOUT_MS;

	const evaluator = createPermissionEvaluator(deps.permissions ?? createDefaultPermissionRegistry());
	const dispatcher = createCommandDispatcher({ evaluator, logger });

	const userGrants = createUserGrantRepository(driver.aggregates);
	const securitySettings = createSecuritySettingsRepository(driver.aggregates);
	const unitOfWork = driver.unitOfWork;

	const addUserGrant = createAddUserGrantUseCase({ resources, unitOfWork });
	const updateUserGrant = createUpdateUserGrantUseCase({ userGrants, resources, unitOfWork });
	const deactivateUserGrant = createDeactivateUserGrantUseCase({ userGrants, unitOfWork });
	const reactivateUserGrant = createReactivateUserGrantUseCase({ userGrants, unitOfWork });
	const removeUserGrant = createRemoveUserGrantUseCase({ userGrants, unitOfWork });
	const bulkRemoveUserGrants = createBulkRemoveUserGrants({ removeUserGrant, logger });
	const setSecuritySettings = createSetSecuritySettingsUseCase({ securitySettings, unitOfWork });

	const views = new ReadViews();
	const readModel = createIdentityReadModel(views);
	const projector = createQueryProjector({ changeFeed: driver.changeFeed, views, logger: deps.logger });
	if (deps.startProjector ?? true) {
		projector.start();
	}

	const orgScope = (ctx: ExecutionContext) => ResourceScope.organization(ctx.caller.orgId);

	const grantNotFound = (grantId: string) =>
		Result.failure<never>(UseCaseError.notFound('USER_GRANT_NOT_FOUND', 'User grant not found', { grantId }));

	/**
	 * Whether project or project grant memberships reach the grant. Absent and
	 * foreign grants are out of reach, so such callers are denied either way.
	 */
	async function grantWithin(ctx: ExecutionContext, grantId: string, scopes: readonly ResourceScope[]): Promise<boolean> {
		const grant = await userGrants.findById(grantId.trim());
		if (!grant || grant.resourceOwner !== ctx.caller.orgId) {
			return false;
		}
		const target = UserGrant.scopeOf(grant);
		return scopes.some((scope) => ResourceScope.covers(scope, target));
	}

	/**
	 * Read once, or poll until the resource reaches minSequence.
	 */
	function readAtLeast<T extends { readonly sequence: number }>(
		ctx: ExecutionContext,
		read: () => Promise<Result<T>>,
		options: ReadOptions,
	): Promise<Result<T>> {
		const { minSequence } = options;
		if (minSequence === undefined) {
			return read();
		}
		return awaitConsistency(read, (value) => value.sequence >= minSequence, {
			timeoutMs: consistencyTimeoutMs,
			deadline: ctx.deadline,
		});
	}

	async function grantCommand(
		ctx: ExecutionContext,
		operation: string,
		permission: PermissionDefinition,
		grantId: string,
		run: () => Promise<Result<DomainEvent>>,
	): Promise<Result<ChangeDetails>> {
		const result = await dispatcher.command(ctx, {
			operation,
			permission,
			scope: orgScope(ctx),
			admitWithin: (scopes) => grantWithin(ctx, grantId, scopes),
			run,
		});
		return Result.map(result, (committed) => committed.details);
	}

	return {
		views,
		projector,

		async getSecuritySettings(ctx, options = {}) {
			return readAtLeast(
				ctx,
				() =>
					dispatcher.dispatch<SecuritySettingsView>(ctx, {
						operation: 'GetSecuritySettings',
						permission: SECURITY_POLICY_PERMISSIONS.READ,
						scope: ResourceScope.instance(),
						run: async () => queryResult(readModel.getSecuritySettings(ctx.caller.instanceId)),
					}),
				options,
			);
		},

		async setSecuritySettings(ctx, input) {
			const command = createCommand('SetSecuritySettings', { ...input });
			const result = await dispatcher.dispatch(ctx, {
				operation: 'SetSecuritySettings',
				permission: SECURITY_POLICY_PERMISSIONS.WRITE,
				scope: ResourceScope.instance(),
				run: () => setSecuritySettings.execute(command, ctx),
			});
			return Result.map(result, (outcome) => {
				if (outcome.kind === 'unchanged') {
					logger.debug({ executionId: ctx.executionId }, 'Security settings unchanged, nothing committed');
					return outcome.details;
				}
				logger.info(
					{ executionId: ctx.executionId, sequence: outcome.event.sequence },
					'Security settings committed',
				);
				return ChangeDetails.fromEvent(outcome.event);
			});
		},

		async addUserGrant(ctx, input) {
			const result = await dispatcher.command<UserGrantAdded>(ctx, {
				operation: 'AddUserGrant',
				permission: USER_GRANT_PERMISSIONS.WRITE,
				scope: orgScope(ctx),
				admitWithin: async (scopes) => {
					const target = grantTargetFrom(input);
					if (Result.isFailure(target)) return false;
					const targetScope = scopeOfTarget(ctx.caller.orgId, target.value);
					return scopes.some((scope) => ResourceScope.covers(scope, targetScope));
				},
				run: async () => {
					const target = grantTargetFrom(input);
					if (Result.isFailure(target)) return target;
					const command = createCommand('AddUserGrant', {
						userId: input.userId,
						target: target.value,
						roleKeys: input.roleKeys,
					});
					return addUserGrant.execute(command, ctx);
				},
			});
			return Result.map(result, (committed) => ({
				grantId: committed.event.grantId,
				details: committed.details,
			}));
		},

		updateUserGrant(ctx, grantId, roleKeys) {
			const command = createCommand('UpdateUserGrant', { grantId, roleKeys });
			return grantCommand(ctx, 'UpdateUserGrant', USER_GRANT_PERMISSIONS.WRITE, grantId, () =>
				updateUserGrant.execute(command, ctx),
			);
		},

		deactivateUserGrant(ctx, grantId) {
			const command = createCommand('DeactivateUserGrant', { grantId });
			return grantCommand(ctx, 'DeactivateUserGrant', USER_GRANT_PERMISSIONS.WRITE, grantId, () =>
				deactivateUserGrant.execute(command, ctx),
			);
		},

		reactivateUserGrant(ctx, grantId) {
			const command = createCommand('ReactivateUserGrant', { grantId });
			return grantCommand(ctx, 'ReactivateUserGrant', USER_GRANT_PERMISSIONS.WRITE, grantId, () =>
				reactivateUserGrant.execute(command, ctx),
			);
		},

		removeUserGrant(ctx, grantId) {
			const command = createCommand('RemoveUserGrant', { grantId });
			return grantCommand(ctx, 'RemoveUserGrant', USER_GRANT_PERMISSIONS.DELETE, grantId, () =>
				removeUserGrant.execute(command, ctx),
			);
		},

		bulkRemoveUserGrants(ctx, grantIds) {
			const command = createCommand('BulkRemoveUserGrants', { grantIds });
			return dispatcher.dispatch<void>(ctx, {
				operation: 'BulkRemoveUserGrants',
				permission: USER_GRANT_PERMISSIONS.DELETE,
				scope: orgScope(ctx),
				// every listed grant must be within reach, or nothing is removed
				admitWithin: async (scopes) => {
					const reached = await Promise.all(grantIds.map((grantId) => grantWithin(ctx, grantId, scopes)));
					return reached.every(Boolean);
				},
				run: () => bulkRemoveUserGrants.execute(command, ctx),
			});
		},

		listUserGrants(ctx, filter = {}) {
			return dispatcher.dispatch<UserGrantList>(ctx, {
				operation: 'ListUserGrants',
				permission: USER_GRANT_PERMISSIONS.READ,
				scope: orgScope(ctx),
				admitWithin: async () => true,
				run: async (access) => {
					if (filter.limit !== undefined) {
						const limit = validateIntegerRange(filter.limit, 1, MAX_LIST_LIMIT, 'limit', 'INVALID_LIMIT');
						if (Result.isFailure(limit)) return limit;
					}
					if (filter.offset !== undefined) {
						const offset = validateIntegerRange(
							filter.offset,
							0,
							Number.MAX_SAFE_INTEGER,
							'offset',
							'INVALID_OFFSET',
						);
						if (Result.isFailure(offset)) return offset;
					}
					const within = access.kind === 'within' ? access.scopes : undefined;
					return queryResult(readModel.listUserGrants(ctx.caller.orgId, filter, within));
				},
			});
		},

		async getUserGrantById(ctx, grantId, options = {}) {
			const result = await readAtLeast(
				ctx,
				() =>
					dispatcher.dispatch<UserGrantView>(ctx, {
						operation: 'GetUserGrantByID',
						permission: USER_GRANT_PERMISSIONS.READ,
						scope: orgScope(ctx),
						admitWithin: (scopes) => grantWithin(ctx, grantId, scopes),
						run: async () => {
							// removed grants are read too, so waiting for a removal ends once it is projected
							const grant = readModel.findUserGrant(ctx.caller.orgId, grantId);
							return grant ? queryResult(grant) : grantNotFound(grantId);
						},
					}),
				options,
			);
			if (Result.isSuccess(result) && result.value.state === 'REMOVED') {
				return grantNotFound(grantId);
			}
			return result;
		},

		getActiveIdentityProviders(ctx, predicates = {}) {
			return dispatcher.dispatch<ActiveProviders>(ctx, {
				operation: 'GetActiveIdentityProviders',
				permission: LOGIN_POLICY_PERMISSIONS.READ,
				scope: orgScope(ctx),
				run: async () =>
					queryResult(
						readModel.getActiveIdentityProviders(ctx.caller.instanceId, ctx.caller.orgId, predicates),
					),
			});
		},

		async close() {
			await projector.stop();
			logger.debug('Identity core closed');
		},
	};
}
