/**
 * Update User Grant Use Case
 *
 * Replaces the role keys of a grant. The new keys are checked against the
 * grant's project or project grant as it is now, not as it was when the
 * grant was added.
 */

import type { UseCase } from '@castellan/application';
import { validateNonEmptyList, Result, ExecutionContext, UseCaseError } from '@castellan/application';
import type { UnitOfWork } from '@castellan/domain-core';

import type { ResourceLookup } from '../../../domain/resource-lookup.js';
import { UserGrant, UserGrantChanged } from '../../../domain/user-grant/index.js';
import type { UserGrantRepository } from '../../../infrastructure/repositories.js';
import { checkRoleKeys, resolveGrantTarget, targetOf } from '../grant-target.js';
import { loadOwnedGrant } from '../load-grant.js';

import type { UpdateUserGrantCommand } from './command.js';

export interface UpdateUserGrantUseCaseDeps {
	readonly userGrants: UserGrantRepository;
	readonly resources: ResourceLookup;
	readonly unitOfWork: UnitOfWork;
}

export function createUpdateUserGrantUseCase(
	deps: UpdateUserGrantUseCaseDeps,
): UseCase<UpdateUserGrantCommand, UserGrantChanged> {
	const { userGrants, resources, unitOfWork } = deps;

	return {
		async execute(command: UpdateUserGrantCommand, context: ExecutionContext): Promise<Result<UserGrantChanged>> {
			const roleKeysResult = validateNonEmptyList(command.roleKeys, 'roleKeys', 'ROLE_KEYS_REQUIRED');
			if (Result.isFailure(roleKeysResult)) {
				return roleKeysResult;
			}
			const roleKeys = roleKeysResult.value;

			const grantResult = await loadOwnedGrant(userGrants, command.grantId, context.caller.orgId);
			if (Result.isFailure(grantResult)) {
				return grantResult;
			}
			const grant = grantResult.value;

			const targetResult = await resolveGrantTarget(resources, grant.resourceOwner, targetOf(grant));
			if (Result.isFailure(targetResult)) {
				return targetResult;
			}

			const roleKeyError = checkRoleKeys(targetResult.value, roleKeys);
			if (roleKeyError) {
				return Result.failure(roleKeyError);
			}

			if (UserGrant.hasSameRoles(grant, roleKeys)) {
				return Result.failure(
					UseCaseError.failedPrecondition('USER_GRANT_UNCHANGED', 'User grant already has these role keys', {
						grantId: grant.id,
					}),
				);
			}

			const updated = UserGrant.changeRoles(grant, roleKeys);
			const event = new UserGrantChanged(context, updated);

			return unitOfWork.commit(updated, event, command, { deadline: context.deadline });
		},
	};
}
