/**
 * Add User Grant Use Case
 *
 * Grants role keys to a user on a project of the caller's organization, or on
 * a project delegated to it through a project grant. The grant starts ACTIVE
 * and is owned by the caller's organization.
 */

import type { UseCase } from '@castellan/application';
import { validateRequired, validateNonEmptyList, Result, ExecutionContext, UseCaseError } from '@castellan/application';
import type { UnitOfWork } from '@castellan/domain-core';

import type { ResourceLookup } from '../../../domain/resource-lookup.js';
import { UserGrant, UserGrantAdded } from '../../../domain/user-grant/index.js';
import { checkRoleKeys, resolveGrantTarget } from '../grant-target.js';

import type { AddUserGrantCommand } from './command.js';

export interface AddUserGrantUseCaseDeps {
	readonly resources: ResourceLookup;
	readonly unitOfWork: UnitOfWork;
}

export function createAddUserGrantUseCase(deps: AddUserGrantUseCaseDeps): UseCase<AddUserGrantCommand, UserGrantAdded> {
	const { resources, unitOfWork } = deps;

	return {
		async execute(command: AddUserGrantCommand, context: ExecutionContext): Promise<Result<UserGrantAdded>> {
			const userIdResult = validateRequired(command.userId, 'userId', 'USER_ID_REQUIRED');
			if (Result.isFailure(userIdResult)) {
				return userIdResult;
			}

			const roleKeysResult = validateNonEmptyList(command.roleKeys, 'roleKeys', 'ROLE_KEYS_REQUIRED');
			if (Result.isFailure(roleKeysResult)) {
				return roleKeysResult;
			}
			const roleKeys = roleKeysResult.value;

			const user = await resources.findUser(userIdResult.value);
			if (!user) {
				return Result.failure(
					UseCaseError.failedPrecondition('USER_NOT_FOUND', 'User not found', { userId: command.userId }),
				);
			}

			const orgId = context.caller.orgId;
			const targetResult = await resolveGrantTarget(resources, orgId, command.target);
			if (Result.isFailure(targetResult)) {
				return targetResult;
			}

			const roleKeyError = checkRoleKeys(targetResult.value, roleKeys);
			if (roleKeyError) {
				return Result.failure(roleKeyError);
			}

			const grant = UserGrant.create({
				userId: user.id,
				projectId: targetResult.value.projectId,
				projectGrantId: targetResult.value.projectGrantId,
				roleKeys,
				resourceOwner: orgId,
			});
			const event = new UserGrantAdded(context, grant);

			// an existing non-removed grant on the same target fails the commit
			return unitOfWork.commit(grant, event, command, { deadline: context.deadline });
		},
	};
}
