/**
 * Remove User Grant Use Case
 *
 * Soft-deletes a grant. Removal is final and releases the user/target pair
 * for a new grant.
 */

import type { UseCase } from '@castellan/application';
import { Result, ExecutionContext } from '@castellan/application';
import type { UnitOfWork } from '@castellan/domain-core';

import { UserGrant, UserGrantRemoved } from '../../../domain/user-grant/index.js';
import type { UserGrantRepository } from '../../../infrastructure/repositories.js';
import { loadOwnedGrant } from '../load-grant.js';

import type { RemoveUserGrantCommand } from './command.js';

export interface RemoveUserGrantUseCaseDeps {
	readonly userGrants: UserGrantRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createRemoveUserGrantUseCase(
	deps: RemoveUserGrantUseCaseDeps,
): UseCase<RemoveUserGrantCommand, UserGrantRemoved> {
	const { userGrants, unitOfWork } = deps;

	return {
		async execute(command: RemoveUserGrantCommand, context: ExecutionContext): Promise<Result<UserGrantRemoved>> {
			const grantResult = await loadOwnedGrant(userGrants, command.grantId, context.caller.orgId);
			if (Result.isFailure(grantResult)) {
				return grantResult;
			}

			const removed = UserGrant.remove(grantResult.value);
			const event = new UserGrantRemoved(context, removed);

			return unitOfWork.commit(removed, event, command, { deadline: context.deadline });
		},
	};
}
