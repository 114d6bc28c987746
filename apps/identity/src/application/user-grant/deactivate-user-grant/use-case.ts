/**
 * Deactivate User Grant Use Case
 *
 * ACTIVE → INACTIVE. The grant keeps its role keys.
 */

import type { UseCase } from '@castellan/application';
import { Result, ExecutionContext, UseCaseError } from '@castellan/application';
import type { UnitOfWork } from '@castellan/domain-core';

import { UserGrant, UserGrantDeactivated } from '../../../domain/user-grant/index.js';
import type { UserGrantRepository } from '../../../infrastructure/repositories.js';
import { loadOwnedGrant } from '../load-grant.js';

import type { DeactivateUserGrantCommand } from './command.js';

export interface DeactivateUserGrantUseCaseDeps {
	readonly userGrants: UserGrantRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createDeactivateUserGrantUseCase(
	deps: DeactivateUserGrantUseCaseDeps,
): UseCase<DeactivateUserGrantCommand, UserGrantDeactivated> {
	const { userGrants, unitOfWork } = deps;

	return {
		async execute(
			command: DeactivateUserGrantCommand,
			context: ExecutionContext,
		): Promise<Result<UserGrantDeactivated>> {
			const grantResult = await loadOwnedGrant(userGrants, command.grantId, context.caller.orgId);
			if (Result.isFailure(grantResult)) {
				return grantResult;
			}
			const grant = grantResult.value;

			if (grant.state !== 'ACTIVE') {
				return Result.failure(
					UseCaseError.failedPrecondition('USER_GRANT_NOT_ACTIVE', 'User grant is not active', {
						grantId: grant.id,
						state: grant.state,
					}),
				);
			}

			const deactivated = UserGrant.deactivate(grant);
			const event = new UserGrantDeactivated(context, deactivated);

			return unitOfWork.commit(deactivated, event, command, { deadline: context.deadline });
		},
	};
}
