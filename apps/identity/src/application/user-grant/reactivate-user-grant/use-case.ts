/**
 * Reactivate User Grant Use Case
 *
 * INACTIVE → ACTIVE.
 */

import type { UseCase } from '@castellan/application';
import { Result, ExecutionContext, UseCaseError } from '@castellan/application';
import type { UnitOfWork } from '@castellan/domain-core';

import { UserGrant, UserGrantReactivated } from '../../../domain/user-grant/index.js';
import type { UserGrantRepository } from '../../../infrastructure/repositories.js';
import { loadOwnedGrant } from '../load-grant.js';

import type { ReactivateUserGrantCommand } from './command.js';

export interface ReactivateUserGrantUseCaseDeps {
	readonly userGrants: UserGrantRepository;
	readonly unitOfWork: UnitOfWork;
}

export function createReactivateUserGrantUseCase(
	deps: ReactivateUserGrantUseCaseDeps,
): UseCase<ReactivateUserGrantCommand, UserGrantReactivated> {
	const { userGrants, unitOfWork } = deps;

	return {
		async execute(
			command: ReactivateUserGrantCommand,
			context: ExecutionContext,
		): Promise<Result<UserGrantReactivated>> {
			const grantResult = await loadOwnedGrant(userGrants, command.grantId, context.caller.orgId);
			if (Result.isFailure(grantResult)) {
				return grantResult;
			}
			const grant = grantResult.value;

			if (grant.state !== 'INACTIVE') {
				return Result.failure(
					UseCaseError.failedPrecondition('USER_GRANT_NOT_INACTIVE', 'User grant is not inactive', {
						grantId: grant.id,
						state: grant.state,
					}),
				);
			}

			const reactivated = UserGrant.reactivate(grant);
			const event = new UserGrantReactivated(context, reactivated);

			return unitOfWork.commit(reactivated, event, command, { deadline: context.deadline });
		},
	};
}
