import { Result, UseCaseError } from '@castellan/domain-core';
import { queryResult } from '@castellan/application';
import type { UserGrant } from '../../domain/user-grant/index.js';
import type { UserGrantRepository } from '../../infrastructure/repositories.js';

/**
 * Loads a grant the caller's organization may change. Absent, foreign and
 * removed grants are all reported as not found.
 */
export async function loadOwnedGrant(
	repository: UserGrantRepository,
	grantId: string,
	orgId: string,
): Promise<Result<UserGrant>> {
	const grant = await repository.findById(grantId);
	if (!grant || grant.resourceOwner !== orgId || grant.state === 'REMOVED') {
		return Result.failure(UseCaseError.notFound('USER_GRANT_NOT_FOUND', 'User grant not found', { grantId }));
	}
	return queryResult(grant);
}
