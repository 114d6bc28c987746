/**
 * Resolves what a grant points at and which role keys it may carry.
 *
 * A direct grant needs a project owned by the caller's organization and may
 * use the project's role keys. A grant through a project grant needs an
 * active project grant delegated to the caller's organization and may only
 * use the delegated keys.
 */

import { queryResult } from '@castellan/application';
import { Result, UseCaseError } from '@castellan/domain-core';
import type { ResourceLookup } from '../../domain/resource-lookup.js';
import type { GrantTarget } from '../../domain/user-grant/index.js';

export interface ResolvedTarget {
	readonly projectId: string;
	readonly projectGrantId: string | null;
	readonly availableRoleKeys: readonly string[];
}

export async function resolveGrantTarget(
	lookup: ResourceLookup,
	orgId: string,
	target: GrantTarget,
): Promise<Result<ResolvedTarget>> {
	if (target.kind === 'project') {
		const project = await lookup.findProject(target.projectId);
		if (!project || project.resourceOwner !== orgId) {
			return Result.failure(
				UseCaseError.failedPrecondition('PROJECT_NOT_FOUND', 'Project not found', { projectId: target.projectId }),
			);
		}
		return queryResult({ projectId: project.id, projectGrantId: null, availableRoleKeys: project.roleKeys });
	}

	const projectGrant = await lookup.findProjectGrant(target.projectGrantId);
	if (!projectGrant || projectGrant.grantedOrgId !== orgId) {
		return Result.failure(
			UseCaseError.failedPrecondition('PROJECT_GRANT_NOT_FOUND', 'Project grant not found', {
				projectGrantId: target.projectGrantId,
			}),
		);
	}
	if (projectGrant.state !== 'ACTIVE') {
		return Result.failure(
			UseCaseError.failedPrecondition('PROJECT_GRANT_NOT_ACTIVE', 'Project grant is not active', {
				projectGrantId: projectGrant.id,
				state: projectGrant.state,
			}),
		);
	}
	return queryResult({
		projectId: projectGrant.projectId,
		projectGrantId: projectGrant.id,
		availableRoleKeys: projectGrant.roleKeys,
	});
}

/**
 * Fails with ROLE_KEY_NOT_FOUND naming the first key the target does not offer.
 */
export function checkRoleKeys(target: ResolvedTarget, roleKeys: readonly string[]): UseCaseError | null {
	const available = new Set(target.availableRoleKeys);
	const missing = roleKeys.filter((key) => !available.has(key));
	if (missing.length === 0) {
		return null;
	}
	return UseCaseError.failedPrecondition('ROLE_KEY_NOT_FOUND', `Role key '${missing[0]}' is not available`, {
		roleKeys: missing,
		projectId: target.projectId,
		projectGrantId: target.projectGrantId,
	});
}

export function targetOf(grant: { projectId: string; projectGrantId: string | null }): GrantTarget {
	return grant.projectGrantId
		? { kind: 'projectGrant', projectGrantId: grant.projectGrantId }
		: { kind: 'project', projectId: grant.projectId };
}

/**
 * Target from a request naming a project, a project grant, or (invalidly)
 * both or neither.
 */
export function grantTargetFrom(input: {
	readonly projectId?: string | null;
	readonly projectGrantId?: string | null;
}): Result<GrantTarget> {
	const projectId = input.projectId?.trim() || null;
	const projectGrantId = input.projectGrantId?.trim() || null;

	if (projectId && projectGrantId) {
		return Result.failure(
			UseCaseError.validation('AMBIGUOUS_GRANT_TARGET', 'Specify either projectId or projectGrantId, not both'),
		);
	}
	if (projectGrantId) {
		return queryResult({ kind: 'projectGrant', projectGrantId });
	}
	if (projectId) {
		return queryResult({ kind: 'project', projectId });
	}
	return Result.failure(
		UseCaseError.validation('GRANT_TARGET_REQUIRED', 'Either projectId or projectGrantId is required'),
	);
}
