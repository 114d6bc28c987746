/**
 * Bulk Remove User Grants
 *
 * Removes each grant independently and concurrently, then waits for all of
 * them. Individual failures are logged and do not fail the request; the
 * caller cannot tell which grants were removed. A deadline may stop some of
 * the removals.
 */

import { validateNonEmptyList, queryResult, Result, ExecutionContext } from '@castellan/application';
import type { Logger } from '@castellan/logging';
import type { UseCase } from '@castellan/application';
import type { UserGrantRemoved } from '../../../domain/user-grant/index.js';
import type { RemoveUserGrantCommand } from '../remove-user-grant/command.js';

import type { BulkRemoveUserGrantsCommand } from './command.js';

export interface BulkRemoveUserGrantsDeps {
	readonly removeUserGrant: UseCase<RemoveUserGrantCommand, UserGrantRemoved>;
	readonly logger: Logger;
}

export interface BulkRemoveUserGrants {
	execute(command: BulkRemoveUserGrantsCommand, context: ExecutionContext): Promise<Result<void>>;
}

export function createBulkRemoveUserGrants(deps: BulkRemoveUserGrantsDeps): BulkRemoveUserGrants {
	const { removeUserGrant, logger } = deps;

	return {
		async execute(command, context) {
			const idsResult = validateNonEmptyList(command.grantIds, 'grantIds', 'GRANT_IDS_REQUIRED');
			if (Result.isFailure(idsResult)) {
				return idsResult;
			}

			const outcomes = await Promise.allSettled(
				idsResult.value.map((grantId) =>
					removeUserGrant.execute({ _type: 'RemoveUserGrant', grantId }, context),
				),
			);

			outcomes.forEach((outcome, i) => {
				const grantId = idsResult.value[i];
				if (outcome.status === 'rejected') {
					logger.warn({ err: outcome.reason, grantId }, 'Bulk removal of user grant threw');
				} else if (Result.isFailure(outcome.value)) {
					logger.warn(
						{ grantId, code: outcome.value.error.code, type: outcome.value.error.type },
						'Bulk removal of user grant failed',
					);
				}
			});

			return queryResult(undefined);
		},
	};
}
