/**
 * Set Security Settings Use Case
 *
 * Merges the supplied fields into the settings of the caller's instance,
 * creating them on first write. A request that would change nothing, an
 * empty one included, commits no event and answers with the current version.
 */

import { uniqueInOrder, queryResult, Result, ExecutionContext } from '@castellan/application';
import { ChangeDetails, type UnitOfWork } from '@castellan/domain-core';

import { SecuritySettings, SecuritySettingsSet } from '../../../domain/security-settings/index.js';
import type { SecuritySettingsRepository } from '../../../infrastructure/repositories.js';

import type { SetSecuritySettingsCommand } from './command.js';

export type SetSecuritySettingsOutcome =
	| { readonly kind: 'committed'; readonly event: SecuritySettingsSet }
	| { readonly kind: 'unchanged'; readonly details: ChangeDetails };

export interface SetSecuritySettingsUseCaseDeps {
	readonly securitySettings: SecuritySettingsRepository;
	readonly unitOfWork: UnitOfWork;
}

export interface SetSecuritySettingsUseCase {
	execute(command: SetSecuritySettingsCommand, context: ExecutionContext): Promise<Result<SetSecuritySettingsOutcome>>;
}

export function createSetSecuritySettingsUseCase(deps: SetSecuritySettingsUseCaseDeps): SetSecuritySettingsUseCase {
	const { securitySettings, unitOfWork } = deps;

	return {
		async execute(command, context) {
			const change = {
				embeddedIframeEnabled: command.embeddedIframeEnabled,
				allowedOrigins: command.allowedOrigins ? uniqueInOrder(command.allowedOrigins) : undefined,
				impersonationEnabled: command.impersonationEnabled,
			};

			const instanceId = context.caller.instanceId;
			const current = (await securitySettings.findByInstance(instanceId)) ?? SecuritySettings.empty(instanceId);

			const next = SecuritySettings.isEmptyChange(change) ? null : SecuritySettings.apply(current, change);
			if (!next) {
				return queryResult<SetSecuritySettingsOutcome>({
					kind: 'unchanged',
					details: ChangeDetails.fromAggregate(current),
				});
			}

			const event = new SecuritySettingsSet(context, next);
			const committed = await unitOfWork.commit(next, event, command, { deadline: context.deadline });
			return Result.map(committed, (e): SetSecuritySettingsOutcome => ({ kind: 'committed', event: e }));
		},
	};
}
