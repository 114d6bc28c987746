/**
 * Response mapping. Dates leave the service as ISO-8601 strings.
 */

import type { ChangeDetails } from '@castellan/domain-core';
import type { IdentityProviderConfig } from '../domain/identity-provider/index.js';
import type { ActiveProviders, SecuritySettingsView, UserGrantList, UserGrantView } from '../projection/index.js';

export function toChangeDetailsResponse(details: ChangeDetails) {
	return {
		sequence: details.sequence,
		changeDate: details.changeDate.toISOString(),
		resourceOwner: details.resourceOwner,
	};
}

export function toSecuritySettingsResponse(settings: SecuritySettingsView) {
	return {
		embeddedIframeEnabled: settings.embeddedIframeEnabled,
		allowedOrigins: [...settings.allowedOrigins],
		impersonationEnabled: settings.impersonationEnabled,
		details: {
			sequence: settings.sequence,
			changeDate: settings.changeDate ? settings.changeDate.toISOString() : null,
			resourceOwner: settings.resourceOwner,
		},
	};
}

export function toUserGrantResponse(grant: UserGrantView) {
	return {
		id: grant.id,
		userId: grant.userId,
		projectId: grant.projectId,
		projectGrantId: grant.projectGrantId,
		roleKeys: [...grant.roleKeys],
		state: grant.state,
		details: {
			sequence: grant.sequence,
			changeDate: grant.changeDate.toISOString(),
			resourceOwner: grant.resourceOwner,
		},
		creationDate: grant.creationDate.toISOString(),
	};
}

export function toUserGrantListResponse(list: UserGrantList) {
	return {
		grants: list.grants.map(toUserGrantResponse),
		details: {
			totalCount: list.totalCount,
			latestSequence: list.latestSequence,
			latestTimestamp: list.latestTimestamp ? list.latestTimestamp.toISOString() : null,
		},
	};
}

function toProviderResponse(provider: IdentityProviderConfig) {
	return {
		id: provider.id,
		name: provider.name,
		type: provider.type,
		options: {
			linkingAllowed: provider.linkingAllowed,
			creationAllowed: provider.creationAllowed,
			autoCreation: provider.autoCreation,
			autoLinking: provider.autoLinking,
		},
	};
}

export function toActiveProvidersResponse(result: ActiveProviders) {
	return {
		providers: result.providers.map(toProviderResponse),
		details: {
			totalCount: result.totalCount,
			timestamp: result.timestamp ? result.timestamp.toISOString() : null,
		},
	};
}
