import { BaseDomainEvent, DomainEvent, type ExecutionContext } from '@castellan/domain-core';
import type { SecuritySettings } from './security-settings.js';

export const SECURITY_SETTINGS_EVENT_TYPES = {
	SET: DomainEvent.eventType('identity', 'iam', 'securitysettings', 'set'),
} as const;

/**
 * Full settings after the change, so that a projection never needs the
 * previous state.
 */
export interface SecuritySettingsSetData {
	readonly embeddedIframeEnabled: boolean;
	readonly allowedOrigins: readonly string[];
	readonly impersonationEnabled: boolean;
	readonly [key: string]: unknown;
}

export class SecuritySettingsSet extends BaseDomainEvent<SecuritySettingsSetData> {
	constructor(ctx: ExecutionContext, settings: SecuritySettings) {
		super(
			{
				eventType: SECURITY_SETTINGS_EVENT_TYPES.SET,
				specVersion: '1.0',
				source: 'identity:iam',
				subject: DomainEvent.subject('identity', 'securitysettings', settings.id),
				messageGroup: DomainEvent.messageGroup('identity', 'securitysettings', settings.id),
				sequence: settings.sequence,
				resourceOwner: settings.resourceOwner,
				time: settings.changeDate,
			},
			ctx,
			{
				embeddedIframeEnabled: settings.embeddedIframeEnabled,
				allowedOrigins: settings.allowedOrigins,
				impersonationEnabled: settings.impersonationEnabled,
			},
		);
	}
}
