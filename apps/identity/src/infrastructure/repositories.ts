/**
 * Write-side loaders for the aggregates of this service.
 */

import type { AggregateReader } from '@castellan/persistence';
import { type SecuritySettings, securitySettingsHandler } from '../domain/security-settings/index.js';
import { type UserGrant, userGrantHandler } from '../domain/user-grant/index.js';

export interface UserGrantRepository {
	findById(grantId: string): Promise<UserGrant | null>;
}

export interface SecuritySettingsRepository {
	findByInstance(instanceId: string): Promise<SecuritySettings | null>;
}

export function createUserGrantRepository(reader: AggregateReader): UserGrantRepository {
	return {
		findById: (grantId) => reader.find(userGrantHandler, grantId),
	};
}

export function createSecuritySettingsRepository(reader: AggregateReader): SecuritySettingsRepository {
	return {
		findByInstance: (instanceId) => reader.find(securitySettingsHandler, instanceId),
	};
}
