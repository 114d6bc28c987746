import { type AggregateRegistry, createAggregateRegistry } from '@castellan/persistence';
import { securitySettingsHandler } from '../domain/security-settings/index.js';
import { userGrantHandler } from '../domain/user-grant/index.js';

/**
 * Registry of every aggregate this service commits.
 */
export function createIdentityAggregateRegistry(): AggregateRegistry {
	const registry = createAggregateRegistry();
	registry.register(userGrantHandler);
	registry.register(securitySettingsHandler);
	return registry;
}
