import type { IdentityProviderConfig, ProviderOptions } from './identity-provider.js';

/**
 * Option predicates. Only a predicate set to `true` restricts the result.
 */
export type ProviderPredicates = Partial<ProviderOptions>;

const PREDICATE_KEYS = ['linkingAllowed', 'creationAllowed', 'autoCreation', 'autoLinking'] as const;

/**
 * Active providers matching every predicate set to true, in input order.
 */
export function filterActiveProviders(
	configs: readonly IdentityProviderConfig[],
	predicates: ProviderPredicates = {},
): IdentityProviderConfig[] {
	const required = PREDICATE_KEYS.filter((key) => predicates[key] === true);
	return configs.filter((config) => config.isActive && required.every((key) => config[key]));
}
