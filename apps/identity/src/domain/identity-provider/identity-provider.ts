/**
 * Identity Providers
 *
 * Providers and login policies are managed outside this service. They arrive
 * as events on the change feed and are only ever read here.
 */

export const IDENTITY_PROVIDER_TYPES = [
	'OIDC',
	'JWT',
	'OAUTH',
	'LDAP',
	'SAML',
	'AZURE_AD',
	'GITHUB',
	'GITHUB_ENTERPRISE',
	'GITLAB',
	'GITLAB_SELF_HOSTED',
	'GOOGLE',
	'APPLE',
] as const;

export type IdentityProviderType = (typeof IDENTITY_PROVIDER_TYPES)[number];

/**
 * Options shared by every provider type that decide how an external account
 * may become a local one.
 */
export interface ProviderOptions {
	readonly linkingAllowed: boolean;
	readonly creationAllowed: boolean;
	readonly autoCreation: boolean;
	readonly autoLinking: boolean;
}

export interface IdentityProvider extends ProviderOptions {
	readonly id: string;
	readonly name: string;
	readonly type: IdentityProviderType;
	/** Organization or instance that defined the provider */
	readonly resourceOwner: string;
}

/**
 * A provider as seen from one organization's effective login policy.
 */
export interface IdentityProviderConfig extends ProviderOptions {
	readonly id: string;
	readonly name: string;
	readonly type: IdentityProviderType;
	readonly isActive: boolean;
}

/**
 * Login policy of an organization, or the instance default when its owner is
 * the instance.
 */
export interface LoginPolicy {
	readonly owner: string;
	/** Attached providers in attachment order */
	readonly idpIds: readonly string[];
}
