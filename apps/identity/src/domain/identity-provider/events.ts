/**
 * Provider management events.
 *
 * Written by the provider management surface; this service consumes them to
 * build its provider view. The schemas are shared by the writer and the
 * projector so both sides agree on the payload.
 */

import { BaseDomainEvent, DomainEvent, type ExecutionContext } from '@castellan/domain-core';
import { z } from 'zod/v4';
import { IDENTITY_PROVIDER_TYPES, type IdentityProvider } from './identity-provider.js';

export const IDENTITY_PROVIDER_EVENT_TYPES = {
	ADDED: DomainEvent.eventType('identity', 'settings', 'idp', 'added'),
	CHANGED: DomainEvent.eventType('identity', 'settings', 'idp', 'changed'),
	REMOVED: DomainEvent.eventType('identity', 'settings', 'idp', 'removed'),
} as const;

export const LOGIN_POLICY_EVENT_TYPES = {
	ADDED: DomainEvent.eventType('identity', 'settings', 'loginpolicy', 'added'),
	REMOVED: DomainEvent.eventType('identity', 'settings', 'loginpolicy', 'removed'),
	IDP_ATTACHED: DomainEvent.eventType('identity', 'settings', 'loginpolicy', 'idp-attached'),
	IDP_DETACHED: DomainEvent.eventType('identity', 'settings', 'loginpolicy', 'idp-detached'),
} as const;

export const IdentityProviderData = z.object({
	idpId: z.string(),
	name: z.string(),
	type: z.enum(IDENTITY_PROVIDER_TYPES),
	linkingAllowed: z.boolean(),
	creationAllowed: z.boolean(),
	autoCreation: z.boolean(),
	autoLinking: z.boolean(),
});

export const IdentityProviderRemovedData = z.object({ idpId: z.string() });

export const LoginPolicyData = z.object({ owner: z.string() });

export const LoginPolicyIdpData = z.object({ owner: z.string(), idpId: z.string() });

interface ProviderEventData extends z.infer<typeof IdentityProviderData> {
	readonly [key: string]: unknown;
}

interface ProviderRemovedEventData extends z.infer<typeof IdentityProviderRemovedData> {
	readonly [key: string]: unknown;
}

interface LoginPolicyEventData extends z.infer<typeof LoginPolicyData> {
	readonly [key: string]: unknown;
}

interface LoginPolicyIdpEventData extends z.infer<typeof LoginPolicyIdpData> {
	readonly [key: string]: unknown;
}

function providerBase(eventType: string, idpId: string, resourceOwner: string, sequence: number) {
	return {
		eventType,
		specVersion: '1.0',
		source: 'identity:settings',
		subject: DomainEvent.subject('identity', 'idp', idpId),
		messageGroup: DomainEvent.messageGroup('identity', 'idp', idpId),
		sequence,
		resourceOwner,
	};
}

function policyBase(eventType: string, owner: string, sequence: number) {
	return {
		eventType,
		specVersion: '1.0',
		source: 'identity:settings',
		subject: DomainEvent.subject('identity', 'loginpolicy', owner),
		messageGroup: DomainEvent.messageGroup('identity', 'loginpolicy', owner),
		sequence,
		resourceOwner: owner,
	};
}

function providerData(provider: IdentityProvider): ProviderEventData {
	return {
		idpId: provider.id,
		name: provider.name,
		type: provider.type,
		linkingAllowed: provider.linkingAllowed,
		creationAllowed: provider.creationAllowed,
		autoCreation: provider.autoCreation,
		autoLinking: provider.autoLinking,
	};
}

export class IdentityProviderAdded extends BaseDomainEvent<ProviderEventData> {
	constructor(ctx: ExecutionContext, provider: IdentityProvider, sequence: number) {
		super(
			providerBase(IDENTITY_PROVIDER_EVENT_TYPES.ADDED, provider.id, provider.resourceOwner, sequence),
			ctx,
			providerData(provider),
		);
	}
}

export class IdentityProviderChanged extends BaseDomainEvent<ProviderEventData> {
	constructor(ctx: ExecutionContext, provider: IdentityProvider, sequence: number) {
		super(
			providerBase(IDENTITY_PROVIDER_EVENT_TYPES.CHANGED, provider.id, provider.resourceOwner, sequence),
			ctx,
			providerData(provider),
		);
	}
}

export class IdentityProviderRemoved extends BaseDomainEvent<ProviderRemovedEventData> {
	constructor(ctx: ExecutionContext, idpId: string, resourceOwner: string, sequence: number) {
		super(providerBase(IDENTITY_PROVIDER_EVENT_TYPES.REMOVED, idpId, resourceOwner, sequence), ctx, { idpId });
	}
}

export class LoginPolicyAdded extends BaseDomainEvent<LoginPolicyEventData> {
	constructor(ctx: ExecutionContext, owner: string, sequence: number) {
		super(policyBase(LOGIN_POLICY_EVENT_TYPES.ADDED, owner, sequence), ctx, { owner });
	}
}

export class LoginPolicyRemoved extends BaseDomainEvent<LoginPolicyEventData> {
	constructor(ctx: ExecutionContext, owner: string, sequence: number) {
		super(policyBase(LOGIN_POLICY_EVENT_TYPES.REMOVED, owner, sequence), ctx, { owner });
	}
}

export class LoginPolicyIdpAttached extends BaseDomainEvent<LoginPolicyIdpEventData> {
	constructor(ctx: ExecutionContext, owner: string, idpId: string, sequence: number) {
		super(policyBase(LOGIN_POLICY_EVENT_TYPES.IDP_ATTACHED, owner, sequence), ctx, { owner, idpId });
	}
}

export class LoginPolicyIdpDetached extends BaseDomainEvent<LoginPolicyIdpEventData> {
	constructor(ctx: ExecutionContext, owner: string, idpId: string, sequence: number) {
		super(policyBase(LOGIN_POLICY_EVENT_TYPES.IDP_DETACHED, owner, sequence), ctx, { owner, idpId });
	}
}
