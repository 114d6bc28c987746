/**
 * Provider Event Publisher
 *
 * Writes provider and login policy events to the event store so that they
 * reach the provider view. Used for seeding embedded deployments and by
 * tests; in a full deployment these events come from provider management.
 *
 * Sequences are tracked per subject by this publisher, which makes it the
 * single writer of those subjects for its lifetime.
 */

import type { DomainEvent, ExecutionContext } from '@castellan/domain-core';
import type { Logger } from '@castellan/logging';
import { type EventWriter, type StoredEvent, toPendingEvent } from '@castellan/persistence';
import { z } from 'zod/v4';
import {
	IDENTITY_PROVIDER_TYPES,
	type IdentityProvider,
	IdentityProviderAdded,
	IdentityProviderChanged,
	IdentityProviderRemoved,
	LoginPolicyAdded,
	LoginPolicyIdpAttached,
	LoginPolicyIdpDetached,
	LoginPolicyRemoved,
} from '../domain/identity-provider/index.js';

export interface ProviderEventPublisher {
	addProvider(ctx: ExecutionContext, provider: IdentityProvider): Promise<StoredEvent>;
	changeProvider(ctx: ExecutionContext, provider: IdentityProvider): Promise<StoredEvent>;
	removeProvider(ctx: ExecutionContext, idpId: string, resourceOwner: string): Promise<StoredEvent>;
	addLoginPolicy(ctx: ExecutionContext, owner: string): Promise<StoredEvent>;
	removeLoginPolicy(ctx: ExecutionContext, owner: string): Promise<StoredEvent>;
	attachProvider(ctx: ExecutionContext, owner: string, idpId: string): Promise<StoredEvent>;
	detachProvider(ctx: ExecutionContext, owner: string, idpId: string): Promise<StoredEvent>;
}

export function createProviderEventPublisher(writer: EventWriter, logger: Logger): ProviderEventPublisher {
	const log = logger.child({ component: 'provider-events' });
	const sequences = new Map<string, number>();

	const next = (subject: string): number => {
		const sequence = (sequences.get(subject) ?? 0) + 1;
		sequences.set(subject, sequence);
		return sequence;
	};

	const providerSubject = (idpId: string) => `idp:${idpId}`;
	const policySubject = (owner: string) => `loginpolicy:${owner}`;

	async function publish(event: DomainEvent): Promise<StoredEvent> {
		const pending = toPendingEvent(event);
		if (!pending) {
			throw new Error(`Invalid event subject '${event.subject}'`);
		}
		const stored = await writer.append(pending);
		log.debug({ eventType: stored.eventType, subject: stored.subject, position: stored.position }, 'Published');
		return stored;
	}

	return {
		addProvider: (ctx, provider) =>
			publish(new IdentityProviderAdded(ctx, provider, next(providerSubject(provider.id)))),
		changeProvider: (ctx, provider) =>
			publish(new IdentityProviderChanged(ctx, provider, next(providerSubject(provider.id)))),
		removeProvider: (ctx, idpId, resourceOwner) =>
			publish(new IdentityProviderRemoved(ctx, idpId, resourceOwner, next(providerSubject(idpId)))),
		addLoginPolicy: (ctx, owner) => publish(new LoginPolicyAdded(ctx, owner, next(policySubject(owner)))),
		removeLoginPolicy: (ctx, owner) => publish(new LoginPolicyRemoved(ctx, owner, next(policySubject(owner)))),
		attachProvider: (ctx, owner, idpId) =>
			publish(new LoginPolicyIdpAttached(ctx, owner, idpId, next(policySubject(owner)))),
		detachProvider: (ctx, owner, idpId) =>
			publish(new LoginPolicyIdpDetached(ctx, owner, idpId, next(policySubject(owner)))),
	};
}

/**
 * Providers and login policies to publish at startup.
 */
export const ProviderSeedSchema = z.object({
	providers: z
		.array(
			z.object({
				id: z.string(),
				name: z.string(),
				type: z.enum(IDENTITY_PROVIDER_TYPES),
				resourceOwner: z.string(),
				linkingAllowed: z.boolean().default(false),
				creationAllowed: z.boolean().default(false),
				autoCreation: z.boolean().default(false),
				autoLinking: z.boolean().default(false),
			}),
		)
		.default([]),
	loginPolicies: z.array(z.object({ owner: z.string(), idpIds: z.array(z.string()).default([]) })).default([]),
});

export type ProviderSeed = z.infer<typeof ProviderSeedSchema>;

/**
 * Publish every provider, then every policy with its attachments in order.
 */
export async function seedProviders(
	publisher: ProviderEventPublisher,
	ctx: ExecutionContext,
	seed: ProviderSeed,
): Promise<void> {
	for (const provider of seed.providers) {
		await publisher.addProvider(ctx, provider);
	}
	for (const policy of seed.loginPolicies) {
		await publisher.addLoginPolicy(ctx, policy.owner);
		for (const idpId of policy.idpIds) {
			await publisher.attachProvider(ctx, policy.owner, idpId);
		}
	}
}
