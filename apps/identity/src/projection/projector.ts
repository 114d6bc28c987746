/**
 * Query Projector
 *
 * Applies change feed events to the read views. Events of one aggregate are
 * applied in sequence order; an event at or below the sequence already
 * applied for its aggregate is a redelivery and is skipped. Payloads are
 * validated before use; a malformed event is logged and skipped so that it
 * cannot stall the feed.
 */

import type { FeedContext, Logger } from '@castellan/logging';
import type { ChangeFeed, ChangeFeedSubscription, StoredEvent } from '@castellan/persistence';
import { z } from 'zod/v4';
import {
	IDENTITY_PROVIDER_EVENT_TYPES,
	IdentityProviderData,
	IdentityProviderRemovedData,
	LOGIN_POLICY_EVENT_TYPES,
	LoginPolicyData,
	LoginPolicyIdpData,
} from '../domain/identity-provider/index.js';
import { SECURITY_SETTINGS_EVENT_TYPES } from '../domain/security-settings/index.js';
import { USER_GRANT_EVENT_TYPES, USER_GRANT_STATES } from '../domain/user-grant/index.js';
import type { ReadViews, UserGrantView } from './views.js';

const UserGrantAddedData = z.object({
	grantId: z.string(),
	userId: z.string(),
	projectId: z.string(),
	projectGrantId: z.string().nullable(),
	roleKeys: z.array(z.string()),
	creationDate: z.coerce.date(),
});

const UserGrantChangedData = z.object({ grantId: z.string(), roleKeys: z.array(z.string()) });

const UserGrantStateData = z.object({ grantId: z.string(), state: z.enum(USER_GRANT_STATES) });

const SecuritySettingsSetData = z.object({
	embeddedIframeEnabled: z.boolean(),
	allowedOrigins: z.array(z.string()),
	impersonationEnabled: z.boolean(),
});

export interface QueryProjectorConfig {
	readonly changeFeed: ChangeFeed;
	readonly views: ReadViews;
	readonly logger: Logger;
}

export interface QueryProjector {
	start(): void;
	stop(): Promise<void>;
	isRunning(): boolean;
	/** Apply one event. Exposed for replay and tests. */
	apply(event: StoredEvent): void;
}

export function createQueryProjector(config: QueryProjectorConfig): QueryProjector {
	const { changeFeed, views } = config;
	const logger = config.logger.child({ component: 'query-projector' });
	let subscription: ChangeFeedSubscription | null = null;

	function applyUserGrant(event: StoredEvent): void {
		if (event.eventType === USER_GRANT_EVENT_TYPES.ADDED) {
			const data = UserGrantAddedData.parse(event.data);
			views.userGrants.set(data.grantId, {
				id: data.grantId,
				userId: data.userId,
				projectId: data.projectId,
				projectGrantId: data.projectGrantId,
				roleKeys: data.roleKeys,
				state: 'ACTIVE',
				resourceOwner: event.resourceOwner,
				sequence: event.sequence,
				changeDate: event.time,
				creationDate: data.creationDate,
			});
			return;
		}

		const current = views.userGrants.get(event.aggregateId);
		if (!current) {
			logger.warn({ eventType: event.eventType, grantId: event.aggregateId }, 'Change for unknown user grant');
			return;
		}

		let next: UserGrantView;
		if (event.eventType === USER_GRANT_EVENT_TYPES.CHANGED) {
			next = { ...current, roleKeys: UserGrantChangedData.parse(event.data).roleKeys };
		} else {
			next = { ...current, state: UserGrantStateData.parse(event.data).state };
		}
		views.userGrants.set(current.id, { ...next, sequence: event.sequence, changeDate: event.time });
	}

	function applySecuritySettings(event: StoredEvent): void {
		const data = SecuritySettingsSetData.parse(event.data);
		views.securitySettings.set(event.aggregateId, {
			...data,
			resourceOwner: event.resourceOwner,
			sequence: event.sequence,
			changeDate: event.time,
		});
	}

	function applyProvider(event: StoredEvent): void {
		if (event.eventType === IDENTITY_PROVIDER_EVENT_TYPES.REMOVED) {
			views.providers.delete(IdentityProviderRemovedData.parse(event.data).idpId);
			return;
		}
		const { idpId, ...provider } = IdentityProviderData.parse(event.data);
		views.providers.set(idpId, { id: idpId, ...provider, resourceOwner: event.resourceOwner });
	}

	function applyLoginPolicy(event: StoredEvent): void {
		switch (event.eventType) {
			case LOGIN_POLICY_EVENT_TYPES.ADDED: {
				const { owner } = LoginPolicyData.parse(event.data);
				views.loginPolicies.set(owner, { owner, idpIds: [] });
				return;
			}
			case LOGIN_POLICY_EVENT_TYPES.REMOVED: {
				views.loginPolicies.delete(LoginPolicyData.parse(event.data).owner);
				return;
			}
		}

		const { owner, idpId } = LoginPolicyIdpData.parse(event.data);
		const policy = views.loginPolicies.get(owner);
		if (!policy) {
			logger.warn({ eventType: event.eventType, owner }, 'Change for unknown login policy');
			return;
		}
		const others = policy.idpIds.filter((id) => id !== idpId);
		views.loginPolicies.set(owner, {
			owner,
			idpIds: event.eventType === LOGIN_POLICY_EVENT_TYPES.IDP_ATTACHED ? [...others, idpId] : others,
		});
	}

	const appliers = new Map<string, (event: StoredEvent) => void>([
		...Object.values(USER_GRANT_EVENT_TYPES).map((type): [string, (e: StoredEvent) => void] => [type, applyUserGrant]),
		[SECURITY_SETTINGS_EVENT_TYPES.SET, applySecuritySettings],
		...Object.values(IDENTITY_PROVIDER_EVENT_TYPES).map((type): [string, (e: StoredEvent) => void] => [
			type,
			applyProvider,
		]),
		...Object.values(LOGIN_POLICY_EVENT_TYPES).map((type): [string, (e: StoredEvent) => void] => [
			type,
			applyLoginPolicy,
		]),
	]);

	function apply(event: StoredEvent): void {
		const applier = appliers.get(event.eventType);
		const bindings: FeedContext = {
			position: event.position,
			eventType: event.eventType,
			aggregateId: event.aggregateId,
			sequence: event.sequence,
		};

		if (applier && event.sequence > views.sequenceOf(event.aggregateType, event.aggregateId)) {
			try {
				applier(event);
				views.recordSequence(event.aggregateType, event.aggregateId, event.sequence);
			} catch (error) {
				if (!(error instanceof z.ZodError)) {
					throw error;
				}
				logger.warn({ ...bindings, issues: error.issues.length }, 'Skipping malformed event');
			}
		} else if (applier) {
			logger.debug(bindings, 'Skipping already applied event');
		}

		views.markProcessed(event.position, event.time);
	}

	return {
		start() {
			if (subscription) {
				logger.warn('Query projector already running');
				return;
			}
			subscription = changeFeed.subscribe(async (event) => apply(event), {
				fromPosition: views.latestPosition,
				name: 'query-projector',
			});
			logger.info({ fromPosition: views.latestPosition }, 'Query projector started');
		},

		async stop() {
			if (!subscription) return;
			const current = subscription;
			subscription = null;
			await current.close();
			logger.info({ position: views.latestPosition }, 'Query projector stopped');
		},

		isRunning: () => subscription !== null,

		apply,
	};
}
