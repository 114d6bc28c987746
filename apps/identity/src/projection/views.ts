/**
 * Read Views
 *
 * In-memory state maintained by the projector and read by the queries.
 * Nothing else writes here.
 */

import type { IdentityProviderType, LoginPolicy, ProviderOptions } from '../domain/identity-provider/index.js';
import type { UserGrantState } from '../domain/user-grant/index.js';

export interface UserGrantView {
	readonly id: string;
	readonly userId: string;
	readonly projectId: string;
	readonly projectGrantId: string | null;
	readonly roleKeys: readonly string[];
	readonly state: UserGrantState;
	readonly resourceOwner: string;
	readonly sequence: number;
	readonly changeDate: Date;
	readonly creationDate: Date;
}

export interface SecuritySettingsView {
	readonly embeddedIframeEnabled: boolean;
	readonly allowedOrigins: readonly string[];
	readonly impersonationEnabled: boolean;
	readonly resourceOwner: string;
	/** 0 until the settings are first written */
	readonly sequence: number;
	readonly changeDate: Date | null;
}

export interface ProviderView extends ProviderOptions {
	readonly id: string;
	readonly name: string;
	readonly type: IdentityProviderType;
	readonly resourceOwner: string;
}

export class ReadViews {
	/** Removed grants stay here so that late redeliveries cannot revive them */
	readonly userGrants = new Map<string, UserGrantView>();
	/** Keyed by instance id */
	readonly securitySettings = new Map<string, SecuritySettingsView>();
	/** Iteration order is creation order */
	readonly providers = new Map<string, ProviderView>();
	/** Keyed by owner (organization or instance id) */
	readonly loginPolicies = new Map<string, LoginPolicy>();

	private readonly sequences = new Map<string, number>();
	private processedPosition = 0;
	private processedTime: Date | null = null;

	/**
	 * Sequence of the last applied event of an aggregate, 0 if none.
	 */
	sequenceOf(aggregateType: string, aggregateId: string): number {
		return this.sequences.get(`${aggregateType}:${aggregateId}`) ?? 0;
	}

	recordSequence(aggregateType: string, aggregateId: string, sequence: number): void {
		this.sequences.set(`${aggregateType}:${aggregateId}`, sequence);
	}

	markProcessed(position: number, time: Date): void {
		this.processedPosition = position;
		this.processedTime = time;
	}

	/** Feed position of the newest processed event */
	get latestPosition(): number {
		return this.processedPosition;
	}

	get latestTimestamp(): Date | null {
		return this.processedTime;
	}
}
