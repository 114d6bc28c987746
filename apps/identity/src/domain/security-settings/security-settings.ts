/**
 * Security Settings Aggregate
 *
 * One per instance, keyed and owned by the instance id. Created by the first
 * write.
 */

import type { Aggregate } from '@castellan/domain-core';

export interface SecuritySettings extends Aggregate {
	/** Instance id */
	readonly id: string;
	readonly embeddedIframeEnabled: boolean;
	/** Unique, in the order the caller supplied them */
	readonly allowedOrigins: readonly string[];
	readonly impersonationEnabled: boolean;
	readonly resourceOwner: string;
	readonly sequence: number;
	readonly changeDate: Date;
}

/**
 * Fields to change. An absent field keeps its value; a supplied one, an
 * empty origin list included, replaces it.
 */
export interface SecuritySettingsChange {
	readonly embeddedIframeEnabled?: boolean;
	readonly allowedOrigins?: readonly string[];
	readonly impersonationEnabled?: boolean;
}

export const SecuritySettings = {
	/**
	 * State before the first write.
	 */
	empty(instanceId: string): SecuritySettings {
		return {
			id: instanceId,
			embeddedIframeEnabled: false,
			allowedOrigins: [],
			impersonationEnabled: false,
			resourceOwner: instanceId,
			sequence: 0,
			changeDate: new Date(0),
		};
	},

	isEmptyChange(change: SecuritySettingsChange): boolean {
		return (
			change.embeddedIframeEnabled === undefined &&
			change.allowedOrigins === undefined &&
			change.impersonationEnabled === undefined
		);
	},

	/**
	 * Settings with the change applied, or null when nothing would differ.
	 */
	apply(current: SecuritySettings, change: SecuritySettingsChange, now: Date = new Date()): SecuritySettings | null {
		const next: SecuritySettings = {
			...current,
			embeddedIframeEnabled: change.embeddedIframeEnabled ?? current.embeddedIframeEnabled,
			allowedOrigins: change.allowedOrigins ? [...change.allowedOrigins] : current.allowedOrigins,
			impersonationEnabled: change.impersonationEnabled ?? current.impersonationEnabled,
		};

		if (
			next.embeddedIframeEnabled === current.embeddedIframeEnabled &&
			next.impersonationEnabled === current.impersonationEnabled &&
			sameOrigins(next.allowedOrigins, current.allowedOrigins)
		) {
			return null;
		}

		return { ...next, sequence: current.sequence + 1, changeDate: now };
	},
};

function sameOrigins(a: readonly string[], b: readonly string[]): boolean {
	return a.length === b.length && a.every((origin, i) => origin === b[i]);
}
