/**
 * Change Details
 *
 * Descriptor returned by every successful command: the aggregate's new
 * version, when it changed and who owns it.
 */

import type { DomainEvent } from './domain-event.js';
import type { Aggregate } from './unit-of-work.js';

export interface ChangeDetails {
	readonly sequence: number;
	readonly changeDate: Date;
	readonly resourceOwner: string;
}

export const ChangeDetails = {
	fromEvent(event: DomainEvent): ChangeDetails {
		return {
			sequence: event.sequence,
			changeDate: event.time,
			resourceOwner: event.resourceOwner,
		};
	},

	/** Current version of an aggregate that was left as it is */
	fromAggregate(aggregate: Aggregate): ChangeDetails {
		return {
			sequence: aggregate.sequence,
			changeDate: aggregate.changeDate,
			resourceOwner: aggregate.resourceOwner,
		};
	},
};
