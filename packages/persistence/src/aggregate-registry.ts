/**
 * Aggregate Registry
 *
 * Maps aggregate type names (the aggregate segment of an event subject) to
 * the handler that knows how to rebuild the aggregate from its stored
 * snapshot and which unique constraints it claims.
 */

import type { Aggregate } from '@castellan/domain-core';

/**
 * A value that may be held by at most one aggregate at a time, e.g. "one
 * non-removed grant per user and project". Claiming a key another aggregate
 * holds fails the commit with a failed precondition.
 */
export interface UniqueConstraint {
	readonly key: string;
	readonly errorCode: string;
	readonly errorMessage: string;
}

export interface AggregateHandler<T extends Aggregate> {
	/** Aggregate type name, e.g. "usergrant" */
	readonly typeName: string;

	/**
	 * Rebuild the aggregate from its JSON snapshot.
	 *
	 * @throws if the snapshot does not describe a valid aggregate
	 */
	fromSnapshot(snapshot: unknown): T;

	/**
	 * Keys this aggregate holds in its current state. Keys held before the
	 * commit and not returned again are released.
	 */
	uniqueConstraints?(aggregate: T): readonly UniqueConstraint[];
}

export interface AggregateRegistry {
	register<T extends Aggregate>(handler: AggregateHandler<T>): void;

	/**
	 * @returns the handler, or null when the type is not registered
	 */
	get(typeName: string): AggregateHandler<Aggregate> | null;

	typeNames(): string[];
}

export function createAggregateRegistry(): AggregateRegistry {
	const handlers = new Map<string, AggregateHandler<Aggregate>>();

	return {
		register<T extends Aggregate>(handler: AggregateHandler<T>): void {
			if (handlers.has(handler.typeName)) {
				throw new Error(`Aggregate handler already registered: ${handler.typeName}`);
			}
			handlers.set(handler.typeName, handler);
		},

		get(typeName: string): AggregateHandler<Aggregate> | null {
			return handlers.get(typeName) ?? null;
		},

		typeNames(): string[] {
			return Array.from(handlers.keys());
		},
	};
}

/**
 * JSON snapshot of an aggregate. Dates become ISO strings.
 */
export function toSnapshot(aggregate: Aggregate): unknown {
	return JSON.parse(JSON.stringify(aggregate));
}
