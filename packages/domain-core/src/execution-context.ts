/**
 * Execution Context
 *
 * Context for a use case execution. Carries tracing IDs, the authenticated
 * caller and an optional deadline through every command and query. There is
 * no ambient session lookup: whatever an operation needs to know about who is
 * calling is on this object.
 */

import { generateRaw } from '@castellan/tsid';
import type { ResourceScope } from './resource-scope.js';
import type { DomainEvent } from './domain-event.js';

/**
 * A role held by the caller at a given scope.
 */
export interface Membership {
	readonly role: string;
	readonly scope: ResourceScope;
}

/**
 * Authenticated caller, as supplied by the authentication layer.
 */
export interface Caller {
	readonly principalId: string;
	readonly instanceId: string;
	/** Organization the caller acts in */
	readonly orgId: string;
	readonly memberships: readonly Membership[];
}

export interface ExecutionContext {
	/** Unique ID for this execution (generated) */
	readonly executionId: string;
	/** ID for distributed tracing (usually from original request) */
	readonly correlationId: string;
	/** ID of the parent event that caused this execution (if any) */
	readonly causationId: string | null;
	/** ID of the principal performing the action */
	readonly principalId: string;
	readonly caller: Caller;
	/** Point in time after which the operation must not take effect */
	readonly deadline: Date | null;
	readonly initiatedAt: Date;
}

export interface ExecutionContextOptions {
	readonly correlationId?: string;
	readonly deadline?: Date | null;
}

function generateExecutionId(): string {
	return `exec-${generateRaw()}`;
}

/**
 * ExecutionContext factory functions.
 */
export const ExecutionContext = {
	/**
	 * Create a new execution context for a fresh request.
	 *
	 * Without a correlation ID the execution ID doubles as one.
	 */
	create(caller: Caller, options: ExecutionContextOptions = {}): ExecutionContext {
		const execId = generateExecutionId();
		return {
			executionId: execId,
			correlationId: options.correlationId ?? execId,
			causationId: null,
			principalId: caller.principalId,
			caller,
			deadline: options.deadline ?? null,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Create an execution context caused by an earlier event, keeping its
	 * correlation ID.
	 */
	fromParentEvent(parent: DomainEvent, caller: Caller, deadline: Date | null = null): ExecutionContext {
		return {
			executionId: generateExecutionId(),
			correlationId: parent.correlationId,
			causationId: parent.eventId,
			principalId: caller.principalId,
			caller,
			deadline,
			initiatedAt: new Date(),
		};
	},

	/**
	 * Copy of the context with a deadline `timeoutMs` from now, or the existing
	 * deadline if that is earlier.
	 */
	withTimeout(context: ExecutionContext, timeoutMs: number, now: Date = new Date()): ExecutionContext {
		const candidate = new Date(now.getTime() + timeoutMs);
		const deadline =
			context.deadline !== null && context.deadline.getTime() < candidate.getTime() ? context.deadline : candidate;
		return { ...context, deadline };
	},

	isExpired(context: ExecutionContext, now: Date = new Date()): boolean {
		return context.deadline !== null && now.getTime() >= context.deadline.getTime();
	},
};
