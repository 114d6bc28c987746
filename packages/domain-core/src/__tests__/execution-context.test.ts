import { describe, it, expect } from 'vitest';
import { ExecutionContext, type Caller } from '../execution-context.js';
import { ResourceScope } from '../resource-scope.js';
import { BaseDomainEvent, DomainEvent } from '../domain-event.js';

const caller: Caller = {
	principalId: 'user-1',
	instanceId: 'instance-1',
	orgId: 'org-1',
	memberships: [{ role: 'ORG_OWNER', scope: ResourceScope.organization('org-1') }],
};

class SomethingHappened extends BaseDomainEvent<{ id: string }> {
	constructor(ctx: ExecutionContext) {
		super(
			{
				eventType: 'test:unit:thing:happened',
				specVersion: '1.0',
				source: 'test:unit',
				subject: DomainEvent.subject('test', 'thing', 't-1'),
				messageGroup: DomainEvent.messageGroup('test', 'thing', 't-1'),
				sequence: 1,
				resourceOwner: 'org-1',
			},
			ctx,
			{ id: 't-1' },
		);
	}
}

describe('ExecutionContext', () => {
	it('should create a context for the caller', () => {
		const ctx = ExecutionContext.create(caller);

		expect(ctx.executionId).toMatch(/^exec-[0-9A-HJKMNP-TV-Z]{13}$/);
		expect(ctx.correlationId).toBe(ctx.executionId);
		expect(ctx.causationId).toBeNull();
		expect(ctx.principalId).toBe('user-1');
		expect(ctx.caller).toBe(caller);
		expect(ctx.deadline).toBeNull();
	});

	it('should keep a supplied correlation id and deadline', () => {
		const deadline = new Date('2030-01-01T00:00:00Z');
		const ctx = ExecutionContext.create(caller, { correlationId: 'req-7', deadline });

		expect(ctx.correlationId).toBe('req-7');
		expect(ctx.deadline).toBe(deadline);
	});

	it('should link a context to its parent event', () => {
		const parent = new SomethingHappened(ExecutionContext.create(caller, { correlationId: 'req-1' }));
		const child = ExecutionContext.fromParentEvent(parent, caller);

		expect(child.correlationId).toBe('req-1');
		expect(child.causationId).toBe(parent.eventId);
	});

	it('should keep the earlier deadline when adding a timeout', () => {
		const now = new Date('2030-01-01T00:00:00Z');
		const early = new Date('2030-01-01T00:00:01Z');
		const ctx = ExecutionContext.create(caller, { deadline: early });

		expect(ExecutionContext.withTimeout(ctx, 5000, now).deadline).toBe(early);
		expect(ExecutionContext.withTimeout(ExecutionContext.create(caller), 500, now).deadline).toEqual(
			new Date('2030-01-01T00:00:00.500Z'),
		);
	});

	it('should report expiry relative to the deadline', () => {
		const deadline = new Date('2030-01-01T00:00:00Z');
		const ctx = ExecutionContext.create(caller, { deadline });

		expect(ExecutionContext.isExpired(ctx, new Date('2029-12-31T23:59:59Z'))).toBe(false);
		expect(ExecutionContext.isExpired(ctx, deadline)).toBe(true);
		expect(ExecutionContext.isExpired(ExecutionContext.create(caller))).toBe(false);
	});
});
