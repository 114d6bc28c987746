import { describe, it, expect } from 'vitest';
import { BaseDomainEvent, DomainEvent } from '../domain-event.js';
import { ChangeDetails } from '../change-details.js';
import { ExecutionContext } from '../execution-context.js';

interface GrantTouchedData {
	readonly grantId: string;
	readonly [key: string]: unknown;
}

class GrantTouched extends BaseDomainEvent<GrantTouchedData> {
	constructor(ctx: ExecutionContext, data: GrantTouchedData, time: Date) {
		super(
			{
				eventType: DomainEvent.eventType('identity', 'management', 'usergrant', 'touched'),
				specVersion: '1.0',
				source: 'identity:management',
				subject: DomainEvent.subject('identity', 'usergrant', data.grantId),
				messageGroup: DomainEvent.messageGroup('identity', 'usergrant', data.grantId),
				sequence: 3,
				resourceOwner: 'org-9',
				time,
			},
			ctx,
			data,
		);
	}
}

const ctx = ExecutionContext.create(
	{ principalId: 'user-5', instanceId: 'instance-2', orgId: 'org-9', memberships: [] },
	{ correlationId: 'corr-1' },
);

describe('BaseDomainEvent', () => {
	it('should fill metadata from the execution context', () => {
		const time = new Date('2031-05-05T10:00:00Z');
		const event = new GrantTouched(ctx, { grantId: 'ugr_1' }, time);

		expect(event.eventId).toMatch(/^evn_/);
		expect(event.eventType).toBe('identity:management:usergrant:touched');
		expect(event.subject).toBe('identity.usergrant.ugr_1');
		expect(event.messageGroup).toBe('identity:usergrant:ugr_1');
		expect(event.instanceId).toBe('instance-2');
		expect(event.principalId).toBe('user-5');
		expect(event.correlationId).toBe('corr-1');
		expect(event.executionId).toBe(ctx.executionId);
		expect(event.time).toBe(time);
		expect(event.toDataJson()).toBe('{"grantId":"ugr_1"}');
		expect(event.getData()).toEqual({ grantId: 'ugr_1' });
	});

	it('should build change details from the event', () => {
		const time = new Date('2031-05-05T10:00:00Z');
		const event = new GrantTouched(ctx, { grantId: 'ugr_1' }, time);

		expect(ChangeDetails.fromEvent(event)).toEqual({ sequence: 3, changeDate: time, resourceOwner: 'org-9' });
	});
});

describe('DomainEvent.parseSubject', () => {
	it('should split a subject into domain, aggregate and id', () => {
		expect(DomainEvent.parseSubject('identity.usergrant.ugr_1')).toEqual({
			domain: 'identity',
			aggregate: 'usergrant',
			id: 'ugr_1',
		});
	});

	it('should keep dots inside the id', () => {
		expect(DomainEvent.parseSubject('identity.idp.a.b')?.id).toBe('a.b');
	});

	it('should reject malformed subjects', () => {
		expect(DomainEvent.parseSubject('identity')).toBeNull();
		expect(DomainEvent.parseSubject('identity.usergrant')).toBeNull();
		expect(DomainEvent.parseSubject('identity.usergrant.')).toBeNull();
		expect(DomainEvent.parseSubject('.usergrant.x')).toBeNull();
		expect(DomainEvent.parseSubject('identity..x')).toBeNull();
	});
});
