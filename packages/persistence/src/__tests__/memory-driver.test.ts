import { describe, it, expect, beforeEach } from 'vitest';
import { createSilentLogger } from '@castellan/logging';
import { createAggregateRegistry } from '../aggregate-registry.js';
import { type InMemoryDriver, createInMemoryDriver } from '../memory/driver.js';
import { WidgetSaved, ctx, widget, widgetHandler } from './fixtures.js';

function setup(beforeCommit?: () => void): InMemoryDriver {
	const registry = createAggregateRegistry();
	registry.register(widgetHandler);
	return createInMemoryDriver({ registry, logger: createSilentLogger(), retryDelayMs: 1, beforeCommit });
}

describe('InMemoryDriver', () => {
	let driver: InMemoryDriver;

	beforeEach(() => {
		driver = setup();
	});

	it('should store the aggregate, event and audit record', async () => {
		const w = widget('w1', 1, 'alpha');
		const event = new WidgetSaved(ctx, w);

		const result = await driver.unitOfWork.commit(w, event, { _type: 'SaveWidget', name: 'alpha' });

		expect(result._tag).toBe('success');
		expect(await driver.aggregates.find(widgetHandler, 'w1')).toEqual(w);

		const [stored] = driver.changeFeed.events();
		expect(stored?.position).toBe(1);
		expect(stored?.aggregateType).toBe('widget');
		expect(stored?.aggregateId).toBe('w1');
		expect(stored?.data).toEqual({ widgetId: 'w1', name: 'alpha' });

		const [audit] = driver.auditLogs();
		expect(audit?.operation).toBe('SaveWidget');
		expect(audit?.entityType).toBe('widget');
		expect(audit?.entityId).toBe('w1');
		expect(audit?.principalId).toBe('user-1');
		expect(audit?.executionId).toBe(ctx.executionId);
	});

	it('should return null for an aggregate that was never committed', async () => {
		expect(await driver.aggregates.find(widgetHandler, 'missing')).toBeNull();
	});

	it('should reject a commit whose sequence does not follow the stored one', async () => {
		const first = widget('w1', 1, 'alpha');
		await driver.unitOfWork.commit(first, new WidgetSaved(ctx, first), {});

		const stale = widget('w1', 1, 'beta');
		const result = await driver.unitOfWork.commit(stale, new WidgetSaved(ctx, stale), {});

		expect(result._tag).toBe('failure');
		if (result._tag === 'failure') {
			expect(result.error.type).toBe('conflict');
			expect(result.error.code).toBe('SEQUENCE_CONFLICT');
			expect(result.error.details).toEqual({ aggregateId: 'w1', expectedSequence: 0, actualSequence: 1 });
		}
		expect((await driver.aggregates.find(widgetHandler, 'w1'))?.name).toBe('alpha');
		expect(driver.changeFeed.events()).toHaveLength(1);
	});

	it('should refuse a unique key held by another aggregate until it is released', async () => {
		const a = widget('a', 1, 'shared');
		await driver.unitOfWork.commit(a, new WidgetSaved(ctx, a), {});

		const b = widget('b', 1, 'shared');
		const taken = await driver.unitOfWork.commit(b, new WidgetSaved(ctx, b), {});
		expect(taken._tag).toBe('failure');
		if (taken._tag === 'failure') {
			expect(taken.error.type).toBe('failed_precondition');
			expect(taken.error.code).toBe('WIDGET_NAME_TAKEN');
		}

		const renamed = widget('a', 2, 'other');
		await driver.unitOfWork.commit(renamed, new WidgetSaved(ctx, renamed), {});

		const retry = await driver.unitOfWork.commit(b, new WidgetSaved(ctx, b), {});
		expect(retry._tag).toBe('success');
	});

	it('should let an aggregate keep its own unique key across commits', async () => {
		const v1 = widget('a', 1, 'same');
		const v2 = widget('a', 2, 'same');
		await driver.unitOfWork.commit(v1, new WidgetSaved(ctx, v1), {});

		const result = await driver.unitOfWork.commit(v2, new WidgetSaved(ctx, v2), {});

		expect(result._tag).toBe('success');
	});

	it('should not commit after the deadline', async () => {
		const w = widget('w1', 1, 'alpha');
		const result = await driver.unitOfWork.commit(w, new WidgetSaved(ctx, w), {}, { deadline: new Date(0) });

		expect(result._tag).toBe('failure');
		if (result._tag === 'failure') {
			expect(result.error.type).toBe('deadline_exceeded');
		}
		expect(await driver.aggregates.find(widgetHandler, 'w1')).toBeNull();
		expect(driver.auditLogs()).toHaveLength(0);
	});

	it('should report a storage failure as internal and apply nothing', async () => {
		driver = setup(() => {
			throw new Error('disk full');
		});
		const w = widget('w1', 1, 'alpha');

		const result = await driver.unitOfWork.commit(w, new WidgetSaved(ctx, w), {});

		expect(result._tag).toBe('failure');
		if (result._tag === 'failure') {
			expect(result.error.type).toBe('internal');
			expect(result.error.code).toBe('COMMIT_FAILED');
			expect(result.error.message).toBe('disk full');
		}
		expect(await driver.aggregates.find(widgetHandler, 'w1')).toBeNull();
		expect(driver.changeFeed.events()).toHaveLength(0);
	});

	it('should fail for an aggregate type without a handler', async () => {
		const w = widget('g1', 1, 'alpha');
		const result = await driver.unitOfWork.commit(w, new WidgetSaved(ctx, w, 'inventory', 'gadget'), {});

		expect(result._tag).toBe('failure');
		if (result._tag === 'failure') {
			expect(result.error.code).toBe('UNKNOWN_AGGREGATE_TYPE');
		}
	});
});
