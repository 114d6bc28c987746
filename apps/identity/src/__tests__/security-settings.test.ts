import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Result } from '@castellan/domain-core';
import { INSTANCE, callers, contextOf, createHarness, failureOf, type Harness } from './fixtures.js';

describe('security settings', () => {
	let h: Harness;
	const ctx = contextOf(callers.instanceOwner);

	beforeEach(() => {
		h = createHarness();
	});

	afterEach(async () => {
		await h.close();
	});

	it('should report defaults before the first write', async () => {
		const settings = Result.unwrap(await h.core.getSecuritySettings(ctx));

		expect(settings).toEqual({
			embeddedIframeEnabled: false,
			allowedOrigins: [],
			impersonationEnabled: false,
			resourceOwner: INSTANCE,
			sequence: 0,
			changeDate: null,
		});
	});

	it('should store origins once each in the order given', async () => {
		const details = Result.unwrap(
			await h.core.setSecuritySettings(ctx, {
				embeddedIframeEnabled: true,
				allowedOrigins: ['https://a.example', 'https://b.example', 'https://a.example'],
			}),
		);
		expect(details.sequence).toBe(1);
		expect(details.resourceOwner).toBe(INSTANCE);

		const settings = Result.unwrap(await h.core.getSecuritySettings(ctx, { minSequence: 1 }));
		expect(settings.embeddedIframeEnabled).toBe(true);
		expect(settings.allowedOrigins).toEqual(['https://a.example', 'https://b.example']);
		expect(settings.impersonationEnabled).toBe(false);
		expect(settings.changeDate).toEqual(details.changeDate);
	});

	it('should keep fields that a partial update leaves out', async () => {
		Result.unwrap(
			await h.core.setSecuritySettings(ctx, { embeddedIframeEnabled: true, allowedOrigins: ['https://a.example'] }),
		);

		const details = Result.unwrap(await h.core.setSecuritySettings(ctx, { impersonationEnabled: true }));
		expect(details.sequence).toBe(2);

		const settings = Result.unwrap(await h.core.getSecuritySettings(ctx, { minSequence: 2 }));
		expect(settings.embeddedIframeEnabled).toBe(true);
		expect(settings.allowedOrigins).toEqual(['https://a.example']);
		expect(settings.impersonationEnabled).toBe(true);
	});

	it('should clear origins when given an empty list', async () => {
		Result.unwrap(await h.core.setSecuritySettings(ctx, { allowedOrigins: ['https://a.example'] }));

		Result.unwrap(await h.core.setSecuritySettings(ctx, { allowedOrigins: [] }));

		const settings = Result.unwrap(await h.core.getSecuritySettings(ctx, { minSequence: 2 }));
		expect(settings.allowedOrigins).toEqual([]);
	});

	it('should answer an empty request with the current version', async () => {
		const details = Result.unwrap(await h.core.setSecuritySettings(ctx, {}));

		expect(details).toEqual({ sequence: 0, changeDate: new Date(0), resourceOwner: INSTANCE });
		expect(h.driver.changeFeed.events()).toHaveLength(0);
	});

	it('should commit nothing for a write that changes nothing', async () => {
		const first = Result.unwrap(await h.core.setSecuritySettings(ctx, { impersonationEnabled: true }));
		const second = Result.unwrap(await h.core.setSecuritySettings(ctx, { impersonationEnabled: true }));
		expect(first.sequence).toBe(1);
		expect(second).toEqual(first);

		Result.unwrap(await h.core.setSecuritySettings(ctx, { allowedOrigins: ['https://a.example', 'https://b.example'] }));
		const same = await h.core.setSecuritySettings(ctx, { allowedOrigins: ['https://a.example', 'https://b.example'] });
		expect(Result.unwrap(same).sequence).toBe(2);
		expect(h.driver.changeFeed.events()).toHaveLength(2);
		expect(h.driver.auditLogs()).toHaveLength(2);

		const reordered = await h.core.setSecuritySettings(ctx, {
			allowedOrigins: ['https://b.example', 'https://a.example'],
		});
		expect(Result.unwrap(reordered).sequence).toBe(3);
	});

	it('should keep organization owners out', async () => {
		const orgOwner = contextOf(callers.ownerA);

		expect(failureOf(await h.core.getSecuritySettings(orgOwner))).toMatchObject({ code: 'PERMISSION_DENIED' });
		expect(failureOf(await h.core.setSecuritySettings(orgOwner, { impersonationEnabled: true }))).toMatchObject({
			code: 'PERMISSION_DENIED',
		});
		expect(h.driver.changeFeed.events()).toHaveLength(0);
	});

	it('should let an instance viewer read but not write', async () => {
		const viewer = contextOf(callers.instanceViewer);

		expect(Result.unwrap(await h.core.getSecuritySettings(viewer)).sequence).toBe(0);
		expect(failureOf(await h.core.setSecuritySettings(viewer, { impersonationEnabled: true }))).toMatchObject({
			type: 'permission_denied',
		});
	});
});
