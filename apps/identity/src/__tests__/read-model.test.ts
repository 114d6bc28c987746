import { describe, it, expect, beforeEach } from 'vitest';
import type { IdentityProviderType } from '../domain/identity-provider/index.js';
import type { UserGrantState } from '../domain/user-grant/index.js';
import { ReadViews, createIdentityReadModel, type IdentityReadModel } from '../projection/index.js';

const T0 = Date.UTC(2026, 0, 1);

describe('IdentityReadModel', () => {
	let views: ReadViews;
	let model: IdentityReadModel;

	function putGrant(id: string, minute: number, state: UserGrantState = 'ACTIVE', resourceOwner = 'org-a') {
		const date = new Date(T0 + minute * 60_000);
		views.userGrants.set(id, {
			id,
			userId: `usr-${id}`,
			projectId: 'prj-1',
			projectGrantId: null,
			roleKeys: ['viewer'],
			state,
			resourceOwner,
			sequence: 1,
			changeDate: date,
			creationDate: date,
		});
	}

	function putProvider(id: string, resourceOwner: string, type: IdentityProviderType = 'OIDC') {
		views.providers.set(id, {
			id,
			name: id,
			type,
			resourceOwner,
			linkingAllowed: true,
			creationAllowed: false,
			autoCreation: false,
			autoLinking: false,
		});
	}

	beforeEach(() => {
		views = new ReadViews();
		model = createIdentityReadModel(views);
	});

	describe('listUserGrants', () => {
		beforeEach(() => {
			putGrant('ugr-a', 1);
			putGrant('ugr-b', 2);
			putGrant('ugr-c', 3, 'INACTIVE');
			putGrant('ugr-d', 4, 'REMOVED');
			putGrant('ugr-e', 5, 'ACTIVE', 'org-b');
			views.markProcessed(9, new Date(T0));
		});

		it('should list newest first by default', () => {
			const list = model.listUserGrants('org-a', {});

			expect(list.grants.map((g) => g.id)).toEqual(['ugr-c', 'ugr-b', 'ugr-a']);
			expect(list.totalCount).toBe(3);
			expect(list.latestSequence).toBe(9);
			expect(list.latestTimestamp).toEqual(new Date(T0));
		});

		it('should page in ascending order', () => {
			const list = model.listUserGrants('org-a', { asc: true, offset: 1, limit: 1 });

			expect(list.grants.map((g) => g.id)).toEqual(['ugr-b']);
			expect(list.totalCount).toBe(3);
		});

		it('should filter by state', () => {
			expect(model.listUserGrants('org-a', { state: 'INACTIVE' }).grants.map((g) => g.id)).toEqual(['ugr-c']);
			expect(model.listUserGrants('org-b', {}).grants.map((g) => g.id)).toEqual(['ugr-e']);
		});

		it('should break creation date ties by id', () => {
			putGrant('ugr-a0', 1);

			expect(model.listUserGrants('org-a', { asc: true, limit: 2 }).grants.map((g) => g.id)).toEqual([
				'ugr-a',
				'ugr-a0',
			]);
		});
	});

	describe('getUserGrant', () => {
		it('should hide removed and foreign grants', () => {
			putGrant('ugr-a', 1);
			putGrant('ugr-d', 2, 'REMOVED');

			expect(model.getUserGrant('org-a', 'ugr-a')?.id).toBe('ugr-a');
			expect(model.getUserGrant('org-b', 'ugr-a')).toBeNull();
			expect(model.getUserGrant('org-a', 'ugr-d')).toBeNull();
			expect(model.getUserGrant('org-a', 'ugr-x')).toBeNull();
		});
	});

	describe('getActiveIdentityProviders', () => {
		beforeEach(() => {
			putProvider('idp-inst', 'inst-1');
			putProvider('idp-a', 'org-a', 'GITHUB');
			putProvider('idp-b', 'org-b');
			views.loginPolicies.set('inst-1', { owner: 'inst-1', idpIds: ['idp-inst', 'idp-a', 'idp-b'] });
		});

		it('should only consider providers of the instance and the organization', () => {
			const active = model.getActiveIdentityProviders('inst-1', 'org-a', {});

			expect(active.providers.map((p) => p.id)).toEqual(['idp-inst', 'idp-a']);
			expect(active.providers[1]?.type).toBe('GITHUB');
			expect(active.timestamp).toBeNull();
		});

		it('should return nothing without any policy', () => {
			views.loginPolicies.clear();

			expect(model.getActiveIdentityProviders('inst-1', 'org-a', {})).toEqual({
				providers: [],
				totalCount: 0,
				timestamp: null,
			});
		});
	});

	it('should default the security settings of an unwritten instance', () => {
		expect(model.getSecuritySettings('inst-1')).toEqual({
			embeddedIframeEnabled: false,
			allowedOrigins: [],
			impersonationEnabled: false,
			resourceOwner: 'inst-1',
			sequence: 0,
			changeDate: null,
		});
	});
});
