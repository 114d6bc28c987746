import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
	ProviderSeedSchema,
	ResourceDirectorySchema,
	createInMemoryResourceDirectory,
	loadResourceDirectory,
	seedProviders,
} from '../infrastructure/index.js';
import { callers, contextOf, createHarness, type Harness } from './fixtures.js';

const configFile = (name: string) => fileURLToPath(new URL(`../../config/${name}`, import.meta.url));

describe('resource directory', () => {
	it('should load the bundled directory file', async () => {
		const directory = await loadResourceDirectory(configFile('resources.json'));

		expect(await directory.findUser('usr-acme-dev')).toEqual({ id: 'usr-acme-dev', orgId: 'org-acme' });
		expect((await directory.findProject('prj-portal'))?.roleKeys).toEqual(['viewer', 'editor', 'admin']);
		expect((await directory.findProjectGrant('pgr-portal-partner'))?.grantedOrgId).toBe('org-partner');
		expect(await directory.findUser('usr-nobody')).toBeNull();
	});

	it('should default missing sections and project grant states', async () => {
		const parsed = ResourceDirectorySchema.parse({
			projectGrants: [{ id: 'pg-1', projectId: 'prj-1', grantedOrgId: 'org-a', roleKeys: [] }],
		});

		expect(parsed.users).toEqual([]);
		expect(parsed.projects).toEqual([]);
		expect(parsed.projectGrants[0]?.state).toBe('ACTIVE');
	});

	it('should accept entries added at run time', async () => {
		const directory = createInMemoryResourceDirectory();
		directory.putUser({ id: 'usr-9', orgId: 'org-z' });

		expect(await directory.findUser('usr-9')).toEqual({ id: 'usr-9', orgId: 'org-z' });
	});
});

describe('seedProviders', () => {
	let h: Harness;

	afterEach(async () => {
		await h.close();
	});

	it('should publish providers before policies and attachments', async () => {
		h = createHarness();
		const seed = ProviderSeedSchema.parse(JSON.parse(await readFile(configFile('providers.json'), 'utf8')));

		await seedProviders(h.providers, contextOf(callers.instanceOwner), seed);
		await h.settle();

		expect(h.driver.changeFeed.events().map((e) => e.eventType)).toEqual([
			'identity:settings:idp:added',
			'identity:settings:idp:added',
			'identity:settings:loginpolicy:added',
			'identity:settings:loginpolicy:idp-attached',
			'identity:settings:loginpolicy:idp-attached',
		]);
		expect(Array.from(h.core.views.providers.keys())).toEqual(['idp-corporate-oidc', 'idp-github']);
		expect(h.core.views.loginPolicies.get('default')).toEqual({
			owner: 'default',
			idpIds: ['idp-corporate-oidc', 'idp-github'],
		});
	});
});

describe('ProviderSeedSchema', () => {
	it('should default provider options to false', () => {
		const seed = ProviderSeedSchema.parse({
			providers: [{ id: 'idp-1', name: 'One', type: 'SAML', resourceOwner: 'default' }],
		});

		expect(seed.providers[0]).toEqual({
			id: 'idp-1',
			name: 'One',
			type: 'SAML',
			resourceOwner: 'default',
			linkingAllowed: false,
			creationAllowed: false,
			autoCreation: false,
			autoLinking: false,
		});
		expect(seed.loginPolicies).toEqual([]);
	});
});
