/**
 * Identity Service
 *
 * Starts the identity core over the configured persistence driver and serves
 * it over HTTP.
 */

import { readFile } from 'node:fs/promises';
import { ExecutionContext } from '@castellan/domain-core';
import { createLogger } from '@castellan/logging';
import { createInMemoryDriver, createPostgresDriver, type PersistenceDriver } from '@castellan/persistence';

import { createApiServer, loadTokenAuthenticator } from './api/index.js';
import { createIdentityCore } from './core.js';
import { getEnv } from './env.js';
import {
	createIdentityAggregateRegistry,
	createProviderEventPublisher,
	loadResourceDirectory,
	ProviderSeedSchema,
	seedProviders,
} from './infrastructure/index.js';

const env = getEnv();

const logger = createLogger({
	level: env.LOG_LEVEL,
	serviceName: 'identity',
	pretty: env.LOG_PRETTY,
	base: { instanceId: env.INSTANCE_ID },
});

logger.info({ env: env.NODE_ENV, driver: env.PERSISTENCE_DRIVER }, 'Starting identity service');

const registry = createIdentityAggregateRegistry();

let driver: PersistenceDriver;
if (env.PERSISTENCE_DRIVER === 'postgres' && env.DATABASE_URL) {
	driver = await createPostgresDriver({
		url: env.DATABASE_URL,
		registry,
		logger,
		maxConnections: env.DATABASE_MAX_CONNECTIONS,
		changeFeed: { idleIntervalMs: env.CHANGE_FEED_POLL_INTERVAL_MS },
	});
} else {
	driver = createInMemoryDriver({ registry, logger });

	// in-memory state starts empty: publish the configured providers
	const seed = ProviderSeedSchema.parse(JSON.parse(await readFile(env.PROVIDERS_FILE, 'utf8')));
	const system = ExecutionContext.create({
		principalId: 'system',
		instanceId: env.INSTANCE_ID,
		orgId: env.INSTANCE_ID,
		memberships: [],
	});
	await seedProviders(createProviderEventPublisher(driver.events, logger), system, seed);
	logger.info({ providers: seed.providers.length, loginPolicies: seed.loginPolicies.length }, 'Providers seeded');
}

const resources = await loadResourceDirectory(env.RESOURCES_FILE);
const core = createIdentityCore({
	driver,
	resources,
	logger,
	consistencyTimeoutMs: env.CONSISTENCY_TIMEOUT_MS,
});

const fastify = await createApiServer({
	core,
	authenticate: await loadTokenAuthenticator(env.INSTANCE_ID, env.CALLERS_FILE),
	logger,
	defaultTimeoutMs: env.REQUEST_TIMEOUT_MS,
});

const shutdown = async (signal: string) => {
	logger.info({ signal }, 'Shutting down');
	try {
		await fastify.close();
		await core.close();
		await driver.close();
		process.exit(0);
	} catch (err) {
		logger.error({ err }, 'Shutdown failed');
		process.exit(1);
	}
};

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

await fastify.listen({ port: env.PORT, host: env.HOST });
