/**
 * API Server
 *
 * Fastify instance with tracing, caller context and error handling, serving
 * the identity routes.
 */

import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import {
	type Authenticator,
	callerContextPlugin,
	createStandardErrorHandlerOptions,
	errorHandlerPlugin,
	tracingPlugin,
} from '@castellan/http';
import type { Logger } from '@castellan/logging';

import type { IdentityCore } from '../core.js';
import {
	registerIdentityProvidersRoutes,
	registerSecuritySettingsRoutes,
	registerUserGrantsRoutes,
} from './routes/index.js';

export interface ApiServerOptions {
	readonly core: IdentityCore;
	readonly authenticate: Authenticator;
	readonly logger: Logger;
	/** Deadline for requests that do not send one */
	readonly defaultTimeoutMs?: number;
}

export async function createApiServer(options: ApiServerOptions): Promise<FastifyInstance> {
	const { core, authenticate, defaultTimeoutMs } = options;

	const loggerInstance: FastifyBaseLogger = options.logger;
	const fastify = Fastify({ loggerInstance });

	await fastify.register(tracingPlugin);
	await fastify.register(callerContextPlugin, {
		authenticate,
		skipPaths: ['/health'],
		...(defaultTimeoutMs !== undefined && { defaultTimeoutMs }),
	});
	await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());

	fastify.get('/health', async () => ({ status: 'UP' }));

	await registerSecuritySettingsRoutes(fastify, { core });
	await registerUserGrantsRoutes(fastify, { core });
	await registerIdentityProvidersRoutes(fastify, { core });

	return fastify;
}
