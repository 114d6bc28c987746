/**
 * Caller Context Plugin
 *
 * Authenticates each request through the configured Authenticator and builds
 * the ExecutionContext use cases run with. Requests without a caller are
 * answered with 401 before any route handler runs.
 *
 * Register after tracingPlugin.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { ExecutionContext } from '@castellan/domain-core';
import type { CallerContextPluginOptions, ErrorResponse } from '../types.js';
import { headerValue } from './tracing.js';

const DEFAULT_TIMEOUT_HEADER = 'x-request-timeout-ms';

const callerContextPluginAsync: FastifyPluginAsync<CallerContextPluginOptions> = async (fastify, opts) => {
	const { authenticate, skipPaths = [], timeoutHeader = DEFAULT_TIMEOUT_HEADER, defaultTimeoutMs } = opts;

	fastify.decorateRequest('caller', null);
	fastify.decorateRequest('executionContext', null);

	fastify.addHook('onRequest', async (request, reply) => {
		const path = request.url.split('?')[0] ?? request.url;
		if (skipPaths.includes(path)) {
			return;
		}

		const caller = await authenticate(request);
		if (!caller) {
			const body: ErrorResponse = { code: 'UNAUTHENTICATED', message: 'Authentication required' };
			return reply.status(401).send(body);
		}

		const timeout = parseTimeout(headerValue(request, timeoutHeader)) ?? defaultTimeoutMs;
		let ctx = ExecutionContext.create(caller, { correlationId: request.tracing?.correlationId });
		if (timeout !== undefined) {
			ctx = ExecutionContext.withTimeout(ctx, timeout);
		}

		request.caller = caller;
		request.executionContext = ctx;
		request.log = request.log.child({ executionId: ctx.executionId, principalId: caller.principalId });
	});
};

function parseTimeout(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number(raw);
	return Number.isFinite(value) && value > 0 ? value : undefined;
}

export const callerContextPlugin = fp(callerContextPluginAsync, {
	name: '@castellan/caller-context',
	fastify: '5.x',
	dependencies: ['@castellan/tracing'],
});

/**
 * @throws Error if called on a request the plugin skipped or was not registered for
 */
export function requireExecutionContext(request: FastifyRequest): ExecutionContext {
	const ctx = request.executionContext;
	if (!ctx) {
		throw new Error('ExecutionContext not available. Ensure callerContextPlugin is registered.');
	}
	return ctx;
}
