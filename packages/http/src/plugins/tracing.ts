/**
 * Tracing Plugin
 *
 * Extracts correlation and causation IDs from request headers and
 * propagates the correlation ID to the response.
 */

import type { FastifyPluginAsync, FastifyRequest } from 'fastify';
import fp from 'fastify-plugin';
import { generateRaw } from '@castellan/tsid';
import type { TracingPluginOptions, TracingData } from '../types.js';

const DEFAULT_CORRELATION_ID_HEADER = 'x-correlation-id';
const DEFAULT_REQUEST_ID_HEADER = 'x-request-id';
const DEFAULT_CAUSATION_ID_HEADER = 'x-causation-id';

export function headerValue(request: FastifyRequest, name: string): string | undefined {
	const value = request.headers[name];
	if (Array.isArray(value)) {
		return value[0];
	}
	return value === '' ? undefined : value;
}

const tracingPluginAsync: FastifyPluginAsync<TracingPluginOptions> = async (fastify, opts) => {
	const {
		correlationIdHeader = DEFAULT_CORRELATION_ID_HEADER,
		requestIdHeader = DEFAULT_REQUEST_ID_HEADER,
		causationIdHeader = DEFAULT_CAUSATION_ID_HEADER,
		propagateToResponse = true,
	} = opts;

	fastify.decorateRequest('tracing', null);

	fastify.addHook('onRequest', async (request, reply) => {
		const correlationId =
			headerValue(request, correlationIdHeader) ??
			headerValue(request, requestIdHeader) ??
			`trace-${generateRaw()}`;

		request.tracing = {
			correlationId,
			causationId: headerValue(request, causationIdHeader) ?? null,
			startTime: Date.now(),
		};

		if (propagateToResponse) {
			reply.header(correlationIdHeader, correlationId);
		}
	});
};

export const tracingPlugin = fp(tracingPluginAsync, {
	name: '@castellan/tracing',
	fastify: '5.x',
});

/**
 * @throws Error if the tracing plugin has not been registered
 */
export function requireTracing(request: FastifyRequest): TracingData {
	const tracing = request.tracing;
	if (!tracing) {
		throw new Error('Tracing context not available. Ensure tracingPlugin is registered.');
	}
	return tracing;
}
