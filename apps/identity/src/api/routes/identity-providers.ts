/**
 * Login Identity Providers API
 */

import type { FastifyInstance } from 'fastify';
import { sendResult, requireExecutionContext, CommonErrorResponses } from '@castellan/http';

import type { IdentityCore } from '../../core.js';
import { toActiveProvidersResponse } from '../mappers.js';
import {
	ActiveProvidersResponseSchema,
	ActiveProvidersSearchSchema,
	type ActiveProvidersSearchBody,
} from '../schemas.js';

export interface IdentityProvidersRoutesDeps {
	readonly core: IdentityProviderReader;
}

type IdentityProviderReader = Pick<IdentityCore, 'getActiveIdentityProviders'>;

export async function registerIdentityProvidersRoutes(
	fastify: FastifyInstance,
	deps: IdentityProvidersRoutesDeps,
): Promise<void> {
	const { core } = deps;

	// POST /settings/login/idps/_search - active providers of the effective login policy
	fastify.post<{ Body: ActiveProvidersSearchBody }>(
		'/settings/login/idps/_search',
		{
			schema: {
				body: ActiveProvidersSearchSchema,
				response: { 200: ActiveProvidersResponseSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.getActiveIdentityProviders(ctx, request.body);
			return sendResult(reply, result, { transform: toActiveProvidersResponse });
		},
	);
}
