/**
 * Security Settings API
 */

import type { FastifyInstance } from 'fastify';
import { sendResult, requireExecutionContext, CommonErrorResponses, ChangeDetailsSchema } from '@castellan/http';

import type { IdentityCore } from '../../core.js';
import { toChangeDetailsResponse, toSecuritySettingsResponse } from '../mappers.js';
import {
	ReadOptionsQuerySchema,
	SecuritySettingsResponseSchema,
	SetSecuritySettingsSchema,
	type ReadOptionsQuery,
	type SetSecuritySettingsBody,
} from '../schemas.js';

export interface SecuritySettingsRoutesDeps {
	readonly core: IdentityCore;
}

export async function registerSecuritySettingsRoutes(
	fastify: FastifyInstance,
	deps: SecuritySettingsRoutesDeps,
): Promise<void> {
	const { core } = deps;

	// GET /settings/security
	fastify.get<{ Querystring: ReadOptionsQuery }>(
		'/settings/security',
		{
			schema: {
				querystring: ReadOptionsQuerySchema,
				response: { 200: SecuritySettingsResponseSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.getSecuritySettings(ctx, { minSequence: request.query.minSequence });
			return sendResult(reply, result, { transform: toSecuritySettingsResponse });
		},
	);

	// PUT /settings/security - omitted fields keep their value
	fastify.put<{ Body: SetSecuritySettingsBody }>(
		'/settings/security',
		{
			schema: {
				body: SetSecuritySettingsSchema,
				response: { 200: ChangeDetailsSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.setSecuritySettings(ctx, request.body);
			return sendResult(reply, result, { transform: toChangeDetailsResponse });
		},
	);
}
