/**
 * User Grants API
 *
 * Commands answer with the change details of the grant; reads come from the
 * projected view and may trail a just-committed change. Pass minSequence to
 * wait for it.
 */

import type { FastifyInstance } from 'fastify';
import {
	sendResult,
	requireExecutionContext,
	CommonErrorResponses,
	ChangeDetailsSchema,
	Type,
} from '@castellan/http';

import type { IdentityCore } from '../../core.js';
import { toChangeDetailsResponse, toUserGrantListResponse, toUserGrantResponse } from '../mappers.js';
import {
	AddUserGrantSchema,
	AddedUserGrantResponseSchema,
	BulkRemoveUserGrantsSchema,
	GrantIdParam,
	ListUserGrantsSchema,
	ReadOptionsQuerySchema,
	UpdateUserGrantSchema,
	UserGrantListResponseSchema,
	UserGrantResponseSchema,
	type AddUserGrantBody,
	type BulkRemoveUserGrantsBody,
	type GrantIdParams,
	type ListUserGrantsBody,
	type ReadOptionsQuery,
	type UpdateUserGrantBody,
} from '../schemas.js';

export interface UserGrantsRoutesDeps {
	readonly core: IdentityCore;
}

const BASE = '/management/user-grants';

export async function registerUserGrantsRoutes(fastify: FastifyInstance, deps: UserGrantsRoutesDeps): Promise<void> {
	const { core } = deps;

	// POST /management/user-grants - Add
	fastify.post<{ Body: AddUserGrantBody }>(
		BASE,
		{
			schema: {
				body: AddUserGrantSchema,
				response: { 201: AddedUserGrantResponseSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.addUserGrant(ctx, request.body);
			return sendResult(reply, result, {
				successStatus: 201,
				transform: (added) => ({ grantId: added.grantId, details: toChangeDetailsResponse(added.details) }),
			});
		},
	);

	// POST /management/user-grants/_search - List
	fastify.post<{ Body: ListUserGrantsBody }>(
		`${BASE}/_search`,
		{
			schema: {
				body: ListUserGrantsSchema,
				response: { 200: UserGrantListResponseSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.listUserGrants(ctx, request.body);
			return sendResult(reply, result, { transform: toUserGrantListResponse });
		},
	);

	// POST /management/user-grants/_bulk_remove
	fastify.post<{ Body: BulkRemoveUserGrantsBody }>(
		`${BASE}/_bulk_remove`,
		{
			schema: {
				body: BulkRemoveUserGrantsSchema,
				response: { 200: Type.Object({}), ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.bulkRemoveUserGrants(ctx, request.body.grantIds);
			return sendResult(reply, result, { transform: () => ({}) });
		},
	);

	// GET /management/user-grants/:grantId
	fastify.get<{ Params: GrantIdParams; Querystring: ReadOptionsQuery }>(
		`${BASE}/:grantId`,
		{
			schema: {
				params: GrantIdParam,
				querystring: ReadOptionsQuerySchema,
				response: { 200: UserGrantResponseSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.getUserGrantById(ctx, request.params.grantId, {
				minSequence: request.query.minSequence,
			});
			return sendResult(reply, result, { transform: toUserGrantResponse });
		},
	);

	// PUT /management/user-grants/:grantId - replace role keys
	fastify.put<{ Params: GrantIdParams; Body: UpdateUserGrantBody }>(
		`${BASE}/:grantId`,
		{
			schema: {
				params: GrantIdParam,
				body: UpdateUserGrantSchema,
				response: { 200: ChangeDetailsSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.updateUserGrant(ctx, request.params.grantId, request.body.roleKeys);
			return sendResult(reply, result, { transform: toChangeDetailsResponse });
		},
	);

	// POST /management/user-grants/:grantId/_deactivate
	fastify.post<{ Params: GrantIdParams }>(
		`${BASE}/:grantId/_deactivate`,
		{
			schema: {
				params: GrantIdParam,
				response: { 200: ChangeDetailsSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.deactivateUserGrant(ctx, request.params.grantId);
			return sendResult(reply, result, { transform: toChangeDetailsResponse });
		},
	);

	// POST /management/user-grants/:grantId/_reactivate
	fastify.post<{ Params: GrantIdParams }>(
		`${BASE}/:grantId/_reactivate`,
		{
			schema: {
				params: GrantIdParam,
				response: { 200: ChangeDetailsSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.reactivateUserGrant(ctx, request.params.grantId);
			return sendResult(reply, result, { transform: toChangeDetailsResponse });
		},
	);

	// DELETE /management/user-grants/:grantId
	fastify.delete<{ Params: GrantIdParams }>(
		`${BASE}/:grantId`,
		{
			schema: {
				params: GrantIdParam,
				response: { 200: ChangeDetailsSchema, ...CommonErrorResponses },
			},
		},
		async (request, reply) => {
			const ctx = requireExecutionContext(request);
			const result = await core.removeUserGrant(ctx, request.params.grantId);
			return sendResult(reply, result, { transform: toChangeDetailsResponse });
		},
	);
}
