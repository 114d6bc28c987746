import { describe, it, expect, afterEach } from 'vitest';
import Fastify, { type FastifyInstance } from 'fastify';
import { Result, RESULT_SUCCESS_TOKEN, UseCaseError } from '@castellan/domain-core';
import { getErrorStatus, toErrorResponse, sendResult, badRequest } from '../response.js';

describe('Response Utilities', () => {
	describe('getErrorStatus', () => {
		it.each([
			[UseCaseError.permissionDenied('C', 'm'), 403],
			[UseCaseError.validation('C', 'm'), 400],
			[UseCaseError.notFound('C', 'm'), 404],
			[UseCaseError.failedPrecondition('C', 'm'), 412],
			[UseCaseError.conflict('C', 'm'), 409],
			[UseCaseError.deadlineExceeded('C', 'm'), 504],
			[UseCaseError.internal('C', 'm'), 500],
		])('should map %o to %i', (error, status) => {
			expect(getErrorStatus(error)).toBe(status);
		});
	});

	describe('toErrorResponse', () => {
		it('should create error response with details', () => {
			const error = UseCaseError.validation('ROLE_KEYS_REQUIRED', 'Role keys required', { field: 'roleKeys' });

			expect(toErrorResponse(error)).toEqual({
				message: 'Role keys required',
				code: 'ROLE_KEYS_REQUIRED',
				details: { field: 'roleKeys' },
			});
		});

		it('should omit empty details', () => {
			expect(toErrorResponse(UseCaseError.notFound('GRANT_NOT_FOUND', 'missing')).details).toBeUndefined();
		});
	});

	describe('sendResult', () => {
		let app: FastifyInstance;

		afterEach(async () => {
			await app.close();
		});

		it('should send a failure with its mapped status', async () => {
			app = Fastify();
			app.get('/grant', async (_request, reply) =>
				sendResult(reply, Result.failure(UseCaseError.failedPrecondition('GRANT_NOT_ACTIVE', 'Grant is not active'))),
			);

			const response = await app.inject({ method: 'GET', url: '/grant' });

			expect(response.statusCode).toBe(412);
			expect(response.json()).toEqual({ message: 'Grant is not active', code: 'GRANT_NOT_ACTIVE' });
		});

		it('should send a transformed success value with the success status', async () => {
			app = Fastify();
			app.post('/grant', async (_request, reply) =>
				sendResult(reply, Result.success(RESULT_SUCCESS_TOKEN, { grantId: 'ugr_1', sequence: 1 }), {
					successStatus: 201,
					transform: (value) => ({ id: value.grantId }),
				}),
			);

			const response = await app.inject({ method: 'POST', url: '/grant' });

			expect(response.statusCode).toBe(201);
			expect(response.json()).toEqual({ id: 'ugr_1' });
		});

		it('should send a bad request body', async () => {
			app = Fastify();
			app.get('/bad', async (_request, reply) => badRequest(reply, 'grantIds must not be empty'));

			const response = await app.inject({ method: 'GET', url: '/bad' });

			expect(response.statusCode).toBe(400);
			expect(response.json()).toEqual({ code: 'INVALID_ARGUMENT', message: 'grantIds must not be empty' });
		});
	});
});
