/**
 * Error Handler
 *
 * Global error handler plugin. Maps thrown errors to error responses and logs
 * everything that ends up as a 5xx.
 */

import type { FastifyPluginAsync, FastifyError } from 'fastify';
import fp from 'fastify-plugin';
import type { ErrorResponse } from './types.js';

export interface ErrorHandlerConfig {
	/** Whether to include stack traces in responses (default: false) */
	readonly includeStack?: boolean;
	readonly mappers?: ErrorMapper[];
}

export interface ErrorMapper {
	canHandle: (error: FastifyError) => boolean;
	toResponse: (error: FastifyError) => { status: number; body: ErrorResponse };
}

const errorHandlerPluginAsync: FastifyPluginAsync<ErrorHandlerConfig> = async (fastify, opts) => {
	const { includeStack = false, mappers = [] } = opts;

	fastify.setErrorHandler((error: FastifyError, request, reply) => {
		const log = request.log;
		const correlationId = request.tracing?.correlationId;

		for (const mapper of mappers) {
			if (mapper.canHandle(error)) {
				const { status, body } = mapper.toResponse(error);
				if (status >= 500) {
					log.error({ error: error.name, message: error.message, status, correlationId }, 'Mapped error');
				}
				return reply.status(status).send(body);
			}
		}

		const statusCode = error.statusCode ?? 500;
		if (statusCode < 500) {
			const body: ErrorResponse = {
				code: `HTTP_${statusCode}`,
				message: error.message || 'An error occurred',
			};
			return reply.status(statusCode).send(body);
		}

		log.error(
			{ error: error.name, message: error.message, stack: error.stack, correlationId },
			'Unhandled error',
		);

		const body: ErrorResponse = {
			code: 'INTERNAL_ERROR',
			message: 'An unexpected error occurred',
			...(includeStack && error.stack ? { details: { stack: error.stack } } : {}),
		};
		return reply.status(500).send(body);
	});
};

export const errorHandlerPlugin = fp(errorHandlerPluginAsync, {
	name: '@castellan/error-handler',
	fastify: '5.x',
});

/**
 * Request validation (TypeBox schemas through fastify's AJV) and malformed
 * JSON bodies both become 400 INVALID_ARGUMENT.
 */
export function createCommonErrorMappers(): ErrorMapper[] {
	return [
		{
			canHandle: (e) => e.code === 'FST_ERR_VALIDATION' || e.validation !== undefined,
			toResponse: (e) => ({
				status: 400,
				body: {
					code: 'INVALID_ARGUMENT',
					message: e.message || 'Request validation failed',
					...(e.validation ? { details: { errors: e.validation } } : {}),
				},
			}),
		},
		{
			canHandle: (e) => e.code === 'FST_ERR_CTP_INVALID_JSON_BODY' || e instanceof SyntaxError,
			toResponse: () => ({
				status: 400,
				body: { code: 'INVALID_JSON', message: 'Invalid JSON in request body' },
			}),
		},
	];
}

export function createStandardErrorHandlerOptions(): ErrorHandlerConfig {
	return { mappers: createCommonErrorMappers() };
}
