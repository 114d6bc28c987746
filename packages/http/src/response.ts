/**
 * Response Utilities
 *
 * Map Result values to HTTP responses.
 */

import type { FastifyReply } from 'fastify';
import { Result, UseCaseError } from '@castellan/domain-core';
import type { ErrorResponse } from './types.js';

export function getErrorStatus(error: UseCaseError): number {
	return UseCaseError.httpStatus(error);
}

export function toErrorResponse(error: UseCaseError): ErrorResponse {
	const hasDetails = Object.keys(error.details).length > 0;
	return {
		message: error.message,
		code: error.code,
		...(hasDetails ? { details: error.details } : {}),
	};
}

export interface SendResultOptions<T, R> {
	/** Status code for success (default: 200) */
	successStatus?: number;
	/** Transform success value before sending */
	transform?: (value: T) => R;
}

/**
 * Send a Result as an HTTP response.
 *
 * @example
 * ```typescript
 * fastify.post('/management/user-grants', async (request, reply) => {
 *     const result = await core.addUserGrant(ctx, input);
 *     return sendResult(reply, result, { successStatus: 201 });
 * });
 * ```
 */
export function sendResult<T, R = T>(
	reply: FastifyReply,
	result: Result<T>,
	options: SendResultOptions<T, R> = {},
): FastifyReply {
	const { successStatus = 200, transform } = options;

	if (Result.isSuccess(result)) {
		const value = transform ? transform(result.value) : result.value;
		return reply.status(successStatus).send(value);
	}

	return sendError(reply, result.error);
}

export function sendError(reply: FastifyReply, error: UseCaseError): FastifyReply {
	const status = getErrorStatus(error);
	if (status >= 500) {
		reply.log.error({ code: error.code, type: error.type, details: error.details }, error.message);
	}
	return reply.status(status).send(toErrorResponse(error));
}

export function jsonError(
	reply: FastifyReply,
	status: number,
	code: string,
	message: string,
	details?: Record<string, unknown>,
): FastifyReply {
	const response: ErrorResponse = {
		code,
		message,
		...(details ? { details } : {}),
	};
	return reply.status(status).send(response);
}

export function badRequest(reply: FastifyReply, message: string, details?: Record<string, unknown>): FastifyReply {
	return jsonError(reply, 400, 'INVALID_ARGUMENT', message, details);
}
