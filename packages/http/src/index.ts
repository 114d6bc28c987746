/**
 * @castellan/http
 *
 * Fastify plugins (tracing, caller context, error handler), Result to HTTP
 * mapping and shared TypeBox schemas.
 *
 * @example
 * ```typescript
 * const fastify = Fastify({ loggerInstance: logger });
 * await fastify.register(tracingPlugin);
 * await fastify.register(callerContextPlugin, { authenticate });
 * await fastify.register(errorHandlerPlugin, createStandardErrorHandlerOptions());
 * ```
 */

export {
	type TracingData,
	type TracingPluginOptions,
	type Authenticator,
	type CallerContextPluginOptions,
	type ErrorResponse,
	type FastifyRequest,
	type FastifyReply,
} from './types.js';

export {
	tracingPlugin,
	requireTracing,
	headerValue,
	callerContextPlugin,
	requireExecutionContext,
} from './plugins/index.js';

export {
	getErrorStatus,
	toErrorResponse,
	sendResult,
	sendError,
	jsonError,
	badRequest,
	type SendResultOptions,
} from './response.js';

export {
	errorHandlerPlugin,
	createCommonErrorMappers,
	createStandardErrorHandlerOptions,
	type ErrorHandlerConfig,
	type ErrorMapper,
} from './error-handler.js';

export {
	ErrorResponseSchema,
	type ErrorResponseType,
	ChangeDetailsSchema,
	NonEmptyString,
	CommonErrorResponses,
	Type,
	type Static,
	type TSchema,
} from './schemas.js';
