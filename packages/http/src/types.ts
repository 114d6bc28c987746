/**
 * HTTP Layer Types
 *
 * Request decorations and the error body shared by every route.
 */

import type { FastifyRequest, FastifyReply } from 'fastify';
import type { Caller, ExecutionContext } from '@castellan/domain-core';

/**
 * Tracing data stored in request context.
 */
export interface TracingData {
	/** Correlation ID for distributed tracing (from header or generated) */
	readonly correlationId: string;
	/** Causation ID linking to parent event (from header, may be null) */
	readonly causationId: string | null;
	/** Request start time */
	readonly startTime: number;
}

export interface TracingPluginOptions {
	/** Header name for correlation ID (default: x-correlation-id) */
	readonly correlationIdHeader?: string;
	/** Alternative header name for correlation ID (default: x-request-id) */
	readonly requestIdHeader?: string;
	/** Header name for causation ID (default: x-causation-id) */
	readonly causationIdHeader?: string;
	/** Whether to add correlation ID to response headers (default: true) */
	readonly propagateToResponse?: boolean;
}

/**
 * Resolves the caller of a request. Returning null rejects the request
 * with 401.
 */
export type Authenticator = (request: FastifyRequest) => Promise<Caller | null>;

export interface CallerContextPluginOptions {
	readonly authenticate: Authenticator;
	/** Paths served without a caller (e.g. /health) */
	readonly skipPaths?: readonly string[];
	/** Header carrying a per-request timeout in milliseconds (default: x-request-timeout-ms) */
	readonly timeoutHeader?: string;
	/** Timeout applied when the header is absent. No deadline when unset. */
	readonly defaultTimeoutMs?: number;
}

/**
 * Standard error response format.
 */
export interface ErrorResponse {
	/** Human-readable error message */
	readonly message: string;
	/** Machine-readable error code */
	readonly code: string;
	/** Additional error details */
	readonly details?: Record<string, unknown>;
}

declare module 'fastify' {
	interface FastifyRequest {
		tracing: TracingData | null;
		caller: Caller | null;
		/** Execution context for use case calls */
		executionContext: ExecutionContext | null;
	}
}

export type { FastifyRequest, FastifyReply };
