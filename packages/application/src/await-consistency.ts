/**
 * Read-after-write polling.
 *
 * Read views are fed asynchronously, so a successful command does not mean
 * the next read reflects it. Callers that need to observe their own write
 * poll the read until it satisfies a predicate, within a bounded wait:
 *
 * ```typescript
 * const settled = await awaitConsistency(
 *     () => queries.getUserGrantById({ grantId }, ctx),
 *     (grant) => grant.sequence >= details.sequence,
 *     { timeoutMs: 60_000 },
 * );
 * ```
 *
 * Mismatches, thrown errors and retryable or not-found failures are treated
 * as transient. Any other failure (permission denied, invalid argument) is
 * returned at once, since polling cannot change it.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { Result, UseCaseError } from '@castellan/domain-core';

export type BackoffStrategy = 'fixed' | 'exponential';

/** Progress reported after each unsuccessful attempt. */
export interface ConsistencyProgress {
	attempt: number;
	elapsedMs: number;
	remainingMs: number;
	reason: 'mismatch' | 'failure' | 'error';
}

export interface ConsistencyOptions {
	/** Total wall-clock budget. Default: 60_000 (1 min). */
	timeoutMs?: number;
	/** Wait before the second attempt. Default: 100. */
	intervalMs?: number;
	/** Default: 'fixed'. Exponential doubles the wait up to maxIntervalMs. */
	backoff?: BackoffStrategy;
	/** Default: 2_000. */
	maxIntervalMs?: number;
	/** Hard stop from the caller's execution context, if earlier than the budget. */
	deadline?: Date | null;
	onProgress?: (progress: ConsistencyProgress) => void;
}

export const DEFAULT_CONSISTENCY_TIMEOUT_MS = 60_000;
const DEFAULT_INTERVAL_MS = 100;
const DEFAULT_MAX_INTERVAL_MS = 2_000;

/**
 * Wait before attempt `attempt + 1`.
 */
export function nextInterval(
	attempt: number,
	intervalMs: number,
	backoff: BackoffStrategy,
	maxIntervalMs: number,
): number {
	if (backoff === 'fixed') {
		return intervalMs;
	}
	return Math.min(intervalMs * 2 ** (attempt - 1), maxIntervalMs);
}

function isTransient(error: UseCaseError): boolean {
	return UseCaseError.isRetryable(error) || error.type === 'not_found';
}

export async function awaitConsistency<T>(
	read: () => Promise<Result<T>>,
	predicate: (value: T) => boolean,
	options: ConsistencyOptions = {},
): Promise<Result<T>> {
	const timeoutMs = options.timeoutMs ?? DEFAULT_CONSISTENCY_TIMEOUT_MS;
	const intervalMs = options.intervalMs ?? DEFAULT_INTERVAL_MS;
	const backoff = options.backoff ?? 'fixed';
	const maxIntervalMs = options.maxIntervalMs ?? DEFAULT_MAX_INTERVAL_MS;

	const startTime = Date.now();
	let stopAt = startTime + timeoutMs;
	if (options.deadline && options.deadline.getTime() < stopAt) {
		stopAt = options.deadline.getTime();
	}

	let attempt = 0;
	let lastValue: T | undefined;
	let lastError: string | undefined;

	for (;;) {
		attempt++;
		let reason: ConsistencyProgress['reason'];

		try {
			const result = await read();
			if (Result.isSuccess(result)) {
				if (predicate(result.value)) {
					return result;
				}
				lastValue = result.value;
				reason = 'mismatch';
			} else if (isTransient(result.error)) {
				lastError = `${result.error.code}: ${result.error.message}`;
				reason = 'failure';
			} else {
				return result;
			}
		} catch (error) {
			lastError = error instanceof Error ? error.message : String(error);
			reason = 'error';
		}

		const now = Date.now();
		const remainingMs = Math.max(0, stopAt - now);
		options.onProgress?.({ attempt, elapsedMs: now - startTime, remainingMs, reason });

		const wait = nextInterval(attempt, intervalMs, backoff, maxIntervalMs);
		if (remainingMs === 0 || now + wait >= stopAt) {
			// one last attempt would land past the budget
			return Result.failure(
				UseCaseError.deadlineExceeded('CONSISTENCY_TIMEOUT', 'Read did not converge within the allowed time', {
					attempts: attempt,
					elapsedMs: now - startTime,
					lastValue,
					lastError,
				}),
			);
		}

		await sleep(wait);
	}
}
