/**
 * Query Results
 *
 * Reads go through the same Result type as commands so that permission and
 * deadline failures are reported the same way. A read never changes state,
 * so its success does not come from the unit of work.
 */

import type { ExecutionContext, Result } from '@castellan/domain-core';

/**
 * Successful read.
 */
export function queryResult<T>(value: T): Result<T> {
	return { _tag: 'success', value };
}

/**
 * A read operation.
 */
export interface Query<TParams, TResult> {
	execute(params: TParams, context: ExecutionContext): Promise<Result<TResult>>;
}
