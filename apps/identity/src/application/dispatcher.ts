/**
 * Command Dispatcher
 *
 * Every operation enters here. The dispatcher refuses expired contexts,
 * asks the permission evaluator before the operation runs, and turns a
 * committed event into change details. A caller holding the permission only
 * on projects or project grants inside the checked scope is admitted when
 * the operation's `admitWithin` finds the target among them; callers with
 * no such membership are denied before anything is read.
 */

import {
	ChangeDetails,
	type DomainEvent,
	ExecutionContext,
	ResourceScope,
	Result,
	UseCaseError,
} from '@castellan/domain-core';
import type { DispatchContext, Logger } from '@castellan/logging';
import {
	type PermissionDefinition,
	type PermissionEvaluator,
	permissionToString,
} from '../authorization/index.js';

/**
 * How the caller got through: by a membership covering the operation's
 * scope, or only through memberships on the narrower scopes listed.
 */
export type Access =
	| { readonly kind: 'scope' }
	| { readonly kind: 'within'; readonly scopes: readonly ResourceScope[] };

export interface OperationSpec<T> {
	/** Operation name, used in logs */
	readonly operation: string;
	readonly permission: PermissionDefinition;
	readonly scope: ResourceScope;
	/**
	 * Consulted for callers denied at `scope` that hold the permission on
	 * scopes inside it. Resolves whether those scopes reach the resource the
	 * operation touches. Without it such callers are denied.
	 */
	readonly admitWithin?: (scopes: readonly ResourceScope[]) => Promise<boolean>;
	readonly run: (access: Access) => Promise<Result<T>>;
}

export interface Committed<TEvent extends DomainEvent> {
	readonly details: ChangeDetails;
	readonly event: TEvent;
}

export interface CommandDispatcher {
	/**
	 * Run a state-changing operation and describe the committed change.
	 */
	command<TEvent extends DomainEvent>(
		ctx: ExecutionContext,
		op: OperationSpec<TEvent>,
	): Promise<Result<Committed<TEvent>>>;

	/**
	 * Run an operation whose result is returned as is (reads, bulk commands).
	 */
	dispatch<T>(ctx: ExecutionContext, op: OperationSpec<T>): Promise<Result<T>>;
}

export interface CommandDispatcherDeps {
	readonly evaluator: PermissionEvaluator;
	readonly logger: Logger;
}

export function createCommandDispatcher(deps: CommandDispatcherDeps): CommandDispatcher {
	const { evaluator, logger } = deps;

	async function authorize<T>(ctx: ExecutionContext, op: OperationSpec<T>): Promise<Access | null> {
		if (evaluator.check(ctx.caller, op.permission, op.scope) === 'allow') {
			return { kind: 'scope' };
		}
		if (!op.admitWithin) {
			return null;
		}
		// nothing is read for callers without any membership inside the scope
		const scopes = evaluator.scopesBelow(ctx.caller, op.permission, op.scope);
		if (scopes.length === 0 || !(await op.admitWithin(scopes))) {
			return null;
		}
		return { kind: 'within', scopes };
	}

	async function dispatch<T>(ctx: ExecutionContext, op: OperationSpec<T>): Promise<Result<T>> {
		const bindings: DispatchContext = {
			operation: op.operation,
			executionId: ctx.executionId,
			correlationId: ctx.correlationId,
			principalId: ctx.principalId,
			orgId: ctx.caller.orgId,
		};
		const log = logger.child(bindings);

		if (ExecutionContext.isExpired(ctx)) {
			log.info('Deadline passed before dispatch');
			return Result.failure(
				UseCaseError.deadlineExceeded('DEADLINE_EXCEEDED', 'Deadline passed before the operation started', {
					deadline: ctx.deadline?.toISOString(),
				}),
			);
		}

		const permission = permissionToString(op.permission);
		let result: Result<T>;
		try {
			const access = await authorize(ctx, op);
			if (!access) {
				log.info({ permission, scope: ResourceScope.format(op.scope) }, 'Permission denied');
				return Result.failure(
					UseCaseError.permissionDenied('PERMISSION_DENIED', 'Caller is not allowed to perform this operation', {
						permission,
					}),
				);
			}
			result = await op.run(access);
		} catch (error) {
			log.error({ err: error }, 'Operation threw');
			return Result.failure(
				UseCaseError.internal('UNEXPECTED_ERROR', error instanceof Error ? error.message : 'Unknown error'),
			);
		}

		if (Result.isFailure(result)) {
			const { type, code } = result.error;
			if (type === 'internal') {
				log.error({ code, details: result.error.details }, result.error.message);
			} else {
				log.debug({ type, code }, 'Operation failed');
			}
		}

		return result;
	}

	return {
		dispatch,

		async command<TEvent extends DomainEvent>(
			ctx: ExecutionContext,
			op: OperationSpec<TEvent>,
		): Promise<Result<Committed<TEvent>>> {
			const result = await dispatch(ctx, op);
			if (Result.isSuccess(result)) {
				logger.info(
					{
						operation: op.operation,
						executionId: ctx.executionId,
						eventType: result.value.eventType,
						subject: result.value.subject,
						sequence: result.value.sequence,
					},
					'Command committed',
				);
			}
			return Result.map(result, (event) => ({ details: ChangeDetails.fromEvent(event), event }));
		},
	};
}
