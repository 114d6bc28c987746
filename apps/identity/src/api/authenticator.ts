/**
 * Static bearer-token authenticator.
 *
 * Maps configured tokens to callers. Authentication proper lives in front of
 * this service; this is how embedded deployments and tests supply callers.
 */

import { readFile } from 'node:fs/promises';
import type { Caller } from '@castellan/domain-core';
import type { Authenticator } from '@castellan/http';
import { z } from 'zod/v4';

const ScopeSchema = z.discriminatedUnion('kind', [
	z.object({ kind: z.literal('instance') }),
	z.object({ kind: z.literal('organization'), orgId: z.string() }),
	z.object({ kind: z.literal('project'), orgId: z.string(), projectId: z.string() }),
	z.object({ kind: z.literal('projectGrant'), orgId: z.string(), projectGrantId: z.string() }),
]);

export const CallerTokensSchema = z.object({
	callers: z.array(
		z.object({
			token: z.string().min(1),
			principalId: z.string(),
			orgId: z.string(),
			memberships: z.array(z.object({ role: z.string(), scope: ScopeSchema })).default([]),
		}),
	),
});

export type CallerTokens = z.input<typeof CallerTokensSchema>;

const BEARER = /^Bearer\s+(.+)$/i;

export function createTokenAuthenticator(instanceId: string, tokens: CallerTokens): Authenticator {
	const callers = new Map<string, Caller>();
	for (const entry of CallerTokensSchema.parse(tokens).callers) {
		callers.set(entry.token, {
			principalId: entry.principalId,
			instanceId,
			orgId: entry.orgId,
			memberships: entry.memberships,
		});
	}

	return async (request) => {
		const match = BEARER.exec(request.headers.authorization ?? '');
		const token = match?.[1];
		return token ? (callers.get(token.trim()) ?? null) : null;
	};
}

export async function loadTokenAuthenticator(instanceId: string, path: string): Promise<Authenticator> {
	const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
	return createTokenAuthenticator(instanceId, CallerTokensSchema.parse(raw));
}
