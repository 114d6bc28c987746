/**
 * In-process ResourceLookup backed by a directory file.
 *
 * Stands in for the user and project services in embedded mode and in tests.
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod/v4';
import type { ProjectGrantRef, ProjectRef, ResourceLookup, UserRef } from '../domain/resource-lookup.js';

export const ResourceDirectorySchema = z.object({
	users: z.array(z.object({ id: z.string(), orgId: z.string() })).default([]),
	projects: z
		.array(z.object({ id: z.string(), resourceOwner: z.string(), roleKeys: z.array(z.string()) }))
		.default([]),
	projectGrants: z
		.array(
			z.object({
				id: z.string(),
				projectId: z.string(),
				grantedOrgId: z.string(),
				roleKeys: z.array(z.string()),
				state: z.enum(['ACTIVE', 'INACTIVE']).default('ACTIVE'),
			}),
		)
		.default([]),
});

export type ResourceDirectoryData = z.input<typeof ResourceDirectorySchema>;

export interface InMemoryResourceDirectory extends ResourceLookup {
	putUser(user: UserRef): void;
	putProject(project: ProjectRef): void;
	putProjectGrant(grant: ProjectGrantRef): void;
}

export function createInMemoryResourceDirectory(data: ResourceDirectoryData = {}): InMemoryResourceDirectory {
	const parsed = ResourceDirectorySchema.parse(data);
	const users = new Map<string, UserRef>(parsed.users.map((u): [string, UserRef] => [u.id, u]));
	const projects = new Map<string, ProjectRef>(parsed.projects.map((p): [string, ProjectRef] => [p.id, p]));
	const projectGrants = new Map<string, ProjectGrantRef>(parsed.projectGrants.map((g): [string, ProjectGrantRef] => [g.id, g]));

	return {
		async findUser(userId) {
			return users.get(userId) ?? null;
		},
		async findProject(projectId) {
			return projects.get(projectId) ?? null;
		},
		async findProjectGrant(projectGrantId) {
			return projectGrants.get(projectGrantId) ?? null;
		},
		putUser(user) {
			users.set(user.id, user);
		},
		putProject(project) {
			projects.set(project.id, project);
		},
		putProjectGrant(grant) {
			projectGrants.set(grant.id, grant);
		},
	};
}

export async function loadResourceDirectory(path: string): Promise<InMemoryResourceDirectory> {
	const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
	return createInMemoryResourceDirectory(ResourceDirectorySchema.parse(raw));
}
