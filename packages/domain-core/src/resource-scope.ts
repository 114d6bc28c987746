/**
 * Resource Scope
 *
 * The tenant hierarchy is instance → organization → project. A project grant
 * delegates a project to another organization and is scoped to the receiving
 * organization. Memberships and permission checks are expressed over these
 * scopes.
 */

export type ResourceScope =
	| { readonly kind: 'instance' }
	| { readonly kind: 'organization'; readonly orgId: string }
	| { readonly kind: 'project'; readonly orgId: string; readonly projectId: string }
	| { readonly kind: 'projectGrant'; readonly orgId: string; readonly projectGrantId: string };

export type ResourceScopeKind = ResourceScope['kind'];

export const ResourceScope = {
	instance(): ResourceScope {
		return { kind: 'instance' };
	},

	organization(orgId: string): ResourceScope {
		return { kind: 'organization', orgId };
	},

	project(orgId: string, projectId: string): ResourceScope {
		return { kind: 'project', orgId, projectId };
	},

	projectGrant(orgId: string, projectGrantId: string): ResourceScope {
		return { kind: 'projectGrant', orgId, projectGrantId };
	},

	/**
	 * Whether a membership held at `held` extends to `target`.
	 *
	 * - instance covers everything in the instance
	 * - organization covers itself, its projects and the project grants it received
	 * - project and project grant cover only themselves
	 */
	covers(held: ResourceScope, target: ResourceScope): boolean {
		switch (held.kind) {
			case 'instance':
				return true;
			case 'organization':
				return target.kind !== 'instance' && target.orgId === held.orgId;
			case 'project':
				return target.kind === 'project' && target.orgId === held.orgId && target.projectId === held.projectId;
			case 'projectGrant':
				return (
					target.kind === 'projectGrant' &&
					target.orgId === held.orgId &&
					target.projectGrantId === held.projectGrantId
				);
		}
	},

	/**
	 * Stable string form, used in logs and error details.
	 */
	format(scope: ResourceScope): string {
		switch (scope.kind) {
			case 'instance':
				return 'instance';
			case 'organization':
				return `org:${scope.orgId}`;
			case 'project':
				return `org:${scope.orgId}/project:${scope.projectId}`;
			case 'projectGrant':
				return `org:${scope.orgId}/project-grant:${scope.projectGrantId}`;
		}
	},
};
