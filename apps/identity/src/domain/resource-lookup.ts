/**
 * Resource Lookup
 *
 * Users, projects and project grants are owned by other services. Grant
 * commands consult them through this port to check that a grant refers to
 * something that exists and may be granted.
 */

export interface UserRef {
	readonly id: string;
	readonly orgId: string;
}

export interface ProjectRef {
	readonly id: string;
	/** Organization owning the project */
	readonly resourceOwner: string;
	/** Role keys defined on the project */
	readonly roleKeys: readonly string[];
}

export type ProjectGrantState = 'ACTIVE' | 'INACTIVE';

export interface ProjectGrantRef {
	readonly id: string;
	readonly projectId: string;
	/** Organization the project was delegated to */
	readonly grantedOrgId: string;
	/** Role keys the project owner delegated */
	readonly roleKeys: readonly string[];
	readonly state: ProjectGrantState;
}

export interface ResourceLookup {
	findUser(userId: string): Promise<UserRef | null>;
	findProject(projectId: string): Promise<ProjectRef | null>;
	findProjectGrant(projectGrantId: string): Promise<ProjectGrantRef | null>;
}
