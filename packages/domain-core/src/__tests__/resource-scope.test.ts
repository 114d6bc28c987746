import { describe, it, expect } from 'vitest';
import { ResourceScope } from '../resource-scope.js';

describe('ResourceScope.covers', () => {
	const instance = ResourceScope.instance();
	const org = ResourceScope.organization('org-1');
	const otherOrg = ResourceScope.organization('org-2');
	const project = ResourceScope.project('org-1', 'project-1');
	const projectGrant = ResourceScope.projectGrant('org-1', 'pg-1');

	it('should let an instance membership cover everything', () => {
		for (const target of [instance, org, otherOrg, project, projectGrant]) {
			expect(ResourceScope.covers(instance, target)).toBe(true);
		}
	});

	it('should let an organization membership cover its own tree only', () => {
		expect(ResourceScope.covers(org, org)).toBe(true);
		expect(ResourceScope.covers(org, project)).toBe(true);
		expect(ResourceScope.covers(org, projectGrant)).toBe(true);
		expect(ResourceScope.covers(org, instance)).toBe(false);
		expect(ResourceScope.covers(org, otherOrg)).toBe(false);
		expect(ResourceScope.covers(otherOrg, project)).toBe(false);
	});

	it('should let a project membership cover only that project', () => {
		expect(ResourceScope.covers(project, project)).toBe(true);
		expect(ResourceScope.covers(project, ResourceScope.project('org-1', 'project-2'))).toBe(false);
		expect(ResourceScope.covers(project, org)).toBe(false);
		expect(ResourceScope.covers(project, projectGrant)).toBe(false);
	});

	it('should let a project grant membership cover only that project grant', () => {
		expect(ResourceScope.covers(projectGrant, projectGrant)).toBe(true);
		expect(ResourceScope.covers(projectGrant, ResourceScope.projectGrant('org-1', 'pg-2'))).toBe(false);
		expect(ResourceScope.covers(projectGrant, project)).toBe(false);
	});
});

describe('ResourceScope.format', () => {
	it('should render each scope kind', () => {
		expect(ResourceScope.format(ResourceScope.instance())).toBe('instance');
		expect(ResourceScope.format(ResourceScope.organization('o'))).toBe('org:o');
		expect(ResourceScope.format(ResourceScope.project('o', 'p'))).toBe('org:o/project:p');
		expect(ResourceScope.format(ResourceScope.projectGrant('o', 'g'))).toBe('org:o/project-grant:g');
	});
});
