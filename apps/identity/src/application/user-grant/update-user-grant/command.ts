/**
 * Update User Grant Command
 */

import type { Command } from '@castellan/application';

/**
 * Replaces the role keys of a grant.
 */
export interface UpdateUserGrantCommand extends Command {
	readonly grantId: string;
	readonly roleKeys: readonly string[];
}
