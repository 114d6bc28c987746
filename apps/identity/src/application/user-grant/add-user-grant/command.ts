/**
 * Add User Grant Command
 */

import type { Command } from '@castellan/application';
import type { GrantTarget } from '../../../domain/user-grant/index.js';

export interface AddUserGrantCommand extends Command {
	readonly userId: string;
	/** Project granted directly, or the project grant that delegates it */
	readonly target: GrantTarget;
	readonly roleKeys: readonly string[];
}
