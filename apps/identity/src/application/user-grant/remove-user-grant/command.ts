/**
 * Remove User Grant Command
 */

import type { Command } from '@castellan/application';

export interface RemoveUserGrantCommand extends Command {
	readonly grantId: string;
}
