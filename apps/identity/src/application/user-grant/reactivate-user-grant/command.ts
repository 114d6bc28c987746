/**
 * Reactivate User Grant Command
 */

import type { Command } from '@castellan/application';

export interface ReactivateUserGrantCommand extends Command {
	readonly grantId: string;
}
