/**
 * Deactivate User Grant Command
 */

import type { Command } from '@castellan/application';

export interface DeactivateUserGrantCommand extends Command {
	readonly grantId: string;
}
