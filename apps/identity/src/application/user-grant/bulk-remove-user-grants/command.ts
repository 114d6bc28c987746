/**
 * Bulk Remove User Grants Command
 */

import type { Command } from '@castellan/application';

export interface BulkRemoveUserGrantsCommand extends Command {
	readonly grantIds: readonly string[];
}
