/**
 * Set Security Settings Command
 */

import type { Command } from '@castellan/application';

/**
 * Omitted fields keep their current value.
 */
export interface SetSecuritySettingsCommand extends Command {
	readonly embeddedIframeEnabled?: boolean;
	readonly allowedOrigins?: readonly string[];
	readonly impersonationEnabled?: boolean;
}
