import type { AggregateHandler } from '@castellan/persistence';
import { z } from 'zod/v4';
import type { SecuritySettings } from './security-settings.js';

const SecuritySettingsSnapshot = z.object({
	id: z.string(),
	embeddedIframeEnabled: z.boolean(),
	allowedOrigins: z.array(z.string()),
	impersonationEnabled: z.boolean(),
	resourceOwner: z.string(),
	sequence: z.number().int().positive(),
	changeDate: z.coerce.date(),
});

export const securitySettingsHandler: AggregateHandler<SecuritySettings> = {
	typeName: 'securitysettings',

	fromSnapshot(snapshot) {
		return SecuritySettingsSnapshot.parse(snapshot);
	},
};
