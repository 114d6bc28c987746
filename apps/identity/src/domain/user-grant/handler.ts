/**
 * Storage handler for the user grant aggregate: snapshot decoding and the
 * uniqueness of non-removed grants per user and target.
 */

import type { AggregateHandler } from '@castellan/persistence';
import { z } from 'zod/v4';
import { USER_GRANT_STATES, UserGrant } from './user-grant.js';

const UserGrantSnapshot = z.object({
	id: z.string(),
	userId: z.string(),
	projectId: z.string(),
	projectGrantId: z.string().nullable(),
	roleKeys: z.array(z.string()),
	state: z.enum(USER_GRANT_STATES),
	resourceOwner: z.string(),
	sequence: z.number().int().positive(),
	changeDate: z.coerce.date(),
	creationDate: z.coerce.date(),
});

export const userGrantHandler: AggregateHandler<UserGrant> = {
	typeName: 'usergrant',

	fromSnapshot(snapshot) {
		return UserGrantSnapshot.parse(snapshot);
	},

	uniqueConstraints(grant) {
		if (UserGrant.isRemoved(grant)) {
			return [];
		}
		return [
			{
				key: UserGrant.uniqueKey(grant),
				errorCode: 'USER_GRANT_ALREADY_EXISTS',
				errorMessage: 'User already holds a grant on this target',
			},
		];
	},
};
