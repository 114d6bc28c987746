/**
 * Request and response schemas of the identity API.
 */

import { ChangeDetailsSchema, Type, type Static } from '@castellan/http';

const NullableDateTime = Type.Union([Type.String({ format: 'date-time' }), Type.Null()]);

// ─── Security settings ──────────────────────────────────────────────────────

export const SetSecuritySettingsSchema = Type.Object(
	{
		embeddedIframeEnabled: Type.Optional(Type.Boolean()),
		allowedOrigins: Type.Optional(Type.Array(Type.String({ minLength: 1 }))),
		impersonationEnabled: Type.Optional(Type.Boolean()),
	},
	{ additionalProperties: false },
);

export type SetSecuritySettingsBody = Static<typeof SetSecuritySettingsSchema>;

export const SecuritySettingsResponseSchema = Type.Object({
	embeddedIframeEnabled: Type.Boolean(),
	allowedOrigins: Type.Array(Type.String()),
	impersonationEnabled: Type.Boolean(),
	details: Type.Object({
		sequence: Type.Integer(),
		changeDate: NullableDateTime,
		resourceOwner: Type.String(),
	}),
});

export const ReadOptionsQuerySchema = Type.Object({
	minSequence: Type.Optional(Type.Integer({ minimum: 0 })),
});

export type ReadOptionsQuery = Static<typeof ReadOptionsQuerySchema>;

// ─── User grants ────────────────────────────────────────────────────────────

export const GrantIdParam = Type.Object({ grantId: Type.String({ minLength: 1 }) });

export type GrantIdParams = Static<typeof GrantIdParam>;

const RoleKeys = Type.Array(Type.String(), { description: 'Role keys; blanks and duplicates are dropped' });

export const AddUserGrantSchema = Type.Object({
	userId: Type.String(),
	projectId: Type.Optional(Type.String()),
	projectGrantId: Type.Optional(Type.String()),
	roleKeys: RoleKeys,
});

export type AddUserGrantBody = Static<typeof AddUserGrantSchema>;

export const UpdateUserGrantSchema = Type.Object({ roleKeys: RoleKeys });

export type UpdateUserGrantBody = Static<typeof UpdateUserGrantSchema>;

export const BulkRemoveUserGrantsSchema = Type.Object({ grantIds: Type.Array(Type.String()) });

export type BulkRemoveUserGrantsBody = Static<typeof BulkRemoveUserGrantsSchema>;

export const ListUserGrantsSchema = Type.Object({
	userId: Type.Optional(Type.String()),
	projectId: Type.Optional(Type.String()),
	projectGrantId: Type.Optional(Type.String()),
	roleKey: Type.Optional(Type.String()),
	state: Type.Optional(Type.Union([Type.Literal('ACTIVE'), Type.Literal('INACTIVE')])),
	offset: Type.Optional(Type.Integer()),
	limit: Type.Optional(Type.Integer()),
	asc: Type.Optional(Type.Boolean()),
});

export type ListUserGrantsBody = Static<typeof ListUserGrantsSchema>;

export const AddedUserGrantResponseSchema = Type.Object({
	grantId: Type.String(),
	details: ChangeDetailsSchema,
});

export const UserGrantResponseSchema = Type.Object({
	id: Type.String(),
	userId: Type.String(),
	projectId: Type.String(),
	projectGrantId: Type.Union([Type.String(), Type.Null()]),
	roleKeys: Type.Array(Type.String()),
	state: Type.String(),
	details: ChangeDetailsSchema,
	creationDate: Type.String({ format: 'date-time' }),
});

export const UserGrantListResponseSchema = Type.Object({
	grants: Type.Array(UserGrantResponseSchema),
	details: Type.Object({
		totalCount: Type.Integer(),
		latestSequence: Type.Integer(),
		latestTimestamp: NullableDateTime,
	}),
});

// ─── Identity providers ─────────────────────────────────────────────────────

export const ActiveProvidersSearchSchema = Type.Object({
	linkingAllowed: Type.Optional(Type.Boolean()),
	creationAllowed: Type.Optional(Type.Boolean()),
	autoCreation: Type.Optional(Type.Boolean()),
	autoLinking: Type.Optional(Type.Boolean()),
});

export type ActiveProvidersSearchBody = Static<typeof ActiveProvidersSearchSchema>;

export const ActiveProvidersResponseSchema = Type.Object({
	providers: Type.Array(
		Type.Object({
			id: Type.String(),
			name: Type.String(),
			type: Type.String(),
			options: Type.Object({
				linkingAllowed: Type.Boolean(),
				creationAllowed: Type.Boolean(),
				autoCreation: Type.Boolean(),
				autoLinking: Type.Boolean(),
			}),
		}),
	),
	details: Type.Object({
		totalCount: Type.Integer(),
		timestamp: NullableDateTime,
	}),
});
