/**
 * TypeBox schemas shared by route modules.
 */

import { Type, type Static } from '@sinclair/typebox';

export const ErrorResponseSchema = Type.Object({
	message: Type.String({ description: 'Human-readable error message' }),
	code: Type.String({ description: 'Machine-readable error code' }),
	details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
});

export type ErrorResponseType = Static<typeof ErrorResponseSchema>;

export const ChangeDetailsSchema = Type.Object({
	sequence: Type.Integer(),
	changeDate: Type.String({ format: 'date-time' }),
	resourceOwner: Type.String(),
});

export const NonEmptyString = Type.String({ minLength: 1 });

/**
 * Responses every authenticated route can produce.
 */
export const CommonErrorResponses = {
	400: ErrorResponseSchema,
	401: ErrorResponseSchema,
	403: ErrorResponseSchema,
	404: ErrorResponseSchema,
	409: ErrorResponseSchema,
	412: ErrorResponseSchema,
	500: ErrorResponseSchema,
	504: ErrorResponseSchema,
};

export { Type, type Static, type TSchema } from '@sinclair/typebox';
