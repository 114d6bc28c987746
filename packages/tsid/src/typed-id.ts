/**
 * TypedId - Prefixed ID Utilities
 *
 * IDs are stored WITH their prefix:
 * - Format: "{prefix}_{tsid}" (e.g., "ugr_0HZXEQ5Y8JY5Z")
 * - Total length: 17 characters (3-char prefix + underscore + 13-char TSID)
 *
 * The prefix tells an operator which aggregate or record an ID belongs to
 * when it shows up in logs, events or audit records.
 */

import { isValid, generate as generateRawTsid } from './tsid.js';

/**
 * Entity types with their 3-character ID prefixes.
 */
export const EntityType = {
	USER_GRANT: 'ugr',

	// Persistence
	EVENT: 'evn',
	AUDIT_LOG: 'aud',
} as const;

export const SEPARATOR = '_';

export type EntityTypeKey = keyof typeof EntityType;
export type EntityTypePrefix = (typeof EntityType)[EntityTypeKey];

const PREFIX_TO_TYPE = new Map<string, EntityTypeKey>();
for (const key of Object.keys(EntityType)) {
	if (isEntityTypeKey(key)) {
		PREFIX_TO_TYPE.set(EntityType[key], key);
	}
}

function isEntityTypeKey(key: string): key is EntityTypeKey {
	return Object.hasOwn(EntityType, key);
}

/**
 * Generate a new typed ID with the given entity type prefix.
 *
 * @example generate('USER_GRANT') // "ugr_0HZXEQ5Y8JY5Z"
 */
export function generate(type: EntityTypeKey): string {
	return `${EntityType[type]}${SEPARATOR}${generateRawTsid()}`;
}

export type TypedIdErrorReason =
	| 'empty' // blank input
	| 'missing_separator' // no underscore
	| 'unknown_prefix' // unrecognized prefix
	| 'type_mismatch' // wrong entity type
	| 'invalid_tsid'; // TSID part malformed

/**
 * Thrown when an ID does not have the expected typed format.
 */
export class TypedIdError extends Error {
	constructor(
		message: string,
		public readonly reason: TypedIdErrorReason,
		public readonly expectedType: EntityTypeKey,
		public readonly id: string,
	) {
		super(message);
		this.name = 'TypedIdError';
	}
}

/**
 * Validate that an ID has the correct format and entity type.
 *
 * @throws TypedIdError if the ID is malformed or of another type
 */
export function validate(type: EntityTypeKey, id: string): void {
	if (id.trim() === '') {
		throw new TypedIdError('ID cannot be blank', 'empty', type, id);
	}

	const separatorIndex = id.indexOf(SEPARATOR);
	if (separatorIndex === -1) {
		throw new TypedIdError(
			`Invalid ID format: expected '${EntityType[type]}_<id>' but got '${id}'`,
			'missing_separator',
			type,
			id,
		);
	}

	const prefix = id.slice(0, separatorIndex);
	const actualType = PREFIX_TO_TYPE.get(prefix);
	if (actualType === undefined) {
		throw new TypedIdError(`Unknown ID prefix '${prefix}'`, 'unknown_prefix', type, id);
	}
	if (actualType !== type) {
		throw new TypedIdError(
			`ID type mismatch. Expected '${EntityType[type]}' but got '${prefix}'`,
			'type_mismatch',
			type,
			id,
		);
	}

	if (!isValid(id.slice(separatorIndex + 1))) {
		throw new TypedIdError(`Invalid TSID format in ID '${id}'`, 'invalid_tsid', type, id);
	}
}

/**
 * Non-throwing form of {@link validate}.
 */
export function isValidTypedId(type: EntityTypeKey, id: string): boolean {
	try {
		validate(type, id);
		return true;
	} catch (error) {
		if (error instanceof TypedIdError) {
			return false;
		}
		throw error;
	}
}

/**
 * Entity type of a prefix, or null when the prefix is unknown.
 */
export function getTypeFromPrefix(prefix: string): EntityTypeKey | null {
	return PREFIX_TO_TYPE.get(prefix) ?? null;
}
