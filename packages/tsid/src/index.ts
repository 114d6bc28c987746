/**
 * @castellan/tsid
 *
 * TSID (Time-Sorted ID) generation and typed ID utilities.
 *
 * @example
 * ```typescript
 * import { generate, validate } from '@castellan/tsid';
 *
 * const id = generate('USER_GRANT'); // "ugr_0HZXEQ5Y8JY5Z"
 * validate('USER_GRANT', id);
 * ```
 */

export { generate as generateRaw, isValid, getTimestamp } from './tsid.js';

export {
	EntityType,
	SEPARATOR,
	type EntityTypeKey,
	type EntityTypePrefix,
	type TypedIdErrorReason,
	TypedIdError,
	generate,
	validate,
	isValidTypedId,
	getTypeFromPrefix,
} from './typed-id.js';
