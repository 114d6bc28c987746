/**
 * Command Types
 *
 * Commands represent the input to write operations (mutations).
 * They are plain data objects that carry the intent and data for a use case.
 *
 * Conventions:
 * - Commands are named in imperative form: AddUserGrant, SetSecuritySettings
 * - Commands are immutable (readonly properties)
 * - Optional fields mean "not supplied"; `undefined` never means "clear"
 * - Commands do not contain validation logic (validation is in use cases)
 */

/**
 * Base marker interface for commands.
 */
export interface Command {
	/**
	 * Operation type identifier, recorded as the operation name in audit logs.
	 */
	readonly _type?: string;
}

/**
 * Create a command with an explicit type identifier.
 *
 * @example
 * ```typescript
 * const command = createCommand('RemoveUserGrant', { grantId });
 * // command._type === 'RemoveUserGrant'
 * ```
 */
export function createCommand<T extends Record<string, unknown>>(type: string, data: T): Command & T {
	return { _type: type, ...data };
}
