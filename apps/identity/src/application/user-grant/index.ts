export type { AddUserGrantCommand } from './add-user-grant/command.js';
export { createAddUserGrantUseCase, type AddUserGrantUseCaseDeps } from './add-user-grant/use-case.js';
export type { UpdateUserGrantCommand } from './update-user-grant/command.js';
export { createUpdateUserGrantUseCase, type UpdateUserGrantUseCaseDeps } from './update-user-grant/use-case.js';
export type { DeactivateUserGrantCommand } from './deactivate-user-grant/command.js';
export {
	createDeactivateUserGrantUseCase,
	type DeactivateUserGrantUseCaseDeps,
} from './deactivate-user-grant/use-case.js';
export type { ReactivateUserGrantCommand } from './reactivate-user-grant/command.js';
export {
	createReactivateUserGrantUseCase,
	type ReactivateUserGrantUseCaseDeps,
} from './reactivate-user-grant/use-case.js';
export type { RemoveUserGrantCommand } from './remove-user-grant/command.js';
export { createRemoveUserGrantUseCase, type RemoveUserGrantUseCaseDeps } from './remove-user-grant/use-case.js';
export { type ResolvedTarget, grantTargetFrom, resolveGrantTarget } from './grant-target.js';
export type { BulkRemoveUserGrantsCommand } from './bulk-remove-user-grants/command.js';
export {
	createBulkRemoveUserGrants,
	type BulkRemoveUserGrants,
	type BulkRemoveUserGrantsDeps,
} from './bulk-remove-user-grants/use-case.js';
