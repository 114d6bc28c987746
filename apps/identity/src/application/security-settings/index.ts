export type { SetSecuritySettingsCommand } from './set-security-settings/command.js';
export {
	createSetSecuritySettingsUseCase,
	type SetSecuritySettingsOutcome,
	type SetSecuritySettingsUseCase,
	type SetSecuritySettingsUseCaseDeps,
} from './set-security-settings/use-case.js';
