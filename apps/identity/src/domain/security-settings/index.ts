export * from './security-settings.js';
export * from './events.js';
export { securitySettingsHandler } from './handler.js';
