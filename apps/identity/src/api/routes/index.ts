export { registerSecuritySettingsRoutes, type SecuritySettingsRoutesDeps } from './security-settings.js';
export { registerUserGrantsRoutes, type UserGrantsRoutesDeps } from './user-grants.js';
export { registerIdentityProvidersRoutes, type IdentityProvidersRoutesDeps } from './identity-providers.js';
