export * from './user-grant/index.js';
export * from './security-settings/index.js';
export * from './identity-provider/index.js';
export * from './resource-lookup.js';
