export * from './aggregate-handlers.js';
export * from './repositories.js';
export * from './resource-directory.js';
export * from './provider-events.js';
