export * from './identity-provider.js';
export * from './filter.js';
export * from './events.js';
