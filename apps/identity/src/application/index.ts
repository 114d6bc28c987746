/**
 * Application Layer
 */

export * from './user-grant/index.js';
export * from './security-settings/index.js';
export * from './dispatcher.js';
