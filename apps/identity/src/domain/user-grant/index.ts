export * from './user-grant.js';
export * from './events.js';
export { userGrantHandler } from './handler.js';
