export { createApiServer, type ApiServerOptions } from './server.js';
export { createTokenAuthenticator, loadTokenAuthenticator, CallerTokensSchema, type CallerTokens } from './authenticator.js';
export * from './routes/index.js';
