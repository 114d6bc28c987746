export * from './views.js';
export * from './projector.js';
export * from './queries.js';
