export { tracingPlugin, requireTracing, headerValue } from './tracing.js';
export { callerContextPlugin, requireExecutionContext } from './caller-context.js';
