export { createLoggerDiagnosticsSink, createCollectingSink } from './sinks.js';
export type { CollectingSink } from './sinks.js';
