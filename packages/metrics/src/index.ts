export { metrics, default } from './metrics.js';
export type { IngestionOutcome, CallOutcome } from './metrics.js';
