export { HandoffQueue } from './handoff-queue.js';
export type { HandoffQueueOptions, CompleteOptions } from './handoff-queue.js';
export { PowerQueryService, parseDueDate, endOfUtcDay } from './power-query-service.js';
export {
  HANDOFF_BUCKETS,
  planClaim,
  planComplete,
  mapBuckets,
  matchesBucket,
  stateOfBucket,
} from './handoff-state.js';
export type { HandoffBucket, ItemSnapshot, TransitionResult } from './handoff-state.js';
export { descriptionMarkers, sameClaim, normalizeSessionId } from './markers.js';
export type { MarkerCodec, MarkerState } from './markers.js';
