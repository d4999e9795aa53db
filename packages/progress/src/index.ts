export { ProgressTracker } from "./progress-tracker.js";
export type {
  CreateProgressInput,
  ProgressTrackerOptions,
  QueuePositionSource,
} from "./progress-tracker.js";
export type {
  ProgressStore,
  ProgressPatch,
  NewProgressRecord,
  InsertResult,
} from "./progress-store.js";
export { DrizzleProgressStore } from "./drizzle-progress-store.js";
