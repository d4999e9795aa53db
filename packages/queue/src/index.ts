export { JobQueue } from "./job-queue.js";
export type { EnqueueInput, MarkFailedOptions, JobQueueOptions } from "./job-queue.js";
export type { JobStore, JobPatch, TransitionResult } from "./job-store.js";
export { emptyStatusCounts } from "./job-store.js";
export { DrizzleJobStore } from "./drizzle-job-store.js";
export { jobPayloadSchema, validateJobPayload, parseJobPayload, isJobKind } from "./payloads.js";
