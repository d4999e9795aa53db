import type {
  BatchIngestionSummary,
  IngestionJob,
  JobKind,
  JobPayload,
  PayloadOf,
} from "@voicekb/types";
import type { IngestionJobProcessor } from "@voicekb/core";

/** One handler per job kind; adding a kind fails to compile until it is handled here. */
export type JobHandlers = {
  [K in JobKind]: (job: IngestionJob, payload: PayloadOf<K>) => Promise<BatchIngestionSummary>;
};

export function createJobHandlers(processor: IngestionJobProcessor): JobHandlers {
  return {
    file_processing: (job, payload) => processor.processFiles(job, payload),
    knowledge_base_processing: (job, payload) => processor.processKnowledgeBase(job, payload),
  };
}

export function dispatchJob(
  handlers: JobHandlers,
  job: IngestionJob,
  payload: JobPayload,
): Promise<BatchIngestionSummary> {
  switch (payload.kind) {
    case "file_processing":
      return handlers.file_processing(job, payload);
    case "knowledge_base_processing":
      return handlers.knowledge_base_processing(job, payload);
    default: {
      const unhandled: never = payload;
      throw new Error(`Unhandled job payload: ${JSON.stringify(unhandled)}`);
    }
  }
}
