import { z } from "zod";
import { JOB_KINDS, type JobKind, type JobPayload } from "@voicekb/types";
import { UnsupportedJobError, ValidationError } from "@voicekb/errors";

const fileProcessingSchema = z.object({
  kind: z.literal("file_processing"),
  documentIds: z.array(z.string().min(1)),
});

const knowledgeSourceSchema = z.object({
  documentId: z.string().min(1),
  title: z.string(),
  text: z.string(),
});

const knowledgeBaseProcessingSchema = z.object({
  kind: z.literal("knowledge_base_processing"),
  sources: z.array(knowledgeSourceSchema),
});

export const jobPayloadSchema: z.ZodType<JobPayload> = z.discriminatedUnion("kind", [
  fileProcessingSchema,
  knowledgeBaseProcessingSchema,
]);

export function isJobKind(value: string): value is JobKind {
  return JOB_KINDS.some((kind) => kind === value);
}

function fieldErrors(error: z.ZodError): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const issue of error.issues) {
    fields[issue.path.join(".") || "payload"] = issue.message;
  }
  return fields;
}

/** Validate a payload before it is enqueued. */
export function validateJobPayload(payload: unknown): JobPayload {
  const parsed = jobPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError("Invalid job payload", fieldErrors(parsed.error));
  }
  return parsed.data;
}

/**
 * Read a stored job's payload back into the closed set of job kinds.
 * Rows that do not fit (unknown task type, stale or hand-edited payload)
 * raise UnsupportedJobError so the worker fails them instead of retrying.
 */
export function parseJobPayload(taskType: string, payload: unknown): JobPayload {
  if (!isJobKind(taskType)) {
    throw new UnsupportedJobError(taskType);
  }

  const parsed = jobPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new UnsupportedJobError(taskType, `Malformed ${taskType} payload`, {
      details: fieldErrors(parsed.error),
    });
  }
  if (parsed.data.kind !== taskType) {
    throw new UnsupportedJobError(
      taskType,
      `Payload kind ${parsed.data.kind} does not match task type ${taskType}`,
    );
  }
  return parsed.data;
}
