import { describe, it, expect, beforeEach, vi, type Mock } from "vitest";
import { JobQueue } from "@voicekb/queue";
import { InMemoryJobStore } from "@voicekb/queue/testing";
import { JobExecutionError } from "@voicekb/errors";
import type { BatchIngestionSummary } from "@voicekb/types";
import type { JobHandlers } from "./processors/index.js";
import { QueueWorker } from "./queue-worker.js";

const summary: BatchIngestionSummary = {
  totalFiles: 1,
  processedCount: 1,
  failedFiles: [],
  successRate: 1,
  credentialsMissing: false,
};

describe("QueueWorker", () => {
  let store: InMemoryJobStore;
  let queue: JobQueue;
  let handlers: {
    file_processing: Mock<JobHandlers["file_processing"]>;
    knowledge_base_processing: Mock<JobHandlers["knowledge_base_processing"]>;
  };
  let worker: QueueWorker;

  beforeEach(() => {
    store = new InMemoryJobStore();
    queue = new JobQueue(store);
    handlers = {
      file_processing: vi.fn<JobHandlers["file_processing"]>().mockResolvedValue(summary),
      knowledge_base_processing: vi
        .fn<JobHandlers["knowledge_base_processing"]>()
        .mockResolvedValue(summary),
    };
    worker = new QueueWorker(queue, handlers, { pollIntervalMs: 5 });
  });

  async function enqueueFiles(tenantId: string, ...documentIds: string[]): Promise<string> {
    const job = await queue.enqueue({
      tenantId,
      namespaceId: `agent-${tenantId}`,
      payload: { kind: "file_processing", documentIds },
    });
    return job.id;
  }

  it("reports an empty queue", async () => {
    expect(await worker.runOnce()).toBe(false);
  });

  it("dispatches by job kind and completes the job", async () => {
    const fileJob = await enqueueFiles("t1", "doc-1");
    const kbJob = await queue.enqueue({
      tenantId: "t2",
      namespaceId: "agent-t2",
      payload: { kind: "knowledge_base_processing", sources: [] },
    });

    expect(await worker.runOnce()).toBe(true);
    expect(handlers.file_processing).toHaveBeenCalledWith(
      expect.objectContaining({ id: fileJob, status: "processing" }),
      { kind: "file_processing", documentIds: ["doc-1"] },
    );
    expect((await queue.getJob(fileJob))?.status).toBe("completed");
    expect(await queue.getQueuePosition(kbJob.id)).toBe(1);

    await worker.runOnce();
    expect(handlers.knowledge_base_processing).toHaveBeenCalledTimes(1);
    expect((await queue.getJob(kbJob.id))?.status).toBe("completed");
  });

  it("re-queues a job whose handler throws", async () => {
    const jobId = await enqueueFiles("t1", "doc-1");
    handlers.file_processing.mockRejectedValueOnce(new Error("socket hang up"));

    await worker.runOnce();

    expect(await queue.getJob(jobId)).toMatchObject({
      status: "queued",
      retryCount: 1,
      errorMessage: "socket hang up",
      queuePosition: 1,
    });
  });

  it("fails the job after its last retry", async () => {
    const jobId = await enqueueFiles("t1", "doc-1");
    handlers.file_processing.mockRejectedValue(new JobExecutionError("All 1 files failed to process"));

    await worker.runOnce();
    await worker.runOnce();
    await worker.runOnce();

    expect(await queue.getJob(jobId)).toMatchObject({ status: "failed", retryCount: 3 });
    expect(await worker.runOnce()).toBe(false);
  });

  it("fails a job whose payload does not match its task type without retrying", async () => {
    await store.insert({
      id: "bad-job",
      tenantId: "t1",
      namespaceId: "agent-t1",
      taskType: "knowledge_base_processing",
      priority: 0,
      payload: { kind: "file_processing", documentIds: ["doc-1"] },
      maxRetries: 3,
      createdAt: new Date("2026-01-01T00:00:00.000Z"),
    });

    await worker.runOnce();

    expect(await queue.getJob("bad-job")).toMatchObject({
      status: "failed",
      retryCount: 1,
      errorMessage:
        "Payload kind file_processing does not match task type knowledge_base_processing",
    });
    expect(handlers.file_processing).not.toHaveBeenCalled();
    expect(handlers.knowledge_base_processing).not.toHaveBeenCalled();
  });

  it("completes the job when documents failed only for missing credentials", async () => {
    const jobId = await enqueueFiles("t1", "doc-1");
    handlers.file_processing.mockResolvedValueOnce({
      ...summary,
      processedCount: 0,
      successRate: 0,
      credentialsMissing: true,
      failedFiles: [
        {
          fileId: "doc-1",
          filename: "doc-1.txt",
          reason: "credentials",
          error: "openai credentials are missing or invalid",
          retryable: false,
        },
      ],
    });

    await worker.runOnce();

    expect((await queue.getJob(jobId))?.status).toBe("completed");
  });

  it("keeps polling after a failed job and stops cleanly", async () => {
    const first = await enqueueFiles("t1", "doc-1");
    const second = await enqueueFiles("t2", "doc-2");
    handlers.file_processing.mockRejectedValueOnce(new Error("boom"));

    worker.start();
    worker.start();
    expect(worker.getStatus()).toEqual({ running: true, currentJobId: null, pollIntervalMs: 5 });

    await vi.waitFor(async () => {
      expect((await queue.getJob(second))?.status).toBe("completed");
      expect((await queue.getJob(first))?.status).toBe("completed");
    });
    await worker.stop();

    expect(handlers.file_processing).toHaveBeenCalledTimes(3);
    expect(worker.getStatus().running).toBe(false);
  });
});
