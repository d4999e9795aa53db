import type {
  BatchIngestionSummary,
  DocumentFailure,
  DocumentStatusUpdate,
  FileProcessingPayload,
  IngestionJob,
  IngestOutcome,
  KnowledgeBaseProcessingPayload,
  PipelineStage,
  ProgressUpdate,
} from "@voicekb/types";
import type { ITextExtractor } from "@voicekb/parser";
import type { ProgressTracker } from "@voicekb/progress";
import type { BatchProgress } from "@voicekb/embeddings";
import type { Logger } from "@voicekb/logger";
import { JobExecutionError, errorMessage, isRetryable } from "@voicekb/errors";
import {
  ingestDocument,
  type IngestionDependencies,
  type IngestionReporter,
  type StageInfo,
} from "./ingestion-pipeline.js";
import type { DocumentRepository } from "./document-repository.js";
import { resolveDocumentText, type DocumentText } from "./document-text.js";

export interface JobProcessorDependencies {
  ingestion: IngestionDependencies;
  extractor: ITextExtractor;
  documents: DocumentRepository;
  tracker: ProgressTracker;
  logger?: Logger;
}

interface LoadedDocument {
  filename: string;
  text: DocumentText;
  /** False when there is no stored document to write the result back to. */
  writeBack: boolean;
}

interface DocumentWork {
  fileId: string;
  load(): Promise<LoadedDocument>;
}

function percentage(done: number, total: number): number {
  return total === 0 ? 100 : Math.round((done / total) * 10_000) / 100;
}

/** Forwards one document's pipeline progress into the tenant's progress record. */
class TrackerReporter implements IngestionReporter {
  private tracker: ProgressTracker;
  private tenantId: string;
  private index: number;
  private totalFiles: number;

  constructor(tracker: ProgressTracker, tenantId: string, index: number, totalFiles: number) {
    this.tracker = tracker;
    this.tenantId = tenantId;
    this.index = index;
    this.totalFiles = totalFiles;
  }

  async onStage(stage: PipelineStage, info: StageInfo): Promise<void> {
    if (stage === "embedding") {
      await this.tracker.update(this.tenantId, {
        stage: "embedding",
        currentBatch: 0,
        totalBatches: info.totalBatches,
        currentChunk: 0,
        totalChunks: info.chunkCount,
      });
    } else if (stage === "vector_storage") {
      await this.tracker.update(this.tenantId, { stage: "vector_storage" });
    }
  }

  async onBatchEmbedded(progress: BatchProgress): Promise<void> {
    await this.tracker.update(this.tenantId, {
      currentBatch: progress.batch,
      totalBatches: progress.totalBatches,
      currentChunk: progress.chunksDone,
      totalChunks: progress.totalChunks,
      progressPercentage: percentage(
        this.index + progress.chunksDone / progress.totalChunks,
        this.totalFiles,
      ),
      details: { batch: `${String(progress.batch)}/${String(progress.totalBatches)}` },
    });
  }
}

/**
 * Runs multi-document ingestion jobs. Documents are processed in payload
 * order and independently: one document's failure is recorded and the job
 * moves on to the next.
 *
 * - every document indexed: progress completed, job completes
 * - some indexed: progress completed with partialSuccess details, job completes
 * - none indexed: progress failed; the job throws JobExecutionError when a
 *   retry could help (a transient embedding or index error), else completes
 */
export class IngestionJobProcessor {
  private deps: JobProcessorDependencies;

  constructor(deps: JobProcessorDependencies) {
    this.deps = deps;
  }

  async processFiles(job: IngestionJob, payload: FileProcessingPayload): Promise<BatchIngestionSummary> {
    const work = payload.documentIds.map(
      (documentId): DocumentWork => ({
        fileId: documentId,
        load: async () => {
          const document = await this.deps.documents.findById(documentId);
          if (!document) {
            return {
              filename: documentId,
              writeBack: false,
              text: { success: false, reason: "not_found", error: `Document ${documentId} not found` },
            };
          }
          return {
            filename: document.filename,
            writeBack: true,
            text: await resolveDocumentText(this.deps.extractor, document),
          };
        },
      }),
    );
    return this.run(job, work);
  }

  async processKnowledgeBase(
    job: IngestionJob,
    payload: KnowledgeBaseProcessingPayload,
  ): Promise<BatchIngestionSummary> {
    const work = payload.sources.map(
      (source): DocumentWork => ({
        fileId: source.documentId,
        load: async () => ({
          filename: source.title || source.documentId,
          writeBack: true,
          text: { success: true, text: source.text, extraction: null },
        }),
      }),
    );
    return this.run(job, work);
  }

  private async run(job: IngestionJob, work: DocumentWork[]): Promise<BatchIngestionSummary> {
    const log = this.deps.logger?.child({
      jobId: job.id,
      tenantId: job.tenantId,
      namespaceId: job.namespaceId,
    });
    const totalFiles = work.length;

    await this.beginProgress(job, totalFiles);

    const failures: DocumentFailure[] = [];
    let processedCount = 0;

    for (const [index, item] of work.entries()) {
      await this.progress(job.tenantId, {
        stage: "text_extraction",
        currentFile: item.fileId,
        currentFileIndex: index + 1,
        currentBatch: 0,
        totalBatches: 0,
        currentChunk: 0,
        totalChunks: 0,
      });

      const { filename, outcome } = await this.processDocument(job, item, index, totalFiles);

      if (outcome.success) {
        processedCount += 1;
      } else {
        failures.push({
          fileId: item.fileId,
          filename,
          reason: outcome.reason,
          error: outcome.error,
          retryable: outcome.retryable,
        });
        log?.warn(
          { fileId: item.fileId, filename, stage: outcome.stage, reason: outcome.reason, error: outcome.error },
          "Document failed to process",
        );
      }

      await this.progress(job.tenantId, {
        stage: "file_processing",
        currentFile: filename,
        processedFiles: processedCount,
        failedFiles: failures.length,
        progressPercentage: percentage(index + 1, totalFiles),
        details: { lastFile: filename },
      });
    }

    const summary: BatchIngestionSummary = {
      totalFiles,
      processedCount,
      failedFiles: failures,
      successRate: totalFiles === 0 ? 1 : processedCount / totalFiles,
      credentialsMissing: failures.some((f) => f.reason === "credentials"),
    };

    await this.finishProgress(job, summary);

    if (summary.credentialsMissing) {
      log?.warn(
        { failedFiles: failures.length },
        "Embedding credentials are missing; knowledge base left unindexed",
      );
    }

    if (totalFiles > 0 && processedCount === 0 && failures.some((f) => f.retryable)) {
      const first = failures.find((f) => f.retryable);
      throw new JobExecutionError(
        `All ${String(totalFiles)} files failed to process${first ? `: ${first.error}` : ""}`,
        { jobId: job.id, details: { failedFiles: failures } },
      );
    }

    log?.info(
      { totalFiles, processedCount, failedCount: failures.length },
      "Ingestion job finished",
    );
    return summary;
  }

  private async processDocument(
    job: IngestionJob,
    item: DocumentWork,
    index: number,
    totalFiles: number,
  ): Promise<{ filename: string; outcome: IngestOutcome }> {
    let filename = item.fileId;
    let writeBack = false;
    let outcome: IngestOutcome;

    try {
      const loaded = await item.load();
      filename = loaded.filename;
      writeBack = loaded.writeBack;

      if (writeBack) {
        await this.writeBack(item.fileId, { status: "processing" });
      }
      await this.progress(job.tenantId, { currentFile: filename });

      if (loaded.text.success) {
        outcome = await ingestDocument(
          {
            text: loaded.text.text,
            fileId: item.fileId,
            filename,
            tenantId: job.tenantId,
            namespaceId: job.namespaceId,
          },
          this.deps.ingestion,
          new TrackerReporter(this.deps.tracker, job.tenantId, index, totalFiles),
        );
      } else {
        outcome = {
          success: false,
          stage: "extraction",
          fileId: item.fileId,
          namespaceId: job.namespaceId,
          reason: loaded.text.reason,
          error: loaded.text.error,
          retryable: false,
          chunksStored: 0,
          wordCount: 0,
        };
      }
    } catch (err) {
      outcome = {
        success: false,
        stage: "extraction",
        fileId: item.fileId,
        namespaceId: job.namespaceId,
        reason: "unexpected",
        error: errorMessage(err),
        retryable: isRetryable(err),
        chunksStored: 0,
        wordCount: 0,
      };
    }

    if (writeBack) {
      await this.writeBack(
        item.fileId,
        outcome.success
          ? { status: "completed", wordCount: outcome.wordCount, chunkCount: outcome.chunksStored }
          : { status: "failed", error: outcome.error, wordCount: outcome.wordCount },
      );
    }
    return { filename, outcome };
  }

  /**
   * Take over the record the scheduler created for this job, or start one.
   * A record left active by an earlier attempt of the same job is replaced.
   */
  private async beginProgress(job: IngestionJob, totalFiles: number): Promise<void> {
    const { tracker } = this.deps;
    const existing = await tracker.get(job.tenantId);
    const active =
      existing !== null && (existing.status === "pending" || existing.status === "in_progress");

    if (active && existing.taskId === job.id) {
      if (existing.stage === "queued") {
        await tracker.update(job.tenantId, {
          stage: "file_processing",
          status: "in_progress",
          queuePosition: null,
          totalFiles,
        });
        return;
      }
      await tracker.delete(job.tenantId);
    }

    await tracker.create({
      tenantId: job.tenantId,
      namespaceId: job.namespaceId,
      totalFiles,
      taskId: job.id,
    });
  }

  private async finishProgress(job: IngestionJob, summary: BatchIngestionSummary): Promise<void> {
    const { tracker } = this.deps;
    const failedNames = summary.failedFiles.map((f) => f.filename);

    try {
      if (summary.failedFiles.length === 0) {
        await tracker.markCompleted(job.tenantId, {
          processedCount: summary.processedCount,
          totalFiles: summary.totalFiles,
          successRate: summary.successRate,
        });
      } else if (summary.processedCount > 0) {
        await tracker.update(job.tenantId, {
          status: "completed",
          stage: "complete",
          processedFiles: summary.processedCount,
          failedFiles: summary.failedFiles.length,
          details: { partialSuccess: true, failedFiles: failedNames },
        });
      } else {
        await tracker.markFailed(job.tenantId, "All files failed to process", {
          failedFiles: failedNames,
          credentialsMissing: summary.credentialsMissing,
        });
      }
    } catch (err) {
      this.deps.logger?.warn({ err, jobId: job.id }, "Failed to record final progress");
    }
  }

  /** Progress is telemetry: a failed write is logged and processing goes on. */
  private async progress(tenantId: string, fields: ProgressUpdate): Promise<void> {
    try {
      await this.deps.tracker.update(tenantId, fields);
    } catch (err) {
      this.deps.logger?.warn({ err, tenantId }, "Progress update failed");
    }
  }

  private async writeBack(documentId: string, update: DocumentStatusUpdate): Promise<void> {
    try {
      await this.deps.documents.updateStatus(documentId, update);
    } catch (err) {
      this.deps.logger?.error(
        { err, documentId, status: update.status },
        "Failed to write document processing status",
      );
    }
  }
}
