import fs from "fs/promises";
import { constants } from "fs";
import logger from "../utils/logger";
import { remoteUrl } from "../utils/sanitizer";
import { tempPathFor, writeTempFile } from "../utils/tempfile";
import {
  AgentError,
  IOError,
  errorMessage,
  toTransferError,
} from "../utils/errors";
import type {
  UploadHandle,
  UploadJob,
  UploadJobState,
  UploadResult,
} from "../models/upload.model";
import type { TransferAgent } from "./agent.service";
import type { EncryptionService } from "./encryption.service";
import type { ResultService } from "./result.service";

export interface UploaderOptions {
  baseUrl: string;
  tempFileLocation: string;
}

interface JobProgress {
  state: UploadJobState;
}

export class UploaderService {
  private activeJobs: Map<string, AbortController> = new Map();

  constructor(
    private readonly agent: TransferAgent,
    private readonly encryption: EncryptionService,
    private readonly results: ResultService,
    private readonly options: UploaderOptions,
  ) {}

  get activeJobCount(): number {
    return this.activeJobs.size;
  }

  /** Runs the whole pipeline and resolves once the agent has exited. */
  async upload(job: UploadJob): Promise<UploadResult> {
    const controller = this.register(job.id);
    return this.runPipeline(job, controller, { state: "resolving" });
  }

  /**
   * Schedules the same pipeline for the next turn of the event loop and
   * hands back a handle straight away.
   */
  uploadAsync(job: UploadJob): UploadHandle {
    const controller = this.register(job.id);
    const progress: JobProgress = { state: "resolving" };

    const result = new Promise<void>((resolve) => setImmediate(resolve)).then(() =>
      this.runPipeline(job, controller, progress),
    );

    logger.info(`Upload ${job.id} scheduled in background`, {
      remoteFileName: job.remoteFileName,
    });

    return {
      jobId: job.id,
      result,
      get state() {
        return progress.state;
      },
      cancel: () => controller.abort(),
    };
  }

  cancel(jobId: string): boolean {
    const controller = this.activeJobs.get(jobId);
    if (!controller) return false;
    controller.abort();
    return true;
  }

  cancelAll(): void {
    for (const controller of this.activeJobs.values()) {
      controller.abort();
    }
  }

  private register(jobId: string): AbortController {
    if (this.activeJobs.has(jobId)) {
      throw new Error(`Upload ${jobId} is already being processed`);
    }
    const controller = new AbortController();
    this.activeJobs.set(jobId, controller);
    return controller;
  }

  private async runPipeline(
    job: UploadJob,
    controller: AbortController,
    progress: JobProgress,
  ): Promise<UploadResult> {
    const { signal } = controller;
    let result: UploadResult;

    try {
      logger.debug(`Resolving source for ${job.id}`, { source: job.source.kind });
      let localPath = await this.resolveSource(job);
      this.throwIfCancelled(signal);

      if (job.encryption) {
        progress.state = "encrypting";
        logger.debug(`Encrypting ${job.id}`, {
          recipients: job.encryption.recipients.length,
        });
        const keys = await this.encryption.resolveRecipients(job.encryption.recipients);
        localPath = await this.encryption.encryptFile(
          localPath,
          tempPathFor(this.options.tempFileLocation, job.id, this.encryption.fileExtension),
          keys,
        );
        this.throwIfCancelled(signal);
      }

      progress.state = "uploading";
      const url = remoteUrl(this.options.baseUrl, job.remoteFileName);
      logger.info(`Starting upload for ${job.id}`, { url });

      const output = await this.agent.invoke(localPath, url, signal);

      progress.state = "completed";
      result = {
        ok: true,
        jobId: job.id,
        remoteFileName: job.remoteFileName,
        url: output,
        exitCode: 0,
      };
      logger.info(`Upload successful for ${job.id}`, { url: output });
    } catch (error) {
      progress.state = "failed";
      const failure = toTransferError(error);
      logger.error(`Upload failed for ${job.id}: ${errorMessage(error)}`, {
        kind: failure.kind,
      });
      result = {
        ok: false,
        jobId: job.id,
        remoteFileName: job.remoteFileName,
        error: failure,
        exitCode: failure instanceof AgentError ? failure.exitCode : undefined,
        output: failure instanceof AgentError ? failure.output : undefined,
      };
    } finally {
      this.activeJobs.delete(job.id);
    }

    this.results.record(result);
    return result;
  }

  private async resolveSource(job: UploadJob): Promise<string> {
    if (job.source.kind === "buffer") {
      return writeTempFile(tempPathFor(this.options.tempFileLocation, job.id), job.source.data);
    }

    const { path } = job.source;
    try {
      const stats = await fs.stat(path);
      if (!stats.isFile()) {
        throw new IOError("SourceUnreadable", `${path} is not a regular file`);
      }
      await fs.access(path, constants.R_OK);
    } catch (error) {
      if (error instanceof IOError) throw error;
      throw new IOError("SourceUnreadable", `Cannot read ${path}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
    return path;
  }

  private throwIfCancelled(signal: AbortSignal): void {
    if (signal.aborted) {
      throw new AgentError("Cancelled", "Upload cancelled");
    }
  }
}
