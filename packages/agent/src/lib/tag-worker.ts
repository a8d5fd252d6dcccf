/**
 * TagWorker
 * Runs one tag job at a time, off the message path. A job waits for a tag
 * touch (stage "waiting") and then does its I/O (stage "io"). A new job
 * supersedes one that is still waiting; a job is never interrupted once
 * its I/O has started.
 */

import { RequestInProgressError, createLogger, toError, type Logger } from "@spooltag/shared";

import type { TagConnection, TagPlatform } from "./platform.js";

export type WorkerStage = "idle" | "waiting" | "io";

export interface TagJob {
  requestId: string;
  kind: "READ" | "WRITE";
  /** Called with the touched tag; the connection is closed afterwards. */
  run(tag: TagConnection): Promise<void>;
  /** Called when waiting or I/O fails. Not called for a superseded or cancelled job. */
  onError(error: Error): void;
}

export interface TagWorkerOptions {
  onTagDetected?: (uid: Uint8Array) => void;
  logger?: Logger;
}

interface ActiveJob {
  job: TagJob;
  stage: Exclude<WorkerStage, "idle">;
  controller: AbortController;
  done: Promise<void>;
}

export class TagWorker {
  private current: ActiveJob | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly platform: TagPlatform,
    private readonly options: TagWorkerOptions = {},
  ) {
    this.logger = options.logger ?? createLogger("agent:worker");
  }

  getStage(): WorkerStage {
    return this.current?.stage ?? "idle";
  }

  getCurrentRequestId(): string | null {
    return this.current?.job.requestId ?? null;
  }

  /**
   * Start `job`. Throws RequestInProgressError while another job is doing I/O.
   */
  submit(job: TagJob): void {
    const current = this.current;
    if (current?.stage === "io") {
      throw new RequestInProgressError(
        current.job.requestId,
        `Agent is busy with request ${current.job.requestId}`,
      );
    }
    if (current) {
      this.logger.info("Waiting job superseded", {
        requestId: current.job.requestId,
        by: job.requestId,
      });
      current.controller.abort();
    }

    const entry: ActiveJob = {
      job,
      stage: "waiting",
      controller: new AbortController(),
      done: Promise.resolve(),
    };
    this.current = entry;
    this.logger.info("Waiting for tag", { requestId: job.requestId, kind: job.kind });
    entry.done = this.execute(entry);
  }

  /**
   * Abandon the job for `requestId` if it is still waiting for a touch.
   */
  cancel(requestId: string): boolean {
    const current = this.current;
    if (!current || current.job.requestId !== requestId) {
      return false;
    }
    if (current.stage === "io") {
      this.logger.info("Cancel ignored: tag I/O in progress", { requestId });
      return false;
    }
    current.controller.abort();
    this.current = null;
    this.logger.info("Waiting job cancelled", { requestId });
    return true;
  }

  /** Resolves once the current job (if any) has finished. */
  async whenIdle(): Promise<void> {
    while (this.current) {
      await this.current.done;
    }
  }

  /** Abort a waiting job and wait for running I/O to finish. */
  async stop(): Promise<void> {
    const current = this.current;
    if (current?.stage === "waiting") {
      current.controller.abort();
      this.current = null;
    }
    await this.whenIdle();
  }

  private async execute(entry: ActiveJob): Promise<void> {
    const { job, controller } = entry;
    let tag: TagConnection;
    try {
      tag = await this.platform.waitForTag(controller.signal);
    } catch (err) {
      if (!controller.signal.aborted) {
        this.logger.warn("Waiting for tag failed", { requestId: job.requestId, error: toError(err).message });
        job.onError(toError(err));
      }
      this.release(entry);
      return;
    }

    if (controller.signal.aborted) {
      await this.closeTag(tag, job.requestId);
      this.release(entry);
      return;
    }

    entry.stage = "io";
    this.options.onTagDetected?.(tag.uid);
    try {
      await job.run(tag);
    } catch (err) {
      this.logger.warn("Tag operation failed", { requestId: job.requestId, error: toError(err).message });
      job.onError(toError(err));
    } finally {
      await this.closeTag(tag, job.requestId);
      this.release(entry);
    }
  }

  private async closeTag(tag: TagConnection, requestId: string): Promise<void> {
    try {
      await tag.close();
    } catch (err) {
      this.logger.debug("Failed to close tag connection", { requestId, error: toError(err).message });
    }
  }

  private release(entry: ActiveJob): void {
    if (this.current === entry) {
      this.current = null;
    }
  }
}
