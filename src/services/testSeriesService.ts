/**
 * Test Series Service
 *
 * Dispatches a test series to the initializer and, when generation is
 * still running, polls the job record until it completes.
 *
 *   400                        -> already_generated
 *   200 { generating: true }   -> poll
 *   anything else              -> unexpected (raw body carried)
 *
 * A reply that is not an envelope at all is unexpected under its HTTP
 * status. Only a failed call is an error.
 *
 * Polling sleeps `intervalMs` before each read, at most `maxAttempts` reads.
 * Running out of attempts or an aborted signal yields `timeout`: the job
 * keeps running upstream and `checkStatus` can observe it later.
 */

import { TestSeriesGenerator } from "../clients/generators";
import { errorMessage } from "../domain/errors";
import {
  DispatchResult,
  InitializeReply,
  JobScope,
  JobStatus,
  TestSeriesRequest,
  generatingBodySchema,
  interpretJobRecord,
  jobScopeFor,
} from "../domain/generationJob";
import { GenerationJobStore } from "../stores/generationJobStore";
import { Sleep, sleep as defaultSleep } from "./sleep";

export interface PollingOptions {
  intervalMs: number;
  maxAttempts: number;
}

export const DEFAULT_POLLING: PollingOptions = {
  intervalMs: 3000,
  maxAttempts: 80,
};

export interface TestSeriesServiceDeps {
  generator: TestSeriesGenerator;
  jobStore: GenerationJobStore;
  polling?: PollingOptions;
  sleep?: Sleep;
}

export class TestSeriesService {
  private generator: TestSeriesGenerator;
  private jobStore: GenerationJobStore;
  private polling: PollingOptions;
  private sleep: Sleep;

  constructor(deps: TestSeriesServiceDeps) {
    this.generator = deps.generator;
    this.jobStore = deps.jobStore;
    this.polling = deps.polling ?? DEFAULT_POLLING;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  async dispatchAndPoll(
    request: TestSeriesRequest,
    options: { signal?: AbortSignal } = {}
  ): Promise<DispatchResult> {
    let reply: InitializeReply;
    try {
      reply = await this.generator.initialize(request);
    } catch (error) {
      console.error("[itp] Initialize failed:", errorMessage(error));
      return { kind: "error", jobId: null, detail: errorMessage(error) };
    }

    if ("unrecognized" in reply) {
      console.log(`[itp] Unrecognized initializer reply (HTTP ${reply.httpStatus})`);
      return { kind: "unexpected", statusCode: reply.httpStatus, raw: reply.raw };
    }

    if (reply.statusCode === 400) {
      return { kind: "already_generated", body: reply.body };
    }

    if (reply.statusCode === 200) {
      const generating = generatingBodySchema.safeParse(reply.body);
      if (generating.success) {
        return this.pollUntilDone(generating.data.id, jobScopeFor(request), options.signal);
      }
    }

    return { kind: "unexpected", statusCode: reply.statusCode, raw: reply.body };
  }

  /**
   * Single read of a job's state.
   */
  async checkStatus(jobId: string, scope: JobScope): Promise<JobStatus> {
    const record = await this.jobStore.get(jobId, scope);
    return interpretJobRecord(jobId, record);
  }

  private async pollUntilDone(
    jobId: string,
    scope: JobScope,
    signal?: AbortSignal
  ): Promise<DispatchResult> {
    const { intervalMs, maxAttempts } = this.polling;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const waited = await this.sleep(intervalMs, signal);
      if (!waited) {
        console.log(`[itp] Polling ${jobId} cancelled after ${attempt - 1} attempts`);
        return { kind: "timeout", jobId };
      }

      let status: JobStatus;
      try {
        status = await this.checkStatus(jobId, scope);
      } catch (error) {
        // A failed read counts as an attempt; the job itself is unaffected
        console.error(`[itp] Attempt ${attempt}/${maxAttempts} read failed:`, errorMessage(error));
        continue;
      }
      console.log(`[itp] Attempt ${attempt}/${maxAttempts}: ${status.state}`);

      switch (status.state) {
        case "generated":
          return { kind: "done", jobId, seriesTitle: status.seriesTitle };
        case "generating":
          break;
        case "malformed":
          return { kind: "error", jobId, detail: "Job record has no Generated flag" };
        case "not_found":
          return { kind: "error", jobId, detail: "Job record not found" };
      }
    }

    console.log(`[itp] ${jobId} still generating after ${maxAttempts} attempts`);
    return { kind: "timeout", jobId };
  }
}
