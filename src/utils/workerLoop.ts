import { addActivityEvent, state } from "../libs/state";
import type { JobSource } from "../libs/jobSource";
import type { ExecutionOutcome } from "../types/ExecutionOutcome";
import type { Job, RenderRequest } from "../types/Job";
import {
  CLAIM_TIME_ESTIMATE,
  ERRORED_TIME_ESTIMATE,
  FINISHED_TIME_ESTIMATE,
  canTransition,
} from "./jobStateUtil";
import { toErrorMessage } from "./errorUtil";
import { describeOutcome } from "./renderDriver";
import { sleep } from "./sleepUtil";
import { getIsoTime } from "./timeUtil";

export type ExecuteJob = (request: RenderRequest) => Promise<ExecutionOutcome>;

export type WorkerLoopDeps = {
  workerName: string;
  jobSource: JobSource;
  execute: ExecuteJob;
  pollIntervalMs: number;
};

export type JobRunResult =
  | { jobId: string; status: "skipped"; reason: string }
  | { jobId: string; status: "finished"; outcome: ExecutionOutcome }
  | { jobId: string; status: "errored"; outcome: ExecutionOutcome };

export type PassSummary = {
  fetched: number;
  eligible: number;
  results: JobRunResult[];
  fetchError?: string;
};

export const selectEligibleJobs = (jobs: Job[], workerName: string): Job[] => {
  return jobs.filter((job) => job.worker === workerName && job.status === "ready_to_start");
};

const markErrored = async (jobSource: JobSource, jobId: string, detail: string) => {
  state.counters.errored += 1;
  addActivityEvent({ type: "job", action: "job_errored", detail: `${jobId} ${detail}`, jobId });
  console.error(`job ${jobId} errored: ${detail}`);

  try {
    await jobSource.updateJob(jobId, 0, "errored", ERRORED_TIME_ESTIMATE);
  } catch (e) {
    addActivityEvent({
      type: "job",
      action: "job_status_update_failed",
      detail: `${jobId} -> errored: ${toErrorMessage(e)}`,
      jobId,
    });
    console.error(`job ${jobId} could not be marked errored: ${toErrorMessage(e)}`);
  }
};

/**
 * Claims one job, runs it, and writes its terminal status. Never throws:
 * every failure ends as `errored` plus an activity event.
 */
export const processJob = async (job: Job, deps: WorkerLoopDeps): Promise<JobRunResult> => {
  const { jobSource, workerName } = deps;
  const jobId = job.uid;

  let current = job;
  if (jobSource.fetchJob) {
    try {
      const fresh = await jobSource.fetchJob(jobId);
      if (!fresh || fresh.worker !== workerName || fresh.status !== "ready_to_start") {
        const reason = fresh ? `now ${fresh.status} for ${fresh.worker || "(none)"}` : "no longer exists";
        addActivityEvent({ type: "job", action: "job_skipped", detail: `${jobId} ${reason}`, jobId });
        return { jobId, status: "skipped", reason };
      }
      current = fresh;
    } catch (e) {
      // the listing just returned this job; run it from that copy
      addActivityEvent({
        type: "job",
        action: "job_refresh_failed",
        detail: `${jobId} ${toErrorMessage(e)}`,
        jobId,
      });
    }
  }

  if (!canTransition(current.status, "in_progress")) {
    const reason = `cannot claim from ${current.status}`;
    addActivityEvent({ type: "job", action: "job_skipped", detail: `${jobId} ${reason}`, jobId });
    return { jobId, status: "skipped", reason };
  }

  state.currentJob = { uid: jobId, progress: 0, timeEstimate: CLAIM_TIME_ESTIMATE };
  try {
    let outcome: ExecutionOutcome;
    try {
      await jobSource.updateJob(jobId, 0, "in_progress", CLAIM_TIME_ESTIMATE);
      addActivityEvent({ type: "job", action: "job_claimed", detail: `${jobId} by ${workerName}`, jobId });
      console.error(`started rendering job ${jobId}`);

      outcome = await deps.execute({
        uid: jobId,
        umapPath: current.umapPath,
        useqPath: current.useqPath,
        uconfigPath: current.uconfigPath,
      });
    } catch (e) {
      outcome = { ok: false, kind: "unexpected", error: toErrorMessage(e) };
    }

    if ("result" in outcome && outcome.result) state.lastRun = outcome.result;

    if (!outcome.ok) {
      await markErrored(jobSource, jobId, describeOutcome(outcome));
      return { jobId, status: "errored", outcome };
    }

    try {
      await jobSource.updateJob(jobId, 100, "finished", FINISHED_TIME_ESTIMATE);
    } catch (e) {
      // the render succeeded but the coordinator never heard about it
      const failed: ExecutionOutcome = {
        ok: false,
        kind: "update_failed",
        error: toErrorMessage(e),
        result: outcome.result,
      };
      await markErrored(jobSource, jobId, describeOutcome(failed));
      return { jobId, status: "errored", outcome: failed };
    }

    state.counters.finished += 1;
    addActivityEvent({
      type: "job",
      action: "job_finished",
      detail: `${jobId} ${describeOutcome(outcome)}`,
      jobId,
    });
    console.error(`finished rendering job ${jobId}`);
    return { jobId, status: "finished", outcome };
  } finally {
    state.currentJob = null;
  }
};

export const runWorkerPass = async (deps: WorkerLoopDeps, signal?: AbortSignal): Promise<PassSummary> => {
  state.counters.passes += 1;

  let jobs: Job[];
  try {
    jobs = await deps.jobSource.fetchAllJobs();
  } catch (e) {
    const fetchError = toErrorMessage(e);
    addActivityEvent({ type: "worker", action: "jobs_poll_failed", detail: fetchError });
    console.error(`job poll failed: ${fetchError}`);
    return { fetched: 0, eligible: 0, results: [], fetchError };
  }

  const eligible = selectEligibleJobs(jobs, deps.workerName);
  addActivityEvent({
    type: "worker",
    action: "jobs_polled",
    detail: `fetched=${jobs.length} eligible=${eligible.length} worker=${deps.workerName}`,
  });

  const results: JobRunResult[] = [];
  for (const job of eligible) {
    if (signal?.aborted) break;
    results.push(await processJob(job, deps));
  }

  return { fetched: jobs.length, eligible: eligible.length, results };
};

export type WorkerLoopHandle = {
  stop: () => void;
  done: Promise<void>;
  signal: AbortSignal;
};

/**
 * Polls the job source until stopped. Stopping cuts the idle sleep short;
 * a job that is already rendering runs to completion first.
 */
export const startWorkerLoop = (deps: WorkerLoopDeps, externalSignal?: AbortSignal): WorkerLoopHandle => {
  const controller = new AbortController();
  const stop = () => controller.abort();
  if (externalSignal?.aborted) stop();
  externalSignal?.addEventListener("abort", stop, { once: true });

  state.workerName = deps.workerName;
  state.startedAt = getIsoTime();
  addActivityEvent({
    type: "system",
    action: "worker_loop_started",
    detail: `worker=${deps.workerName}, pollIntervalMs=${deps.pollIntervalMs}`,
  });

  const done = (async () => {
    try {
      while (!controller.signal.aborted) {
        const summary = await runWorkerPass(deps, controller.signal);
        if (summary.results.length > 0) {
          console.error("current job(s) finished, searching for new job(s)");
        }
        await sleep(deps.pollIntervalMs, controller.signal);
      }
    } finally {
      externalSignal?.removeEventListener("abort", stop);
      addActivityEvent({ type: "system", action: "worker_loop_stopped", detail: `worker=${deps.workerName}` });
    }
  })();

  return { stop, done, signal: controller.signal };
};
