import type { RenderRequest } from "../types/Job";
import type { EngineConfig } from "../types/WorkerConfig";
import type { ExecutionOutcome } from "../types/ExecutionOutcome";
import type { JobSource } from "../libs/jobSource";
import { addActivityEvent, state } from "../libs/state";
import { toErrorMessage } from "./errorUtil";
import { createElapsedTimeProgressSource, type ProgressSource } from "./progressUtil";
import { startProcess, type ProcessLauncher } from "./shellUtil";
import type { ExecuteJob } from "./workerLoop";

export type RenderDriverDeps = {
  engine: EngineConfig;
  jobSource: Pick<JobSource, "updateJob">;
  heartbeatIntervalMs: number;
  timeoutMs?: number;
  progressSource?: ProgressSource;
  launcher?: ProcessLauncher;
  now?: () => number;
  onHeartbeat?: (uid: string, progress: number, timeEstimate: string) => void;
};

export const buildRenderArgs = (request: RenderRequest, engine: EngineConfig): string[] => {
  return [
    engine.projectPath,
    request.umapPath,
    `-JobId=${request.uid}`,
    `-LevelSequence=${request.useqPath}`,
    `-MoviePipelineConfig=${request.uconfigPath}`,
    ...engine.extraArgs,
  ];
};

export const buildRenderEnv = (engine: EngineConfig): NodeJS.ProcessEnv => {
  return { [engine.moduleEnvVar]: engine.moduleDir };
};

const waitFor = (ms: number, until: Promise<unknown>) => {
  let timer: NodeJS.Timeout | undefined;
  const tick = new Promise<void>((resolve) => {
    timer = setTimeout(resolve, ms);
  });
  return Promise.race([tick, until.then(() => undefined)]).finally(() => clearTimeout(timer));
};

/**
 * Runs the render engine for one job and blocks until it exits.
 *
 * While the process is alive a heartbeat is written to the job source every
 * `heartbeatIntervalMs`, starting right after spawn. Heartbeats are awaited one
 * at a time, so the caller's terminal write can never race a heartbeat.
 * A failed heartbeat write terminates the render.
 */
export const runRenderJob = async (
  request: RenderRequest,
  deps: RenderDriverDeps,
): Promise<ExecutionOutcome> => {
  const now = deps.now ?? Date.now;
  const progressSource = deps.progressSource ?? createElapsedTimeProgressSource();

  try {
    const handle = startProcess(deps.engine.executable, buildRenderArgs(request, deps.engine), {
      env: buildRenderEnv(deps.engine),
      timeoutMs: deps.timeoutMs,
      launcher: deps.launcher,
    });
    if (!(await handle.spawned)) {
      const exit = await handle.exited;
      const error = exit.spawned ? "process exited during spawn" : exit.error;
      return { ok: false, kind: "spawn_failed", error };
    }
    const tracker = progressSource.start(now());

    let updateError: string | null = null;
    while (handle.isRunning()) {
      const { progress, timeEstimate } = tracker.sample(now());
      try {
        await deps.jobSource.updateJob(request.uid, progress, "in_progress", timeEstimate);
        deps.onHeartbeat?.(request.uid, progress, timeEstimate);
      } catch (e) {
        updateError = toErrorMessage(e);
        handle.terminate(`heartbeat update failed: ${updateError}`);
        break;
      }
      await waitFor(deps.heartbeatIntervalMs, handle.exited);
    }

    const exit = await handle.exited;
    if (!exit.spawned) {
      return { ok: false, kind: "spawn_failed", error: exit.error };
    }
    if (updateError !== null) {
      return { ok: false, kind: "update_failed", error: updateError, result: exit.result };
    }
    if (exit.result.timedOut) {
      return { ok: false, kind: "timed_out", result: exit.result };
    }
    if (exit.result.exitCode !== 0) {
      return { ok: false, kind: "exit_nonzero", result: exit.result };
    }
    return { ok: true, kind: "succeeded", result: exit.result };
  } catch (e) {
    return { ok: false, kind: "unexpected", error: toErrorMessage(e) };
  }
};

export const describeOutcome = (outcome: ExecutionOutcome): string => {
  switch (outcome.kind) {
    case "succeeded":
      return `exit=0 duration=${outcome.result.durationMs}ms`;
    case "spawn_failed":
      return `spawn failed: ${outcome.error}`;
    case "exit_nonzero":
      return `exit=${String(outcome.result.exitCode)} signal=${String(outcome.result.signal)} stderr=${tail(outcome.result.stderr)}`;
    case "timed_out":
      return `timed out after ${outcome.result.durationMs}ms`;
    case "update_failed":
      return `status update failed: ${outcome.error}`;
    case "unexpected":
      return `unexpected error: ${outcome.error}`;
  }
};

const tail = (text: string, max = 500) => {
  const trimmed = text.trim();
  return trimmed.length > max ? `...${trimmed.slice(trimmed.length - max)}` : trimmed;
};

export const recordHeartbeat = (uid: string, progress: number, timeEstimate: string) => {
  if (state.currentJob?.uid === uid) {
    state.currentJob.progress = progress;
    state.currentJob.timeEstimate = timeEstimate;
  }
  addActivityEvent({
    type: "job",
    action: "job_heartbeat",
    detail: `${uid} progress=${progress} eta=${timeEstimate}`,
    jobId: uid,
  });
};

export const createRenderExecutor = (deps: RenderDriverDeps): ExecuteJob => {
  return (request) => runRenderJob(request, { onHeartbeat: recordHeartbeat, ...deps });
};
