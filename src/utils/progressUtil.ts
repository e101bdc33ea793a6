export type ProgressSample = {
  progress: number;
  timeEstimate: string;
};

export type ProgressTracker = {
  sample: (nowMs: number) => ProgressSample;
};

/**
 * Produces progress samples for one running job. The default implementation
 * only looks at wall-clock time; a real render progress channel can replace
 * it without touching the worker loop.
 */
export type ProgressSource = {
  start: (startedAtMs: number) => ProgressTracker;
};

export const clampProgress = (value: number) => {
  if (!Number.isFinite(value)) return 0;
  return Math.min(100, Math.max(0, Math.floor(value)));
};

export const createElapsedTimeProgressSource = (baselineMs = 60_000): ProgressSource => ({
  start: (startedAtMs) => {
    let last = 0;
    return {
      sample: (nowMs) => {
        const elapsedMs = Math.max(0, nowMs - startedAtMs);
        const progress = Math.max(last, clampProgress((elapsedMs / baselineMs) * 100));
        last = progress;
        const remainingSec = Math.max(0, Math.floor((baselineMs - elapsedMs) / 1000));
        return { progress, timeEstimate: `${remainingSec}s` };
      },
    };
  },
});
