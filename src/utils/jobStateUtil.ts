import type { JobStatus } from "../types/Job";

export const CLAIM_TIME_ESTIMATE = "Calculating...";
export const FINISHED_TIME_ESTIMATE = "N/A";
export const ERRORED_TIME_ESTIMATE = "0";

// Transitions this worker is allowed to write. Everything else belongs to the coordinator.
const transitions: Record<JobStatus, readonly JobStatus[]> = {
  unassigned: [],
  ready_to_start: ["in_progress"],
  in_progress: ["in_progress", "finished", "errored"],
  paused: [],
  cancelled: [],
  finished: [],
  errored: [],
};

export const canTransition = (from: JobStatus, to: JobStatus): boolean => {
  return transitions[from].includes(to);
};
