import type { ActivityEvent } from "../types/ActivityEvent";
import type { CommandResult } from "../types/CommandResult";
import type { Job } from "../types/Job";
import { appendActivityEvent } from "../utils/activityPersistence";
import { issueEventId } from "../utils/idUtil";
import { getIsoTime } from "../utils/timeUtil";

const ACTIVITY_LOG_LIMIT = 500;

type WorkerState = {
  workerName: string | null;
  startedAt: string | null;
  currentJob: Pick<Job, "uid" | "progress" | "timeEstimate"> | null;
  lastRun: CommandResult | null;
  counters: {
    passes: number;
    finished: number;
    errored: number;
  };
  activityLog: ActivityEvent[];
};

export const state: WorkerState = {
  workerName: null,
  startedAt: null,
  currentJob: null,
  lastRun: null,
  counters: { passes: 0, finished: 0, errored: 0 },
  activityLog: [],
};

export const resetState = () => {
  state.workerName = null;
  state.startedAt = null;
  state.currentJob = null;
  state.lastRun = null;
  state.counters = { passes: 0, finished: 0, errored: 0 };
  state.activityLog = [];
};

export const addActivityEvent = (event: Omit<ActivityEvent, "id" | "timestamp">) => {
  const recorded: ActivityEvent = {
    id: issueEventId("evt"),
    timestamp: getIsoTime(),
    ...event,
  };
  state.activityLog.push(recorded);
  if (state.activityLog.length > ACTIVITY_LOG_LIMIT) {
    state.activityLog.splice(0, state.activityLog.length - ACTIVITY_LOG_LIMIT);
  }
  void appendActivityEvent(recorded);
  return recorded;
};
