export type ActivityEventType = "job" | "worker" | "system";

export type ActivityEvent = {
  id: string;
  timestamp: string;
  type: ActivityEventType;
  action: string;
  detail: string;
  jobId?: string;
};
