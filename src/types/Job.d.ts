export type JobStatus =
  | "unassigned"
  | "ready_to_start"
  | "in_progress"
  | "paused"
  | "cancelled"
  | "finished"
  | "errored";

export type Job = {
  uid: string;
  worker: string; // assigned worker identity, e.g. "RENDER_MACHINE_01"
  status: JobStatus;
  progress: number; // 0..100
  timeEstimate: string;
  umapPath: string;
  useqPath: string;
  uconfigPath: string;
  name?: string;
  owner?: string;
  priority?: number;
  category?: string;
  timeCreated?: string;
};

export type RenderRequest = Pick<Job, "uid" | "umapPath" | "useqPath" | "uconfigPath">;
