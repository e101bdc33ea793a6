export type EngineConfig = {
  executable: string;
  projectPath: string;
  extraArgs: string[];
  moduleEnvVar: string;
  moduleDir: string;
};

export type JobSourceConfig = {
  baseUrl: string;
  requestTimeoutMs: number;
};

export type WorkerConfig = {
  workerName: string;
  engine: EngineConfig;
  jobSource: JobSourceConfig;
  pollIntervalMs: number;
  heartbeatIntervalMs: number;
  progressBaselineMs: number;
  jobTimeoutMs: number; // 0 disables the timeout
  activityLogFile: string | null;
  mcp: boolean;
};
