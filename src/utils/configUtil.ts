import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import YAML from "yaml";
import { z } from "zod";
import type { WorkerConfig } from "../types/WorkerConfig";
import { ConfigError, toErrorMessage } from "./errorUtil";

export const projectRoot = path.resolve(__dirname, "../..");

export const DEFAULT_ENGINE_ARGS = [
  // required
  "-game",
  "-MoviePipelineLocalExecutorClass=/Script/MovieRenderPipelineCore.MoviePipelinePythonHostExecutor",
  "-ExecutorPythonClass=/Engine/PythonTypes.MoviePipelineExampleRuntimeExecutor",
  // render preview
  "-windowed",
  "-resX=1280",
  "-resY=720",
  // logging
  "-StdOut",
  "-FullStdOutLogOutput",
];

export const parseBool = (v: string | undefined) => {
  if (!v) return false;
  return ["1", "true", "yes", "on"].includes(v.toLowerCase());
};

export const parsePositiveInt = (v: string | undefined, fallback: number) => {
  if (!v) return fallback;
  const parsed = Number.parseInt(v, 10);
  if (!Number.isFinite(parsed) || parsed < 1) return fallback;
  return parsed;
};

// 0 means "no limit"
export const parseNonNegativeInt = (v: string | undefined, fallback: number) => {
  if (!v) return fallback;
  const parsed = Number.parseInt(v, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
};

const workerDocSchema = z.object({
  workerName: z.string().min(1).default("RENDER_MACHINE_01"),
  engine: z
    .object({
      executable: z.string().default(""),
      projectPath: z.string().default(""),
      extraArgs: z.array(z.string()).default(DEFAULT_ENGINE_ARGS),
      moduleEnvVar: z.string().min(1).default("UE_PYTHONPATH"),
      moduleDir: z.string().optional(),
    })
    .default({}),
  jobSource: z
    .object({
      baseUrl: z.string().url().default("http://127.0.0.1:5000/api"),
      requestTimeoutMs: z.number().int().positive().default(10_000),
    })
    .default({}),
  pollIntervalMs: z.number().int().positive().default(10_000),
  heartbeatIntervalMs: z.number().int().positive().default(5_000),
  progressBaselineMs: z.number().int().positive().default(60_000),
  jobTimeoutMs: z.number().int().min(0).default(0),
  activityLogFile: z.string().nullable().default("logs/activity.ndjson"),
  mcp: z.boolean().default(false),
});

type WorkerDoc = z.output<typeof workerDocSchema>;

const existsFile = async (p: string) => {
  try {
    const s = await stat(p);
    return s.isFile();
  } catch {
    return false;
  }
};

const resolveAbs = (cwd: string, p: string) => (path.isAbsolute(p) ? p : path.resolve(cwd, p));

export const resolveWorkerConfigPath = async (cwd: string, filePath?: string) => {
  if (filePath && filePath.trim().length > 0) {
    return resolveAbs(cwd, filePath);
  }

  const workdirConfig = path.resolve(cwd, "settings/worker.yaml");
  if (await existsFile(workdirConfig)) return workdirConfig;

  const projectDefault = path.resolve(projectRoot, "settings/worker.yaml");
  if (await existsFile(projectDefault)) return projectDefault;

  return null;
};

const applyEnvOverrides = (doc: WorkerDoc, env: NodeJS.ProcessEnv): WorkerDoc => {
  const engine = { ...doc.engine };
  if (env.RENDER_WORKER_ENGINE_EXE) engine.executable = env.RENDER_WORKER_ENGINE_EXE;
  if (env.RENDER_WORKER_PROJECT) engine.projectPath = env.RENDER_WORKER_PROJECT;
  if (env.RENDER_WORKER_MODULE_DIR) engine.moduleDir = env.RENDER_WORKER_MODULE_DIR;

  const jobSource = { ...doc.jobSource };
  if (env.RENDER_WORKER_SOURCE_URL) jobSource.baseUrl = env.RENDER_WORKER_SOURCE_URL;

  return {
    ...doc,
    workerName: env.RENDER_WORKER_NAME || doc.workerName,
    engine,
    jobSource,
    pollIntervalMs: parsePositiveInt(env.RENDER_WORKER_POLL_INTERVAL_MS, doc.pollIntervalMs),
    heartbeatIntervalMs: parsePositiveInt(env.RENDER_WORKER_HEARTBEAT_INTERVAL_MS, doc.heartbeatIntervalMs),
    progressBaselineMs: parsePositiveInt(env.RENDER_WORKER_PROGRESS_BASELINE_MS, doc.progressBaselineMs),
    jobTimeoutMs: parseNonNegativeInt(env.RENDER_WORKER_JOB_TIMEOUT_MS, doc.jobTimeoutMs),
    activityLogFile:
      env.RENDER_WORKER_ACTIVITY_LOG_FILE !== undefined
        ? env.RENDER_WORKER_ACTIVITY_LOG_FILE || null
        : doc.activityLogFile,
    mcp: env.RENDER_WORKER_MCP !== undefined ? parseBool(env.RENDER_WORKER_MCP) : doc.mcp,
  };
};

const formatIssues = (error: z.ZodError) =>
  error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");

/**
 * Builds the worker configuration from a settings document plus environment
 * overrides. Relative paths resolve against `cwd`.
 */
export const buildWorkerConfig = (
  doc: unknown,
  cwd: string,
  env: NodeJS.ProcessEnv = process.env,
  source = "<inline>",
): WorkerConfig => {
  const fromFile = workerDocSchema.safeParse(doc ?? {});
  if (!fromFile.success) {
    throw new ConfigError(`${source}: invalid worker settings: ${formatIssues(fromFile.error)}`, source);
  }

  // env values are re-validated (e.g. a malformed RENDER_WORKER_SOURCE_URL)
  const parsed = workerDocSchema.safeParse(applyEnvOverrides(fromFile.data, env));
  if (!parsed.success) {
    throw new ConfigError(`${source}: invalid worker settings: ${formatIssues(parsed.error)}`, source);
  }

  const value = parsed.data;
  if (!value.engine.executable) {
    throw new ConfigError(`${source}: engine.executable is required (or RENDER_WORKER_ENGINE_EXE)`, source);
  }
  if (!value.engine.projectPath) {
    throw new ConfigError(`${source}: engine.projectPath is required (or RENDER_WORKER_PROJECT)`, source);
  }

  return {
    workerName: value.workerName,
    engine: {
      executable: value.engine.executable,
      projectPath: value.engine.projectPath,
      extraArgs: value.engine.extraArgs,
      moduleEnvVar: value.engine.moduleEnvVar,
      moduleDir: value.engine.moduleDir ? resolveAbs(cwd, value.engine.moduleDir) : projectRoot,
    },
    jobSource: value.jobSource,
    pollIntervalMs: value.pollIntervalMs,
    heartbeatIntervalMs: value.heartbeatIntervalMs,
    progressBaselineMs: value.progressBaselineMs,
    jobTimeoutMs: value.jobTimeoutMs,
    activityLogFile: value.activityLogFile ? resolveAbs(cwd, value.activityLogFile) : null,
    mcp: value.mcp,
  };
};

export const loadWorkerConfig = async (
  cwd: string,
  filePath?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<{ path: string | null; config: WorkerConfig }> => {
  const targetPath = await resolveWorkerConfigPath(cwd, filePath);
  if (!targetPath) {
    return { path: null, config: buildWorkerConfig({}, cwd, env, "environment") };
  }

  let doc: unknown;
  try {
    const text = await readFile(targetPath, "utf8");
    doc = YAML.parse(text);
  } catch (e) {
    throw new ConfigError(`${targetPath}: ${toErrorMessage(e)}`, targetPath);
  }

  return { path: targetPath, config: buildWorkerConfig(doc, cwd, env, targetPath) };
};
