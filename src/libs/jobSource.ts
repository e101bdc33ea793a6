import axios, { type AxiosInstance, isAxiosError } from "axios";
import { z } from "zod";
import type { Job, JobStatus } from "../types/Job";
import type { JobSourceConfig } from "../types/WorkerConfig";
import { JobSourceError, toErrorMessage } from "../utils/errorUtil";

export type JobSource = {
  fetchAllJobs: () => Promise<Job[]>;
  updateJob: (uid: string, progress: number, status: JobStatus, timeEstimate: string) => Promise<void>;
  fetchJob?: (uid: string) => Promise<Job | null>;
};

export const jobStatusSchema = z.enum([
  "unassigned",
  "ready_to_start",
  "in_progress",
  "paused",
  "cancelled",
  "finished",
  "errored",
]);

// Coordinator records are snake_case; unknown fields are ignored.
// Only uid, worker and status can reject a record; display fields may be null.
export const rawJobSchema = z.object({
  uid: z.string().min(1),
  worker: z.string().default(""),
  status: jobStatusSchema,
  progress: z.coerce
    .number()
    .catch(0)
    .transform((n) => Math.min(100, Math.max(0, Math.round(n)))),
  time_estimate: z.string().nullish(),
  umap_path: z.string().default(""),
  useq_path: z.string().default(""),
  uconfig_path: z.string().default(""),
  name: z.string().nullish(),
  owner: z.string().nullish(),
  priority: z.number().nullish(),
  category: z.string().nullish(),
  time_created: z.string().nullish(),
});

export const toJob = (raw: z.output<typeof rawJobSchema>): Job => ({
  uid: raw.uid,
  worker: raw.worker,
  status: raw.status,
  progress: raw.progress,
  timeEstimate: raw.time_estimate ?? "",
  umapPath: raw.umap_path,
  useqPath: raw.useq_path,
  uconfigPath: raw.uconfig_path,
  name: raw.name ?? undefined,
  owner: raw.owner ?? undefined,
  priority: raw.priority ?? undefined,
  category: raw.category ?? undefined,
  timeCreated: raw.time_created ?? undefined,
});

export type ParsedJobs = {
  jobs: Job[];
  rejected: Array<{ index: number; uid?: string; reason: string }>;
};

export const parseJobList = (payload: unknown): ParsedJobs => {
  const envelope = z.object({ results: z.array(z.unknown()) }).safeParse(payload);
  if (!envelope.success) {
    throw new Error(`unexpected job list payload: ${envelope.error.issues[0]?.message ?? "invalid"}`);
  }

  const parsed: ParsedJobs = { jobs: [], rejected: [] };
  envelope.data.results.forEach((item, index) => {
    const result = rawJobSchema.safeParse(item);
    if (result.success) {
      parsed.jobs.push(toJob(result.data));
      return;
    }
    const uid = z.object({ uid: z.string() }).safeParse(item);
    parsed.rejected.push({
      index,
      uid: uid.success ? uid.data.uid : undefined,
      reason: result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; "),
    });
  });
  return parsed;
};

export type HttpJobSourceOptions = JobSourceConfig & {
  http?: AxiosInstance;
  onRejected?: (rejected: ParsedJobs["rejected"]) => void;
};

export class HttpJobSource implements JobSource {
  private readonly http: AxiosInstance;
  private readonly onRejected?: HttpJobSourceOptions["onRejected"];

  constructor(options: HttpJobSourceOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: options.baseUrl.replace(/\/+$/, ""),
        timeout: options.requestTimeoutMs,
        headers: { "Content-Type": "application/json" },
      });
    this.onRejected = options.onRejected;
  }

  async fetchAllJobs(): Promise<Job[]> {
    const data = await this.request("GET", "/get");
    const parsed = parseJobList(data);
    if (parsed.rejected.length > 0) this.onRejected?.(parsed.rejected);
    return parsed.jobs;
  }

  async fetchJob(uid: string): Promise<Job | null> {
    const data = await this.request("GET", `/get/${encodeURIComponent(uid)}`, undefined, [404]);
    if (data === null) return null;
    return toJob(rawJobSchema.parse(data));
  }

  async updateJob(uid: string, progress: number, status: JobStatus, timeEstimate: string): Promise<void> {
    await this.request("PUT", `/put/${encodeURIComponent(uid)}`, {
      progress,
      status,
      time_estimate: timeEstimate,
    });
  }

  private async request(
    method: "GET" | "PUT",
    url: string,
    body?: Record<string, unknown>,
    nullOnStatus: number[] = [],
  ): Promise<unknown> {
    try {
      const res = await this.http.request<unknown>({ method, url, data: body });
      return res.data;
    } catch (e) {
      if (isAxiosError(e)) {
        const status = e.response?.status;
        if (status !== undefined && nullOnStatus.includes(status)) return null;
        throw new JobSourceError(
          `${method} ${url} failed${status !== undefined ? ` (${status})` : ""}: ${e.message}`,
          method,
          url,
          status,
        );
      }
      throw new JobSourceError(`${method} ${url} failed: ${toErrorMessage(e)}`, method, url);
    }
  }
}
