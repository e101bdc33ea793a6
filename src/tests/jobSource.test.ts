import axios, { AxiosError, type AxiosAdapter, type InternalAxiosRequestConfig } from "axios";
import { describe, expect, it, vi } from "vitest";
import { HttpJobSource, parseJobList } from "../libs/jobSource";

type Reply = { status: number; data: unknown };

const stubHttp = (reply: (config: InternalAxiosRequestConfig) => Reply) => {
  const requests: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    requests.push(config);
    const { status, data } = reply(config);
    const response = { data, status, statusText: String(status), headers: {}, config };
    if (status >= 400) {
      throw new AxiosError(`Request failed with status code ${status}`, "ERR_BAD_RESPONSE", config, null, response);
    }
    return response;
  };
  return { http: axios.create({ adapter }), requests };
};

const rawJob = {
  uid: "J1",
  worker: "RENDER_MACHINE_01",
  status: "ready_to_start",
  progress: 0,
  time_estimate: "",
  umap_path: "/Game/Maps/Demo",
  useq_path: "/Game/Sequences/Intro",
  uconfig_path: "/Game/Configs/Preview",
  name: "intro shot",
  priority: 50,
};

const options = { baseUrl: "http://127.0.0.1:5000/api", requestTimeoutMs: 1_000 };

describe("HttpJobSource", () => {
  it("lists jobs from GET /get and maps them to camelCase", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: { results: [rawJob] } }));
    const source = new HttpJobSource({ ...options, http });

    const jobs = await source.fetchAllJobs();

    expect(requests[0].method).toBe("get");
    expect(requests[0].url).toBe("/get");
    expect(jobs).toEqual([
      {
        uid: "J1",
        worker: "RENDER_MACHINE_01",
        status: "ready_to_start",
        progress: 0,
        timeEstimate: "",
        umapPath: "/Game/Maps/Demo",
        useqPath: "/Game/Sequences/Intro",
        uconfigPath: "/Game/Configs/Preview",
        name: "intro shot",
        owner: undefined,
        priority: 50,
        category: undefined,
        timeCreated: undefined,
      },
    ]);
  });

  it("drops malformed records and reports them", async () => {
    const onRejected = vi.fn();
    const { http } = stubHttp(() => ({
      status: 200,
      data: { results: [rawJob, { uid: "J9", status: "exploded" }, { ...rawJob, uid: "J2", progress: "40" }] },
    }));
    const source = new HttpJobSource({ ...options, http, onRejected });

    const jobs = await source.fetchAllJobs();

    expect(jobs.map((j) => [j.uid, j.progress])).toEqual([
      ["J1", 0],
      ["J2", 40],
    ]);
    expect(onRejected).toHaveBeenCalledTimes(1);
    const [rejected] = onRejected.mock.calls[0];
    expect(rejected).toHaveLength(1);
    expect(rejected[0]).toMatchObject({ index: 1, uid: "J9" });
    expect(rejected[0].reason).toMatch(/^status: /);
  });

  it("sends status updates as PUT /put/:uid with snake_case fields", async () => {
    const { http, requests } = stubHttp(() => ({ status: 200, data: {} }));
    const source = new HttpJobSource({ ...options, http });

    await source.updateJob("J1", 25, "in_progress", "45s");

    expect(requests[0].method).toBe("put");
    expect(requests[0].url).toBe("/put/J1");
    expect(JSON.parse(String(requests[0].data))).toEqual({
      progress: 25,
      status: "in_progress",
      time_estimate: "45s",
    });
  });

  it("returns null for a job the coordinator no longer knows", async () => {
    const { http, requests } = stubHttp(() => ({ status: 404, data: { error: "not found" } }));
    const source = new HttpJobSource({ ...options, http });

    await expect(source.fetchJob("gone job")).resolves.toBeNull();
    expect(requests[0].url).toBe("/get/gone%20job");
  });

  it("wraps HTTP failures in JobSourceError", async () => {
    const { http } = stubHttp(() => ({ status: 500, data: "Internal Server Error" }));
    const source = new HttpJobSource({ ...options, http });

    await expect(source.updateJob("J1", 0, "errored", "0")).rejects.toMatchObject({
      name: "JobSourceError",
      method: "PUT",
      url: "/put/J1",
      status: 500,
    });
  });
});

describe("parseJobList", () => {
  it("keeps a runnable job whose display fields are null or out of range", () => {
    const { jobs, rejected } = parseJobList({
      results: [
        { ...rawJob, owner: null, priority: null, time_estimate: null, progress: 12.5 },
        { ...rawJob, uid: "J2", progress: 140 },
      ],
    });

    expect(rejected).toEqual([]);
    expect(jobs.map((j) => [j.uid, j.progress])).toEqual([
      ["J1", 13],
      ["J2", 100],
    ]);
    expect(jobs[0]).toMatchObject({ status: "ready_to_start", timeEstimate: "", name: "intro shot" });
    expect(jobs[0].owner).toBeUndefined();
    expect(jobs[0].priority).toBeUndefined();
  });

  it("rejects a payload without a results array", () => {
    expect(() => parseJobList({ jobs: [] })).toThrow(/^unexpected job list payload/);
  });
});
