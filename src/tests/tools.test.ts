import { beforeEach, describe, expect, it } from "vitest";
import { addActivityEvent, resetState, state } from "../libs/state";
import { formatActivityLine, queryActivityLog } from "../tools/activityLog";
import { handlePing } from "../tools/ping";
import { buildStatusPayload } from "../tools/status";
import { commandResult } from "./fakes";

describe("operator tools", () => {
  beforeEach(() => {
    resetState();
  });

  it("answers ping with the worker identity", () => {
    expect(handlePing({}).content[0].text).toBe("pong from (not started)");
    state.workerName = "RENDER_MACHINE_01";
    expect(handlePing({ message: "hi" }).content[0].text).toBe("pong from RENDER_MACHINE_01: hi");
  });

  it("summarises the current job, counters and last run", () => {
    state.workerName = "RENDER_MACHINE_01";
    state.currentJob = { uid: "J1", progress: 50, timeEstimate: "30s" };
    state.counters = { passes: 4, finished: 2, errored: 1 };
    state.lastRun = commandResult({ exitCode: 1, ok: false, durationMs: 4200 });
    addActivityEvent({ type: "job", action: "job_claimed", detail: "J1 by RENDER_MACHINE_01", jobId: "J1" });

    const payload = buildStatusPayload();

    expect(payload).toMatchObject({
      workerName: "RENDER_MACHINE_01",
      busy: true,
      currentJob: { uid: "J1", progress: 50, timeEstimate: "30s" },
      counters: { passes: 4, finished: 2, errored: 1 },
      lastRun: {
        exitCode: 1,
        signal: null,
        durationMs: 4200,
        finishedAt: "2026-01-01T00:00:01.000Z",
        timedOut: false,
      },
      activityLogPath: null,
    });
    expect(payload.activityTail.map((e) => e.action)).toEqual(["job_claimed"]);
  });

  it("filters activity by job, type, action and text", () => {
    addActivityEvent({ type: "worker", action: "jobs_polled", detail: "fetched=2 eligible=2 worker=W" });
    addActivityEvent({ type: "job", action: "job_claimed", detail: "J1 by W", jobId: "J1" });
    addActivityEvent({ type: "job", action: "job_heartbeat", detail: "J1 progress=25 eta=45s", jobId: "J1" });
    addActivityEvent({ type: "job", action: "job_claimed", detail: "J2 by W", jobId: "J2" });
    addActivityEvent({ type: "job", action: "job_errored", detail: "J2 exit=1 signal=null stderr=", jobId: "J2" });

    expect(queryActivityLog({ jobId: "J1", limit: 50 }).map((e) => e.action)).toEqual([
      "job_claimed",
      "job_heartbeat",
    ]);
    expect(queryActivityLog({ type: "worker", limit: 50 })).toHaveLength(1);
    expect(queryActivityLog({ action: "CLAIMED", limit: 50 }).map((e) => e.jobId)).toEqual(["J1", "J2"]);
    expect(queryActivityLog({ contains: "EXIT=1", limit: 50 }).map((e) => e.action)).toEqual(["job_errored"]);
    expect(queryActivityLog({ limit: 2 }).map((e) => e.action)).toEqual(["job_claimed", "job_errored"]);
  });

  it("formats events as log lines", () => {
    expect(
      formatActivityLine({
        id: "evt_1",
        timestamp: "2026-01-01T00:00:00.000Z",
        type: "job",
        action: "job_finished",
        detail: "J1 exit=0 duration=1000ms",
        jobId: "J1",
      }),
    ).toBe("[2026-01-01T00:00:00.000Z] job job_finished job=J1 J1 exit=0 duration=1000ms");
    expect(
      formatActivityLine({
        id: "evt_2",
        timestamp: "2026-01-01T00:00:05.000Z",
        type: "system",
        action: "worker_loop_started",
        detail: "worker=W, pollIntervalMs=10000",
      }),
    ).toBe("[2026-01-01T00:00:05.000Z] system worker_loop_started worker=W, pollIntervalMs=10000");
  });

  it("keeps only the newest 500 events", () => {
    for (let i = 0; i < 505; i++) {
      addActivityEvent({ type: "worker", action: "jobs_polled", detail: `pass ${i}` });
    }

    expect(state.activityLog).toHaveLength(500);
    expect(state.activityLog[0].detail).toBe("pass 5");
  });
});
