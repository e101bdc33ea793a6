import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { state } from "../libs/state";
import { getActivityLogFilePath } from "../utils/activityPersistence";

export const buildStatusPayload = (tail = 20) => ({
  workerName: state.workerName,
  startedAt: state.startedAt,
  busy: state.currentJob !== null,
  currentJob: state.currentJob,
  counters: { ...state.counters },
  lastRun: state.lastRun
    ? {
        exitCode: state.lastRun.exitCode,
        signal: state.lastRun.signal,
        durationMs: state.lastRun.durationMs,
        finishedAt: state.lastRun.finishedAt,
        timedOut: state.lastRun.timedOut ?? false,
      }
    : null,
  activityTail: state.activityLog.slice(Math.max(0, state.activityLog.length - tail)),
  activityLogPath: getActivityLogFilePath(),
});

export const registerStatusTool = (server: McpServer) =>
  server.registerTool(
    "status",
    {
      title: "status",
      description: "Get render worker status (current job, counters, last run, recent activity).",
      inputSchema: { tail: z.number().int().min(0).max(500).default(20) },
    },
    async ({ tail }) => {
      const payload = buildStatusPayload(tail);
      const text = payload.currentJob
        ? `rendering ${payload.currentJob.uid} (${payload.currentJob.progress}%)`
        : "idle";
      return {
        content: [{ type: "text", text }],
        structuredContent: payload,
      };
    },
  );
