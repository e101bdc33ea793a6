import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { state } from "../libs/state";
import type { ActivityEvent, ActivityEventType } from "../types/ActivityEvent";

export type ActivityQuery = {
  jobId?: string;
  type?: ActivityEventType;
  action?: string;
  contains?: string;
  limit: number;
};

export const queryActivityLog = ({ jobId, type, action, contains, limit }: ActivityQuery) => {
  let events: ActivityEvent[] = state.activityLog;

  if (jobId) {
    events = events.filter((e) => e.jobId === jobId);
  }
  if (type) {
    events = events.filter((e) => e.type === type);
  }
  if (action) {
    const actionFilter = action.toLowerCase();
    events = events.filter((e) => e.action.toLowerCase().includes(actionFilter));
  }
  if (contains) {
    const containsFilter = contains.toLowerCase();
    events = events.filter((e) => e.detail.toLowerCase().includes(containsFilter));
  }

  return events.slice(Math.max(0, events.length - limit));
};

export const formatActivityLine = (e: ActivityEvent) =>
  `[${e.timestamp}] ${e.type} ${e.action} ${e.jobId ? `job=${e.jobId} ` : ""}${e.detail}`;

export const registerActivityLogTool = (server: McpServer) =>
  server.registerTool(
    "activityLog",
    {
      title: "activityLog",
      description: "Inspect render worker activity (claims, heartbeats, outcomes, polls).",
      inputSchema: {
        jobId: z.string().optional(),
        type: z.enum(["job", "worker", "system"]).optional(),
        action: z.string().optional(),
        contains: z.string().optional(),
        format: z.enum(["json", "lines"]).default("json"),
        limit: z.number().int().min(1).max(500).default(50),
      },
    },
    async ({ jobId, type, action, contains, format, limit }) => {
      const sliced = queryActivityLog({ jobId, type, action, contains, limit });
      const lines = format === "lines" ? sliced.map(formatActivityLine) : undefined;

      return {
        content: [
          {
            type: "text",
            text: lines ? lines.join("\n") : `events=${sliced.length}`,
          },
        ],
        structuredContent: {
          count: sliced.length,
          events: sliced,
          ...(lines ? { lines } : {}),
        },
      };
    },
  );
