import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import { state } from "../libs/state";

export const handlePing = ({ message }: { message?: string }) => {
  const worker = state.workerName ?? "(not started)";
  const text = message ? `pong from ${worker}: ${message}` : `pong from ${worker}`;
  return { content: [{ type: "text" as const, text }] };
};

export const registerPingTool = (server: McpServer) =>
  server.registerTool(
    "ping",
    {
      title: "ping",
      description: "Health check. Replies with the worker identity.",
      inputSchema: { message: z.string().optional() },
    },
    async ({ message }) => handlePing({ message }),
  );
