import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { addActivityEvent } from "./libs/state";
import { HttpJobSource } from "./libs/jobSource";
import { registerActivityLogTool, registerPingTool, registerStatusTool } from "./tools";
import { configureActivityLogFile } from "./utils/activityPersistence";
import { loadWorkerConfig } from "./utils/configUtil";
import { createElapsedTimeProgressSource } from "./utils/progressUtil";
import { createRenderExecutor } from "./utils/renderDriver";
import { startWorkerLoop } from "./utils/workerLoop";

const connectOperatorSurface = async () => {
  const server = new McpServer({ name: "render-worker", version: "0.1.0" });
  registerPingTool(server);
  registerStatusTool(server);
  registerActivityLogTool(server);

  const transport = new StdioServerTransport();
  await server.connect(transport);
  return server;
};

// -------------------------
// Main
// -------------------------
async function main() {
  const { path: configPath, config } = await loadWorkerConfig(process.cwd(), process.env.RENDER_WORKER_CONFIG_FILE);
  configureActivityLogFile(config.activityLogFile);
  console.error(`Starting render worker ${config.workerName} (settings: ${configPath ?? "environment only"})`);

  const jobSource = new HttpJobSource({
    ...config.jobSource,
    onRejected: (rejected) => {
      for (const r of rejected) {
        addActivityEvent({
          type: "worker",
          action: "job_record_invalid",
          detail: `#${r.index} ${r.uid ?? "(no uid)"}: ${r.reason}`,
          jobId: r.uid,
        });
      }
    },
  });

  const execute = createRenderExecutor({
    engine: config.engine,
    jobSource,
    heartbeatIntervalMs: config.heartbeatIntervalMs,
    timeoutMs: config.jobTimeoutMs,
    progressSource: createElapsedTimeProgressSource(config.progressBaselineMs),
  });

  const loop = startWorkerLoop({
    workerName: config.workerName,
    jobSource,
    execute,
    pollIntervalMs: config.pollIntervalMs,
  });
  console.error(
    `Worker loop started: source=${config.jobSource.baseUrl}, poll=${config.pollIntervalMs}ms, heartbeat=${config.heartbeatIntervalMs}ms`,
  );

  const server = config.mcp ? await connectOperatorSurface() : null;
  if (server) console.error("Operator MCP server connected (stdio)");

  const shutdown = (signal: NodeJS.Signals) => {
    if (loop.signal.aborted) {
      console.error(`${signal} received again, exiting now`);
      process.exit(130);
    }
    console.error(`${signal} received, stopping after the current job`);
    loop.stop();
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);

  await loop.done;
  await server?.close();
  console.error(`Render worker ${config.workerName} stopped`);
}

main().catch((err) => {
  console.error("Fatal:", err);
  process.exit(1);
});
