export { registerPingTool } from "./ping";
export { registerStatusTool } from "./status";
export { registerActivityLogTool } from "./activityLog";
