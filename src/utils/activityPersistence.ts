import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";
import type { ActivityEvent } from "../types/ActivityEvent";

let activityLogFilePath: string | null = null;

export const configureActivityLogFile = (filePath: string | null, cwd = process.cwd()) => {
  if (!filePath || filePath.trim().length === 0) {
    activityLogFilePath = null;
    return null;
  }
  activityLogFilePath = path.isAbsolute(filePath) ? filePath : path.resolve(cwd, filePath);
  return activityLogFilePath;
};

export const getActivityLogFilePath = () => activityLogFilePath;

export const appendActivityEvent = async (event: ActivityEvent): Promise<void> => {
  if (!activityLogFilePath) return;
  try {
    await mkdir(path.dirname(activityLogFilePath), { recursive: true });
    await appendFile(activityLogFilePath, `${JSON.stringify(event)}\n`, "utf8");
  } catch (e) {
    // the in-memory log still has the event; report once per failed write
    console.error(`activity log write failed (${activityLogFilePath}): ${String(e)}`);
  }
};
