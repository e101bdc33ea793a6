import { spawn } from "node:child_process";
import type { Readable } from "node:stream";
import type { CommandResult } from "../types/CommandResult";

const KILL_GRACE_MS = 1000;

export type SpawnedProcess = {
  stdout: Readable | null;
  stderr: Readable | null;
  on(event: "spawn", listener: () => void): unknown;
  on(event: "error", listener: (err: Error) => void): unknown;
  on(event: "close", listener: (code: number | null, signal: NodeJS.Signals | null) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
};

export type ProcessLauncher = (
  command: string,
  args: string[],
  options: { cwd?: string; env: NodeJS.ProcessEnv },
) => SpawnedProcess;

export const defaultLauncher: ProcessLauncher = (command, args, options) =>
  spawn(command, args, {
    cwd: options.cwd,
    env: options.env,
    stdio: ["ignore", "pipe", "pipe"],
    windowsHide: true,
  });

export type ProcessExit =
  | { spawned: true; result: CommandResult }
  | { spawned: false; error: string };

export type ProcessHandle = {
  spawned: Promise<boolean>;
  exited: Promise<ProcessExit>;
  isRunning: () => boolean;
  terminate: (reason: string) => void;
};

export type StartProcessOptions = {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  timeoutMs?: number;
  launcher?: ProcessLauncher;
};

export const startProcess = (
  command: string,
  args: string[],
  options: StartProcessOptions = {},
): ProcessHandle => {
  const launcher = options.launcher ?? defaultLauncher;
  const startedAt = new Date();

  let stdout = "";
  let stderr = "";
  let spawned = false;
  let running = true;
  let timedOut = false;
  let timer: NodeJS.Timeout | null = null;
  let killTimer: NodeJS.Timeout | null = null;
  let child: SpawnedProcess;
  let markSpawned: (value: boolean) => void = () => undefined;
  const spawnedPromise = new Promise<boolean>((resolve) => {
    markSpawned = resolve;
  });

  const kill = (note: string) => {
    // first reason wins; the SIGKILL escalation is already armed
    if (!running || killTimer) return;
    stderr += `\n[${note}]`;
    child.kill("SIGTERM");
    killTimer = setTimeout(() => {
      if (running) child.kill("SIGKILL");
    }, KILL_GRACE_MS);
  };

  const exited = new Promise<ProcessExit>((resolve) => {
    let settled = false;
    const settle = (value: ProcessExit) => {
      if (settled) return;
      settled = true;
      running = false;
      markSpawned(value.spawned);
      if (timer) clearTimeout(timer);
      if (killTimer) clearTimeout(killTimer);
      resolve(value);
    };

    try {
      child = launcher(command, args, {
        cwd: options.cwd,
        env: {
          ...process.env,
          ...(options.env ?? {}),
        },
      });
    } catch (e) {
      // spawn() throws synchronously on invalid arguments
      settle({ spawned: false, error: e instanceof Error ? e.message : String(e) });
      return;
    }

    child.stdout?.setEncoding("utf8");
    child.stderr?.setEncoding("utf8");
    child.stdout?.on("data", (d: string) => (stdout += d));
    child.stderr?.on("data", (d: string) => (stderr += d));

    child.on("spawn", () => {
      spawned = true;
      markSpawned(true);
    });

    child.on("error", (err) => {
      if (!spawned) {
        settle({ spawned: false, error: err.message });
        return;
      }
      stderr += `\n[error] ${err.message}`;
    });

    child.on("close", (exitCode, signal) => {
      if (!spawned) {
        settle({ spawned: false, error: `process closed before spawning (exit=${String(exitCode)})` });
        return;
      }

      const finishedAt = new Date();
      settle({
        spawned: true,
        result: {
          ok: exitCode === 0 && !timedOut,
          command,
          args,
          exitCode,
          signal: signal ? String(signal) : null,
          stdout,
          stderr,
          startedAt: startedAt.toISOString(),
          finishedAt: finishedAt.toISOString(),
          durationMs: finishedAt.getTime() - startedAt.getTime(),
          timedOut,
        },
      });
    });
  });

  const timeoutMs = options.timeoutMs ?? 0;
  if (running && timeoutMs > 0) {
    timer = setTimeout(() => {
      timedOut = true;
      kill(`timeout: command exceeded ${timeoutMs}ms`);
    }, timeoutMs);
  }

  return {
    spawned: spawnedPromise,
    exited,
    isRunning: () => running,
    terminate: (reason) => kill(`terminated: ${reason}`),
  };
};
