import type { CommandResult } from "./CommandResult";

export type ExecutionOutcome =
  | { ok: true; kind: "succeeded"; result: CommandResult }
  | { ok: false; kind: "spawn_failed"; error: string }
  | { ok: false; kind: "exit_nonzero"; result: CommandResult }
  | { ok: false; kind: "timed_out"; result: CommandResult }
  | { ok: false; kind: "update_failed"; error: string; result?: CommandResult }
  | { ok: false; kind: "unexpected"; error: string };
