import { describe, expect, it } from "vitest";
import { canTransition } from "../utils/jobStateUtil";

describe("job state machine", () => {
  it("allows claim, heartbeat and both terminal transitions", () => {
    expect(canTransition("ready_to_start", "in_progress")).toBe(true);
    expect(canTransition("in_progress", "in_progress")).toBe(true);
    expect(canTransition("in_progress", "finished")).toBe(true);
    expect(canTransition("in_progress", "errored")).toBe(true);
  });

  it("rejects leaving a terminal state and skipping the claim", () => {
    expect(canTransition("finished", "in_progress")).toBe(false);
    expect(canTransition("errored", "ready_to_start")).toBe(false);
    expect(canTransition("ready_to_start", "finished")).toBe(false);
    expect(canTransition("paused", "in_progress")).toBe(false);
  });
});
