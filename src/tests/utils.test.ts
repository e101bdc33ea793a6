import { describe, expect, it } from "vitest";
import { toErrorMessage } from "../utils/errorUtil";
import { issueEventId } from "../utils/idUtil";
import { sleep } from "../utils/sleepUtil";
import { getIsoTime } from "../utils/timeUtil";

describe("utils", () => {
  it("returns ISO timestamp string", () => {
    const iso = getIsoTime();
    expect(iso).toMatch(/^\d{4}-\d{2}-\d{2}T/);
    expect(Number.isNaN(Date.parse(iso))).toBe(false);
    expect(getIsoTime(new Date(0))).toBe("1970-01-01T00:00:00.000Z");
  });

  it("issues event id with provided prefix", () => {
    expect(issueEventId()).toMatch(/^evt_[a-z0-9]+_[a-z0-9]{1,6}$/);
    expect(issueEventId("job")).toMatch(/^job_/);
  });

  it("normalises thrown values to messages", () => {
    expect(toErrorMessage(new Error("boom"))).toBe("boom");
    expect(toErrorMessage("plain")).toBe("plain");
    expect(toErrorMessage(404)).toBe("404");
  });

  describe("sleep", () => {
    it("resolves true after the full interval", async () => {
      await expect(sleep(5)).resolves.toBe(true);
    });

    it("resolves false right away for an aborted signal", async () => {
      const controller = new AbortController();
      controller.abort();
      await expect(sleep(60_000, controller.signal)).resolves.toBe(false);
    });

    it("resolves false when aborted mid-sleep", async () => {
      const controller = new AbortController();
      const pending = sleep(60_000, controller.signal);
      setTimeout(() => controller.abort(), 5);
      await expect(pending).resolves.toBe(false);
    });
  });
});
