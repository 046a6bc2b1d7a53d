import { describe, it, expect, vi } from "vitest";
import { poll } from "./polling.js";
import { jobFailed } from "./errors/catalog.js";

interface Status {
  state: "queued" | "done" | "broken";
}

function statuses(...states: Status["state"][]) {
  const queue = [...states];
  return vi.fn(async (): Promise<Status> => ({ state: queue.shift() ?? "queued" }));
}

describe("poll", () => {
  const delay = vi.fn(async (_ms: number) => {});

  it("fetches the first status without waiting", async () => {
    delay.mockClear();
    const fetchStatus = statuses("done");

    const result = await poll({
      fetchStatus,
      isComplete: (s) => s.state === "done",
      failure: () => undefined,
      intervalMs: 1000,
      maxAttempts: 5,
      delay,
    });

    expect(result).toEqual({ state: "done" });
    expect(delay).not.toHaveBeenCalled();
  });

  it("waits the interval between checks and reports progress", async () => {
    delay.mockClear();
    const onProgress = vi.fn();

    await poll({
      fetchStatus: statuses("queued", "queued", "done"),
      isComplete: (s) => s.state === "done",
      failure: () => undefined,
      intervalMs: 250,
      maxAttempts: 5,
      onProgress,
      delay,
    });

    expect(delay.mock.calls).toEqual([[250], [250]]);
    expect(onProgress.mock.calls).toEqual([
      [{ state: "queued" }, 1],
      [{ state: "queued" }, 2],
    ]);
  });

  it("throws the failure error for a terminal state", async () => {
    await expect(
      poll({
        fetchStatus: statuses("queued", "broken"),
        isComplete: (s) => s.state === "done",
        failure: (s) => (s.state === "broken" ? jobFailed("job-7", "disk full") : undefined),
        intervalMs: 10,
        maxAttempts: 5,
        delay,
      })
    ).rejects.toMatchObject({
      code: "TRANSFER_SERVER",
      message: "Retrieve job job-7 failed",
      details: "disk full",
    });
  });

  it("times out after maxAttempts checks", async () => {
    const fetchStatus = statuses();

    await expect(
      poll({
        fetchStatus,
        isComplete: (s) => s.state === "done",
        failure: () => undefined,
        intervalMs: 10,
        maxAttempts: 3,
        delay,
      })
    ).rejects.toMatchObject({
      code: "TRANSFER_TIMEOUT",
      message: "Job did not finish after 3 status checks",
    });
    expect(fetchStatus).toHaveBeenCalledTimes(3);
  });
});
