import { describe, expect, it } from "vitest";
import { RequestAbortedError, UpstreamTimeoutError } from "../../src/errors.js";
import { withTimeout } from "../../src/utils/timeout.js";
import { mapWithConcurrency } from "../../src/utils/worker-pool.js";

describe("utils/worker-pool", () => {
  it("keeps input order and never exceeds the concurrency bound", async () => {
    let inFlight = 0;
    let peak = 0;
    const delays = [30, 5, 20, 1, 10];

    const results = await mapWithConcurrency(delays, 2, async (delayMs, index) => {
      inFlight += 1;
      peak = Math.max(peak, inFlight);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
      inFlight -= 1;
      return `item-${index}`;
    });

    expect(results).toEqual(["item-0", "item-1", "item-2", "item-3", "item-4"]);
    expect(peak).toBe(2);
  });

  it("handles an empty input", async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});

describe("utils/timeout", () => {
  it("resolves with the operation result", async () => {
    await expect(withTimeout({ operation: "op", timeoutMs: 100 }, async () => "done")).resolves.toBe("done");
  });

  it("rejects and aborts the operation signal when the timeout elapses", async () => {
    let operationSignal: AbortSignal | undefined;
    const pending = withTimeout({ operation: "slow_op", timeoutMs: 5 }, (signal) => {
      operationSignal = signal;
      return new Promise<string>(() => undefined);
    });

    await expect(pending).rejects.toThrow(new UpstreamTimeoutError("slow_op", 5));
    expect(operationSignal?.aborted).toBe(true);
  });

  it("rejects when the caller aborts", async () => {
    const controller = new AbortController();
    const pending = withTimeout({ operation: "op", timeoutMs: 1000, signal: controller.signal }, () =>
      new Promise<string>(() => undefined)
    );
    controller.abort();

    await expect(pending).rejects.toBeInstanceOf(RequestAbortedError);
  });

  it("does not start the operation when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    let started = false;

    await expect(
      withTimeout({ operation: "op", timeoutMs: 1000, signal: controller.signal }, async () => {
        started = true;
        return 1;
      })
    ).rejects.toThrow("op aborted by caller");
    expect(started).toBe(false);
  });
});
