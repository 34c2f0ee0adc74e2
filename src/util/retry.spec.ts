import { describe, expect, it, vi } from "vitest";
import { withRetry } from "./retry.js";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValueOnce("done");

    await expect(withRetry(operation, { maxAttempts: 3, baseDelayMs: 0 })).resolves.toBe("done");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("throws the last error once attempts run out", async () => {
    const operation = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"));

    await expect(withRetry(operation, { maxAttempts: 2, baseDelayMs: 0 })).rejects.toThrow("second");
    expect(operation).toHaveBeenCalledTimes(2);
  });

  it("stops when shouldRetry declines", async () => {
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("permanent"));

    await expect(
      withRetry(operation, { maxAttempts: 5, baseDelayMs: 0, shouldRetry: () => false }),
    ).rejects.toThrow("permanent");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("stops waiting and does not try again once the signal aborts", async () => {
    const controller = new AbortController();
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    const pending = withRetry(operation, {
      maxAttempts: 3,
      baseDelayMs: 60_000,
      signal: controller.signal,
      onRetry: () => {
        setTimeout(() => controller.abort(), 5);
      },
    });

    await expect(pending).rejects.toThrow("down");
    expect(operation).toHaveBeenCalledTimes(1);
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort(new Error("batch aborted"));
    const operation = vi.fn<() => Promise<string>>().mockResolvedValue("never");

    await expect(withRetry(operation, { maxAttempts: 2, baseDelayMs: 0, signal: controller.signal })).rejects.toThrow(
      "batch aborted",
    );
    expect(operation).not.toHaveBeenCalled();
  });

  it("doubles the wait between attempts", async () => {
    const waits: number[] = [];
    const operation = vi.fn<() => Promise<string>>().mockRejectedValue(new Error("down"));

    await expect(
      withRetry(operation, {
        maxAttempts: 3,
        baseDelayMs: 1,
        onRetry: (_error, _attempt, waitMs) => {
          waits.push(waitMs);
        },
      }),
    ).rejects.toThrow("down");
    expect(waits).toEqual([1, 2]);
  });
});
