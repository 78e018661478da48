import { describe, expect, it, vi } from "vitest";
import { TelegramQueue } from "../telegram-queue.service.js";

describe("TelegramQueue", () => {
  it("starts calls in the order they were queued", async () => {
    const queue = new TelegramQueue(1);
    const started: number[] = [];

    const results = await Promise.all(
      [1, 2, 3].map((value) =>
        queue.enqueue(async () => {
          started.push(value);
          return value * 10;
        }),
      ),
    );

    expect(started).toEqual([1, 2, 3]);
    expect(results).toEqual([10, 20, 30]);
  });

  it("rejects with the call's own error and keeps going", async () => {
    const queue = new TelegramQueue(1);

    const failing = queue.enqueue(() => Promise.reject(new Error("Too Many Requests")));
    const passing = queue.enqueue(async () => "ok");

    await expect(failing).rejects.toThrow("Too Many Requests");
    await expect(passing).resolves.toBe("ok");
  });

  it("stops its timer once the queue is empty", async () => {
    const queue = new TelegramQueue(1);

    await queue.enqueue(async () => undefined);

    await vi.waitFor(() => expect(queue.isProcessing).toBe(false));
    expect(queue.size).toBe(0);
  });

  it("does not let a slow call hold back the next one", async () => {
    const queue = new TelegramQueue(1);
    let releaseSlow: () => void = () => undefined;
    const slow = queue.enqueue(
      () =>
        new Promise<string>((resolve) => {
          releaseSlow = () => resolve("slow");
        }),
    );
    const fast = queue.enqueue(async () => "fast");

    await expect(fast).resolves.toBe("fast");
    releaseSlow();
    await expect(slow).resolves.toBe("slow");
  });

  it("reports idle only after started calls finish", async () => {
    const queue = new TelegramQueue(1);
    let releaseUpload: () => void = () => undefined;
    const upload = queue.enqueue(
      () =>
        new Promise<void>((resolve) => {
          releaseUpload = resolve;
        }),
    );
    let idle = false;
    const waiting = queue.idle().then(() => {
      idle = true;
    });

    await vi.waitFor(() => expect(queue.inFlightCount).toBe(1));
    expect(idle).toBe(false);

    releaseUpload();
    await upload;
    await waiting;
    expect(idle).toBe(true);
    expect(queue.inFlightCount).toBe(0);
  });

  it("is idle straight away when nothing was queued", async () => {
    await expect(new TelegramQueue(1).idle()).resolves.toBeUndefined();
  });
});
