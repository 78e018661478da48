import { afterEach, describe, expect, it, vi } from "vitest";
import { createClock, createDeferred, FakeSink, settle } from "../../__tests__/helpers.js";
import { TransportError } from "../../lib/errors.js";
import { createSilentLogger } from "../../lib/logger.js";
import { ProgressReporter } from "../progress-reporter.js";
import { ProgressStore } from "../progress-store.js";
import { renderDownloadingStatus } from "../render.js";

const INTERVAL_MS = 1000;

function createHarness() {
  const clock = createClock();
  const sink = new FakeSink();
  const store = new ProgressStore({ staleAfterMs: 300_000, now: clock.now });
  const messageIds = new Map<number, number>();
  const sweepExpired = vi.fn((): number[] => []);
  const reporter = new ProgressReporter(
    store,
    { getStatusMessageId: (chatId) => messageIds.get(chatId), sweepExpired },
    sink,
    createSilentLogger(),
    { intervalMs: INTERVAL_MS, initialDelayMs: 5000, now: clock.now },
  );
  return { clock, sink, store, messageIds, sweepExpired, reporter };
}

function downloading(percent: number) {
  return { phase: "downloading" as const, percent, speed: "1MiB/s", eta: "00:10" };
}

describe("ProgressReporter", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("edits each downloading chat's status message", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));

    await reporter.tick();

    const snapshot = store.get(1);
    expect(snapshot).toBeDefined();
    if (!snapshot) return;
    expect(sink.edits).toEqual([
      { chatId: 1, messageId: 77, text: renderDownloadingStatus(snapshot), options: { parseMode: "HTML" } },
    ]);
  });

  it("skips chats that are not downloading or have no status message", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, { phase: "starting", percent: 0, speed: "N/A", eta: "N/A" });
    store.set(2, downloading(10));

    await reporter.tick();

    expect(sink.edits).toEqual([]);
  });

  it("does not resend unchanged text", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));

    await reporter.tick();
    await reporter.tick();
    store.set(1, downloading(55));
    await reporter.tick();

    expect(sink.edits).toHaveLength(2);
  });

  it("keeps other chats moving while one edit hangs", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    const hang = createDeferred();
    sink.onEdit = async (chatId) => {
      if (chatId === 1) {
        await hang.promise;
      }
    };
    messageIds.set(1, 71);
    messageIds.set(2, 72);
    store.set(1, downloading(10));
    store.set(2, downloading(20));

    const firstTick = reporter.tick();
    await vi.waitFor(() => expect(sink.editTexts(2)).toHaveLength(1));
    await settle();

    store.set(1, downloading(30));
    store.set(2, downloading(40));
    await reporter.tick();

    expect(sink.editTexts(1)).toHaveLength(1);
    expect(sink.editTexts(2)).toHaveLength(2);

    hang.resolve();
    await firstTick;
  });

  it("backs off after a flood error", async () => {
    const { clock, sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));
    sink.failing.set("editMessage", new TransportError("editMessageText failed: flood", "flood", 2000));

    await reporter.tick();
    sink.failing.delete("editMessage");
    clock.advance(1000);
    await reporter.tick();
    expect(sink.edits).toHaveLength(1);

    clock.advance(1300);
    await reporter.tick();
    expect(sink.edits).toHaveLength(2);
  });

  it("treats an unchanged message as delivered", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));
    sink.failing.set("editMessage", new TransportError("editMessageText failed: same", "not-modified"));

    await reporter.tick();
    sink.failing.delete("editMessage");
    await reporter.tick();

    expect(sink.edits).toHaveLength(1);
  });

  it("retries after other failures", async () => {
    const { sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));
    sink.failing.set("editMessage", new TransportError("editMessageText failed: timeout"));

    await reporter.tick();
    sink.failing.delete("editMessage");
    await reporter.tick();

    expect(sink.edits).toHaveLength(2);
  });

  it("sweeps expired sessions on every tick", async () => {
    const { sweepExpired, reporter } = createHarness();

    await reporter.tick();
    await reporter.tick();

    expect(sweepExpired).toHaveBeenCalledTimes(2);
  });

  it("evicts stale progress instead of rendering it", async () => {
    const { clock, sink, store, messageIds, reporter } = createHarness();
    messageIds.set(1, 77);
    store.set(1, downloading(40));
    clock.advance(300_001);

    await reporter.tick();

    expect(sink.edits).toEqual([]);
    expect(store.has(1)).toBe(false);
  });

  it("starts after the initial delay and stops on request", async () => {
    vi.useFakeTimers();
    const sink = new FakeSink();
    const store = new ProgressStore({ staleAfterMs: 300_000 });
    const reporter = new ProgressReporter(
      store,
      { getStatusMessageId: () => 77, sweepExpired: () => [] },
      sink,
      createSilentLogger(),
      { intervalMs: INTERVAL_MS, initialDelayMs: 5000 },
    );
    store.set(1, downloading(40));

    reporter.start();
    expect(reporter.isRunning).toBe(true);
    await vi.advanceTimersByTimeAsync(4999);
    expect(sink.edits).toHaveLength(0);
    await vi.advanceTimersByTimeAsync(1);
    expect(sink.edits).toHaveLength(1);

    store.set(1, downloading(60));
    await vi.advanceTimersByTimeAsync(INTERVAL_MS);
    expect(sink.edits).toHaveLength(2);

    reporter.stop();
    expect(reporter.isRunning).toBe(false);
    store.set(1, downloading(80));
    await vi.advanceTimersByTimeAsync(INTERVAL_MS * 3);
    expect(sink.edits).toHaveLength(2);
  });
});
