import { existsSync } from "node:fs";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createDeferred } from "../../__tests__/helpers.js";
import { FetchError } from "../../lib/errors.js";
import { createSilentLogger } from "../../lib/logger.js";
import { FetchWorker } from "../fetch-worker.js";
import { ProgressStore } from "../progress-store.js";
import type { FetchOperation, ProgressCallback } from "../types.js";

const job = { chatId: 1, locator: "https://youtu.be/abc", format: "audio" as const };

describe("FetchWorker", () => {
  let tempDir: string;
  let store: ProgressStore;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "fetch-worker-test-"));
    store = new ProgressStore({ staleAfterMs: 60_000 });
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  function createWorker(fetchMedia: FetchOperation, maxConcurrentJobs = 2): FetchWorker {
    return new FetchWorker(fetchMedia, store, createSilentLogger(), { tempDir, maxConcurrentJobs });
  }

  it("runs the fetch in a private workspace and returns the artifact", async () => {
    const worker = createWorker(async (request) => ({
      title: "Song",
      path: join(request.outputDir, "Song.mp3"),
    }));

    const result = await worker.run(job);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.artifact.title).toBe("Song");
    expect(result.artifact.directory.startsWith(join(tempDir, "media-fetch-"))).toBe(true);
    expect(result.artifact.path).toBe(join(result.artifact.directory, "Song.mp3"));
    expect(existsSync(result.artifact.directory)).toBe(true);
  });

  it("writes progress into the store while the fetch runs", async () => {
    const gate = createDeferred();
    const worker = createWorker(async (_request, onProgress) => {
      onProgress({ status: "downloading", percent: " 12.5%", speed: "1MiB/s", eta: "00:20", title: "Song" });
      await gate.promise;
      onProgress({ status: "downloading", percent: "50%" });
      onProgress({ status: "finished" });
      return { title: "Song" };
    });

    const running = worker.run(job);
    await vi.waitFor(() => expect(store.get(1)?.percent).toBe(12.5));
    expect(store.get(1)).toMatchObject({ phase: "downloading", speed: "1MiB/s", eta: "00:20", title: "Song" });

    gate.resolve();
    await running;
    expect(store.get(1)).toMatchObject({
      phase: "finished",
      percent: 100,
      speed: "N/A",
      eta: "0s",
      title: "Song",
    });
  });

  it("marks the snapshot finished even when the fetch never reported it", async () => {
    const worker = createWorker(async (_request, onProgress) => {
      onProgress({ status: "downloading", percent: "99%", speed: "1MiB/s", eta: "00:01" });
      return { title: "Song" };
    });

    await worker.run(job);

    expect(store.get(1)).toMatchObject({
      phase: "finished",
      percent: 100,
      speed: "N/A",
      eta: "0s",
      title: "Song",
    });
  });

  it("ignores progress reported after the job settled", async () => {
    let report: ProgressCallback | undefined;
    const worker = createWorker(async (_request, onProgress) => {
      report = onProgress;
      return { title: "Song" };
    });

    await worker.run(job);
    store.delete(1);
    report?.({ status: "downloading", percent: "99%" });

    expect(store.has(1)).toBe(false);
  });

  it("wraps unexpected failures and removes the workspace", async () => {
    let outputDir = "";
    const worker = createWorker(async (request) => {
      outputDir = request.outputDir;
      throw new Error("Video unavailable");
    });

    const result = await worker.run(job);

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error).toBeInstanceOf(FetchError);
    expect(result.error.message).toBe("Download process failed: Video unavailable");
    expect(existsSync(outputDir)).toBe(false);
  });

  it("passes fetch errors through", async () => {
    const original = new FetchError("Sign in to confirm your age");
    const worker = createWorker(async () => {
      throw original;
    });

    const result = await worker.run(job);
    expect(result).toEqual({ ok: false, error: original });
  });

  it("queues jobs beyond the concurrency limit", async () => {
    const gates = [createDeferred(), createDeferred()];
    let started = 0;
    const worker = createWorker(async () => {
      const gate = gates[started];
      started += 1;
      await gate?.promise;
      return { title: "Song" };
    }, 1);

    const first = worker.run({ ...job, chatId: 1 });
    const second = worker.run({ ...job, chatId: 2 });
    expect(worker.runningCount).toBe(1);
    expect(worker.waitingCount).toBe(1);

    await vi.waitFor(() => expect(started).toBe(1));
    gates[0]?.resolve();
    await first;

    await vi.waitFor(() => expect(started).toBe(2));
    expect(worker.waitingCount).toBe(0);
    gates[1]?.resolve();
    await second;
    expect(worker.runningCount).toBe(0);
  });
});
