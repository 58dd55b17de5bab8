import { describe, expect, it, vi } from "vitest";
import { UpstreamFetchError } from "../errors.js";
import { RetryingRecordStore } from "./record-store.js";

const tables = { baby: "baby", babyBackUp: "baby_backup", discharges: "discharges" };

describe("RetryingRecordStore", () => {
  it("reads the table mapped to the collection", async () => {
    const readTable = vi.fn().mockResolvedValue([{ id: "1", data: { UID: "A" } }]);
    const store = new RetryingRecordStore(readTable, tables, { maxRetries: 3, retryDelayMs: 0 });

    const documents = await store.fetch("babyBackUp");

    expect(readTable).toHaveBeenCalledWith("baby_backup");
    expect(documents).toEqual([{ id: "1", data: { UID: "A" } }]);
  });

  it("retries a failed read and returns the complete second read", async () => {
    const readTable = vi
      .fn()
      .mockRejectedValueOnce(new Error("connection reset"))
      .mockResolvedValueOnce([{ id: "1", data: {} }, { id: "2", data: {} }]);
    const store = new RetryingRecordStore(readTable, tables, { maxRetries: 3, retryDelayMs: 0 });

    const documents = await store.fetch("baby");

    expect(readTable).toHaveBeenCalledTimes(2);
    expect(documents).toHaveLength(2);
  });

  it("raises UpstreamFetchError naming the collection once retries run out", async () => {
    const readTable = vi.fn().mockRejectedValue(new Error("timeout"));
    const store = new RetryingRecordStore(readTable, tables, { maxRetries: 2, retryDelayMs: 0 });

    const error = await store.fetch("discharges").catch((e: unknown) => e);

    expect(readTable).toHaveBeenCalledTimes(2);
    expect(error).toBeInstanceOf(UpstreamFetchError);
    expect(error).toMatchObject({
      code: "UPSTREAM_FETCH",
      collection: "discharges",
      attempts: 2,
      message: "Failed to load collection 'discharges' after 2 attempt(s): timeout",
    });
  });

  it("waits longer before each retry", async () => {
    vi.useFakeTimers();
    try {
      const readTable = vi.fn().mockRejectedValue(new Error("down"));
      const store = new RetryingRecordStore(readTable, tables, { maxRetries: 3, retryDelayMs: 100 });

      const pending = store.fetch("baby").catch((e: unknown) => e);
      await vi.advanceTimersByTimeAsync(99);
      expect(readTable).toHaveBeenCalledTimes(1);
      await vi.advanceTimersByTimeAsync(1);
      expect(readTable).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(199);
      expect(readTable).toHaveBeenCalledTimes(2);
      await vi.advanceTimersByTimeAsync(1);
      expect(readTable).toHaveBeenCalledTimes(3);

      expect(await pending).toBeInstanceOf(UpstreamFetchError);
    } finally {
      vi.useRealTimers();
    }
  });
});
