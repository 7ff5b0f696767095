import { describe, it, expect, beforeEach } from "vitest";
import { StatusAggregator, describeUpdate, summarize } from "../aggregator.js";
import { StatusChannel } from "../channel.js";
import { FileInventory, pendingRecord } from "../inventory.js";
import type { StatusUpdate } from "../types.js";

function inventoryOf(count: number): FileInventory {
  const inventory = new FileInventory("/photos");
  for (let index = 0; index < count; index++) {
    const name = `f${index}.png`;
    inventory.entries.push({ index, path: `/photos/${name}`, name, ext: ".png" });
    inventory.records.set(index, pendingRecord());
  }
  return inventory;
}

describe("describeUpdate", () => {
  it("reports savings for a success", () => {
    expect(describeUpdate({ index: 0, status: "SUCCESS", sizeBefore: 512000, sizeAfter: 312000 })).toBe(
      "195.3KB saved (39.1%)",
    );
  });

  it("stays empty when a size is missing", () => {
    expect(describeUpdate({ index: 0, status: "SUCCESS", sizeBefore: 0, sizeAfter: 10 })).toBe("");
  });

  it("shows the failure message or a fallback", () => {
    expect(describeUpdate({ index: 0, status: "FAILED", message: "bad header" })).toBe("bad header");
    expect(describeUpdate({ index: 0, status: "FAILED", message: "" })).toBe("Unknown Error");
  });
});

describe("summarize", () => {
  const base = {
    totalSelected: 2,
    successCount: 1,
    failedCount: 1,
    bytesBefore: 0,
    bytesAfter: 0,
    startTime: 0,
    active: false,
  };

  it("includes total savings when bytes were measured", () => {
    const session = { ...base, bytesBefore: 512000, bytesAfter: 312000 };
    expect(summarize(session, 2500)).toBe("Finished: 2 files | Total Saved: 195.3KB (39.1%) | Time: 2.50s");
  });

  it("omits savings otherwise", () => {
    expect(summarize(base, 2500)).toBe("Finished: 2 files | Time: 2.50s");
  });
});

describe("StatusAggregator", () => {
  let inventory: FileInventory;
  let channel: StatusChannel<StatusUpdate>;
  let clock: number;
  let aggregator: StatusAggregator;

  beforeEach(() => {
    inventory = inventoryOf(5);
    channel = new StatusChannel();
    clock = 1000;
    aggregator = new StatusAggregator(inventory, () => clock);
  });

  it("folds updates into the records and counters", () => {
    aggregator.begin(2);
    channel.push({ index: 0, status: "CONVERTING" });
    channel.push({ index: 0, status: "SUCCESS", sizeBefore: 512000, sizeAfter: 312000 });
    channel.push({ index: 1, status: "FAILED", message: "bad header" });
    aggregator.drain(channel);

    expect(inventory.record(0)).toEqual({
      status: "SUCCESS",
      message: "",
      infoStr: "195.3KB saved (39.1%)",
      sizeBefore: 512000,
      sizeAfter: 312000,
    });
    expect(inventory.record(1)).toEqual({ status: "FAILED", message: "bad header", infoStr: "bad header" });
    expect(aggregator.session).toMatchObject({
      successCount: 1,
      failedCount: 1,
      bytesBefore: 512000,
      bytesAfter: 312000,
    });
    expect(aggregator.failedIndices).toEqual([1]);
  });

  it("reports completion exactly once", () => {
    aggregator.begin(2);
    channel.push({ index: 0, status: "SUCCESS", sizeBefore: 512000, sizeAfter: 312000 });
    expect(aggregator.drain(channel)).toBeNull();
    expect(aggregator.active).toBe(true);

    clock = 3500;
    channel.push({ index: 1, status: "FAILED", message: "bad header" });
    const completion = aggregator.drain(channel);

    expect(completion).toEqual({
      processed: 2,
      elapsedMs: 2500,
      summary: "Finished: 2 files | Total Saved: 195.3KB (39.1%) | Time: 2.50s",
      failed: [1],
    });
    expect(aggregator.active).toBe(false);
    expect(aggregator.lastSummary).toBe(completion?.summary);
    expect(aggregator.drain(channel)).toBeNull();
  });

  it("ignores updates for unknown indices", () => {
    aggregator.begin(1);
    channel.push({ index: 42, status: "FAILED", message: "gone" });
    expect(aggregator.drain(channel)).toBeNull();
    expect(aggregator.session?.failedCount).toBe(0);
    expect(aggregator.failedIndices).toEqual([]);
  });

  it("forgets failures older than the previous batch", () => {
    aggregator.begin(1);
    aggregator.record({ index: 0, status: "FAILED", message: "x" });

    aggregator.begin(1);
    expect(aggregator.failedIndices).toEqual([0]);
    aggregator.record({ index: 1, status: "FAILED", message: "y" });

    aggregator.begin(1);
    expect(aggregator.failedIndices).toEqual([1]);
  });

  it("requeue removes an index from the failed set", () => {
    aggregator.begin(1);
    aggregator.record({ index: 2, status: "FAILED", message: "x" });
    aggregator.requeue(2);
    expect(aggregator.failedIndices).toEqual([]);
  });

  it("reopens a finished batch so retries complete the same totals", () => {
    aggregator.begin(5);
    for (const index of [0, 2, 4]) {
      aggregator.record({ index, status: "SUCCESS", sizeBefore: 100, sizeAfter: 50 });
    }
    aggregator.record({ index: 1, status: "FAILED", message: "x" });
    aggregator.record({ index: 3, status: "FAILED", message: "x" });
    expect(aggregator.drain(channel)?.failed).toEqual([1, 3]);

    aggregator.reopen([1, 3]);
    aggregator.requeue(1);
    aggregator.requeue(3);
    expect(aggregator.session).toMatchObject({ totalSelected: 5, successCount: 3, failedCount: 0, active: true });
    expect(aggregator.lastSummary).toBe("");

    channel.push({ index: 1, status: "SUCCESS", sizeBefore: 100, sizeAfter: 50 });
    expect(aggregator.drain(channel)).toBeNull();
    channel.push({ index: 3, status: "FAILED", message: "still broken" });
    const completion = aggregator.drain(channel);

    expect(completion?.processed).toBe(5);
    expect(completion?.failed).toEqual([3]);
    expect(aggregator.session).toMatchObject({ successCount: 4, failedCount: 1, bytesBefore: 400, bytesAfter: 200 });
  });

  it("counts carried-over failures into a reopened total", () => {
    aggregator.begin(1);
    aggregator.record({ index: 0, status: "FAILED", message: "x" });
    aggregator.drain(channel);

    aggregator.begin(1);
    aggregator.record({ index: 1, status: "FAILED", message: "y" });
    aggregator.drain(channel);

    aggregator.reopen([0, 1]);
    expect(aggregator.session).toMatchObject({ totalSelected: 2, failedCount: 0 });
  });

  it("reset clears session and failures", () => {
    aggregator.begin(1);
    aggregator.record({ index: 0, status: "FAILED", message: "x" });
    aggregator.reset();

    expect(aggregator.session).toBeNull();
    expect(aggregator.failedIndices).toEqual([]);
    expect(aggregator.active).toBe(false);
  });
});
