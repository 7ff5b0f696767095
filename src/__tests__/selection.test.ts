import { describe, it, expect } from "vitest";
import { Selection, displayStatus, visibleEntries } from "../selection.js";

const entries = ["a.png", "b.png", "c.png"].map((name, index) => ({
  index,
  path: `/photos/${name}`,
  name,
  ext: ".png",
}));

describe("Selection", () => {
  it("toggles indices in and out", () => {
    const selection = new Selection();
    selection.toggle(2);
    selection.toggle(0);
    expect(selection.sorted()).toEqual([0, 2]);

    selection.toggle(2);
    expect(selection.sorted()).toEqual([0]);
  });

  it("selects all and replaces", () => {
    const selection = new Selection();
    selection.selectAll(entries);
    expect(selection.size).toBe(3);

    selection.replace([2, 1]);
    expect(selection.sorted()).toEqual([1, 2]);
  });

  it("reset also drops the failed filter", () => {
    const selection = new Selection();
    selection.toggle(1);
    selection.showOnlyFailed = true;
    selection.reset();

    expect(selection.size).toBe(0);
    expect(selection.showOnlyFailed).toBe(false);
  });
});

describe("visibleEntries", () => {
  it("shows everything without the filter", () => {
    expect(visibleEntries(entries, new Selection(), [1]).map((e) => e.name)).toEqual(["a.png", "b.png", "c.png"]);
  });

  it("shows only failed entries with the filter", () => {
    const selection = new Selection();
    selection.showOnlyFailed = true;
    expect(visibleEntries(entries, selection, [0, 2, 9]).map((e) => e.name)).toEqual(["a.png", "c.png"]);
  });
});

describe("displayStatus", () => {
  it("shows a selected pending file as SELECTED", () => {
    const record = { status: "PENDING" as const, message: "", infoStr: "" };
    expect(displayStatus(record, true)).toBe("SELECTED");
    expect(displayStatus(record, false)).toBe("PENDING");
  });

  it("keeps other statuses when selected", () => {
    expect(displayStatus({ status: "SUCCESS", message: "", infoStr: "" }, true)).toBe("SUCCESS");
  });

  it("shows a missing record as FAILED", () => {
    expect(displayStatus(undefined, false)).toBe("FAILED");
  });
});
