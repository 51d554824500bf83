import { beforeEach, describe, expect, it } from "vitest";
import { DatabaseDirtyTracker } from "../../src/database-dirty-tracker";

describe("DatabaseDirtyTracker", () => {
  let tracker: DatabaseDirtyTracker;

  beforeEach(() => {
    tracker = new DatabaseDirtyTracker({
      id: 1,
      title: "Draft",
      tags: ["a"],
    });
  });

  it("should start without changes", () => {
    expect(tracker.hasChanges()).toBe(false);
    expect(tracker.getDirtyColumns()).toEqual([]);
  });

  describe("mergeChanges()", () => {
    it("should mark changed columns dirty", () => {
      tracker.mergeChanges({ title: "Final" });

      expect(tracker.getDirtyColumns()).toEqual(["title"]);
      expect(tracker.isDirty("title")).toBe(true);
      expect(tracker.original("title")).toBe("Draft");
    });

    it("should not mark a column whose value is unchanged", () => {
      tracker.mergeChanges({ title: "Draft", tags: ["a"] });

      expect(tracker.hasChanges()).toBe(false);
    });

    it("should clear the flag when the original value comes back", () => {
      tracker.mergeChanges({ title: "Final" });
      tracker.mergeChanges({ title: "Draft" });

      expect(tracker.isDirty("title")).toBe(false);
    });

    it("should report old and new values", () => {
      tracker.mergeChanges({ title: "Final", userId: 3 });

      expect(tracker.getDirtyColumnsWithValues()).toEqual({
        title: { oldValue: "Draft", newValue: "Final" },
        userId: { oldValue: undefined, newValue: 3 },
      });
    });

    it("should not be affected by later mutation of the merged array", () => {
      const tags = ["a", "b"];
      tracker.mergeChanges({ tags });
      tags.pop();

      expect(tracker.getDirtyColumnsWithValues().tags).toEqual({
        oldValue: ["a"],
        newValue: ["a", "b"],
      });
    });
  });

  describe("unset()", () => {
    it("should record removed columns", () => {
      tracker.unset("title");

      expect(tracker.getRemovedColumns()).toEqual(["title"]);
      expect(tracker.hasChanges()).toBe(true);
    });

    it("should forget the removal when the column is set again", () => {
      tracker.unset(["title"]);
      tracker.mergeChanges({ title: "Draft" });

      expect(tracker.getRemovedColumns()).toEqual([]);
      expect(tracker.hasChanges()).toBe(false);
    });
  });

  describe("syncOriginal()", () => {
    it("should accept values as the new baseline", () => {
      tracker.mergeChanges({ title: "Final" });
      tracker.syncOriginal({ title: "Final" });

      expect(tracker.isDirty("title")).toBe(false);
      expect(tracker.original("title")).toBe("Final");
    });
  });

  describe("replaceCurrentData()", () => {
    it("should compare the whole replacement against the baseline", () => {
      tracker.replaceCurrentData({ id: 1, title: "Final" });

      expect(tracker.getDirtyColumns()).toEqual(["title", "tags"]);
      expect(tracker.getRemovedColumns()).toEqual(["tags"]);
    });
  });

  describe("reset()", () => {
    it("should take a new snapshot and forget every change", () => {
      tracker.mergeChanges({ title: "Final" });
      tracker.unset("tags");
      tracker.reset({ id: 1, title: "Final" });

      expect(tracker.hasChanges()).toBe(false);
      expect(tracker.original("title")).toBe("Final");
      expect(tracker.original("tags")).toBeUndefined();
    });
  });
});
