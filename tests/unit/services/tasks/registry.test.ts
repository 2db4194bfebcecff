import { describe, it, expect } from "vitest";

import {
  TaskConflictError,
  TaskHandle,
  TaskRegistry,
  type ProgressSnapshot,
} from "../../../../src/services/tasks/registry.js";

const snapshot: ProgressSnapshot = {
  taskId: 1,
  kind: "organizations",
  trigger: "manual",
  status: "running",
  startedAt: "2024-03-01T10:00:00.000Z",
  finishedAt: null,
  totalUnits: 3,
  completedUnits: 1,
  currentUnit: "organization H004",
  counters: { organization: 1 },
  errors: [],
};

describe("services/tasks/registry", () => {
  describe("TaskRegistry", () => {
    it("should allow one running task per kind", () => {
      const registry = new TaskRegistry();
      const handle = registry.reserve("organizations");
      handle.bind(7);

      expect(() => registry.reserve("organizations")).toThrow(
        "A organizations task is already running (task 7)"
      );
      expect(registry.reserve("competitions").kind).toBe("competitions");
      expect(registry.isActive("organizations")).toBe(true);
    });

    it("should report a conflict before the task id is known", () => {
      const registry = new TaskRegistry();
      registry.reserve("profiles-all");

      let error: unknown;
      try {
        registry.reserve("profiles-all");
      } catch (caught) {
        error = caught;
      }

      expect(error).toBeInstanceOf(TaskConflictError);
      if (error instanceof TaskConflictError) {
        expect(error.activeTaskId).toBeNull();
        expect(error.message).toBe("A profiles-all task is already starting");
      }
    });

    it("should free the kind on release", () => {
      const registry = new TaskRegistry();
      const handle = registry.reserve("organizations");

      registry.release(handle);

      expect(registry.isActive("organizations")).toBe(false);
      expect(() => registry.reserve("organizations")).not.toThrow();
    });

    it("should ignore a stale handle on release", () => {
      const registry = new TaskRegistry();
      const stale = registry.reserve("organizations");
      registry.release(stale);
      const current = registry.reserve("organizations");

      registry.release(stale);

      expect(registry.list()).toEqual([current]);
    });

    it("should find handles by task id", () => {
      const registry = new TaskRegistry();
      const handle = registry.reserve("competitions");
      handle.bind(12);

      expect(registry.findByTaskId(12)).toBe(handle);
      expect(registry.findByTaskId(13)).toBeUndefined();
    });
  });

  describe("TaskHandle", () => {
    it("should publish frozen copies of the snapshot", () => {
      const handle = new TaskHandle("organizations", 10);
      const errors = ["first"];

      handle.publish({ ...snapshot, errors });
      errors.push("second");

      const published = handle.snapshot();
      expect(published?.errors).toEqual(["first"]);
      expect(Object.isFrozen(published)).toBe(true);
      expect(Object.isFrozen(published?.errors)).toBe(true);
    });

    it("should keep the newest lines and note the dropped ones", () => {
      const handle = new TaskHandle("organizations", 2);

      handle.log("one", "t1");
      handle.log("two", "t2");
      handle.log("three", "t3");
      handle.log("four", "t4");

      expect(handle.logs()).toEqual([
        { timestamp: "t1", message: "2 earlier lines dropped" },
        { timestamp: "t3", message: "three" },
        { timestamp: "t4", message: "four" },
      ]);
    });

    it("should remember cancellation", () => {
      const handle = new TaskHandle("organizations", 10);

      expect(handle.token.cancelled).toBe(false);
      handle.token.cancel();
      expect(handle.token.cancelled).toBe(true);
    });
  });
});
