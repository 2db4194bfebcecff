import { afterEach, describe, it, expect, vi } from "vitest";

import { TaskConflictError } from "../../../../src/services/tasks/registry.js";
import { ScrapeScheduler } from "../../../../src/services/tasks/scheduler.js";

import type { TaskKind, TaskTrigger } from "../../../../src/types/index.js";

type Start = (kind: TaskKind, trigger?: TaskTrigger) => Promise<number>;

describe("services/tasks/scheduler", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start every configured kind as scheduled", async () => {
    const start = vi.fn<Start>(async (kind) => (kind === "organizations" ? 1 : 2));
    const scheduler = new ScrapeScheduler(
      { start },
      { intervalMinutes: 60, kinds: ["organizations", "competitions"] }
    );

    expect(await scheduler.tick()).toEqual([1, 2]);
    expect(start.mock.calls).toEqual([
      ["organizations", "scheduled"],
      ["competitions", "scheduled"],
    ]);
  });

  it("should skip kinds that are still running", async () => {
    const start = vi.fn<Start>(async (kind) => {
      if (kind === "organizations") {
        throw new TaskConflictError(kind, 4);
      }
      return 5;
    });
    const scheduler = new ScrapeScheduler(
      { start },
      { intervalMinutes: 60, kinds: ["organizations", "profiles-all"] }
    );

    expect(await scheduler.tick()).toEqual([5]);
  });

  it("should propagate other start failures", async () => {
    const start = vi.fn<Start>(async () => {
      throw new Error("database locked");
    });
    const scheduler = new ScrapeScheduler(
      { start },
      { intervalMinutes: 60, kinds: ["organizations"] }
    );

    await expect(scheduler.tick()).rejects.toThrow("database locked");
  });

  it("should tick on the interval until stopped", async () => {
    vi.useFakeTimers();
    const start = vi.fn<Start>(async () => 1);
    const scheduler = new ScrapeScheduler(
      { start },
      { intervalMinutes: 2, kinds: ["competitions"] }
    );

    scheduler.start();
    expect(scheduler.running).toBe(true);
    await vi.advanceTimersByTimeAsync(2 * 60_000);
    await vi.advanceTimersByTimeAsync(2 * 60_000);
    scheduler.stop();
    await vi.advanceTimersByTimeAsync(2 * 60_000);

    expect(start).toHaveBeenCalledTimes(2);
    expect(scheduler.running).toBe(false);
  });
});
