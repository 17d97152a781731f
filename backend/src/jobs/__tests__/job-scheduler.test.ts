/**
 * Job Scheduler Tests
 */

import { describe, test, expect, vi, afterEach } from "vitest";
import type { BriefingFeature } from "@study-brief/shared";
import { createDefaultConfig } from "../../app-config.js";
import { DEFER_MS, JobScheduler, toCronExpression } from "../job-scheduler.js";
import type { JobOutcome } from "../job-runner.js";

function skipped(feature: BriefingFeature): JobOutcome {
  return { status: "skipped", feature, reason: "test" };
}

/**
 * Runner whose runs stay open until released.
 */
function controlledRunner() {
  const started: BriefingFeature[] = [];
  const releases = new Map<BriefingFeature, () => void>();
  const runJob = vi.fn((feature: BriefingFeature) => {
    started.push(feature);
    return new Promise<JobOutcome>((resolve) => {
      releases.set(feature, () => resolve(skipped(feature)));
    });
  });
  const release = async (feature: BriefingFeature) => {
    releases.get(feature)?.();
    releases.delete(feature);
    // let execute() reach its finally block
    for (let i = 0; i < 5; i++) {
      await Promise.resolve();
    }
  };
  return { runJob, started, release };
}

let scheduler: JobScheduler | null = null;

afterEach(() => {
  scheduler?.stop();
  scheduler = null;
  vi.useRealTimers();
});

describe("toCronExpression", () => {
  test("builds minute hour * * day-of-week", () => {
    expect(toCronExpression({ dayOfWeek: "mon-fri", hour: 9, minute: 5 })).toBe("5 9 * * mon-fri");
  });
});

describe("JobScheduler lifecycle", () => {
  test("registers one cron job per schedule entry", () => {
    const config = createDefaultConfig();
    config.schedule.news = [
      { dayOfWeek: "mon-fri", hour: 9, minute: 0 },
      { dayOfWeek: "sat", hour: 10, minute: 30 },
    ];
    scheduler = new JobScheduler({ runJob: (feature) => Promise.resolve(skipped(feature)) });

    scheduler.start(config);

    expect(scheduler.scheduledJobCount).toBe(3);
    const next = scheduler.nextRuns();
    expect(next).toHaveLength(3);
    expect(next[0]?.getTime()).toBeLessThanOrEqual(next[2]?.getTime() ?? 0);
  });

  test("reload replaces the schedule and stop clears it", () => {
    scheduler = new JobScheduler({ runJob: (feature) => Promise.resolve(skipped(feature)) });
    scheduler.start(createDefaultConfig());
    expect(scheduler.scheduledJobCount).toBe(2);

    const config = createDefaultConfig();
    config.schedule.quiz = [];
    scheduler.reload(config);
    expect(scheduler.scheduledJobCount).toBe(1);

    scheduler.stop();
    expect(scheduler.scheduledJobCount).toBe(0);
    expect(scheduler.nextRuns()).toEqual([]);
  });
});

describe("JobScheduler triggers", () => {
  test("drops a trigger for a feature that is already running", async () => {
    const { runJob, started, release } = controlledRunner();
    scheduler = new JobScheduler({ runJob });

    scheduler.trigger("news");
    scheduler.trigger("news");

    expect(started).toEqual(["news"]);
    expect(scheduler.isRunning("news")).toBe(true);

    await release("news");
    expect(scheduler.isRunning("news")).toBe(false);
  });

  test("defers a trigger while the other feature runs", async () => {
    vi.useFakeTimers();
    const { runJob, started, release } = controlledRunner();
    scheduler = new JobScheduler({ runJob });

    scheduler.trigger("news");
    scheduler.trigger("quiz");
    expect(started).toEqual(["news"]);

    // still running at the first retry: deferred again
    await vi.advanceTimersByTimeAsync(DEFER_MS);
    expect(started).toEqual(["news"]);

    await release("news");
    await vi.advanceTimersByTimeAsync(DEFER_MS);
    expect(started).toEqual(["news", "quiz"]);
  });

  test("keeps one deferred trigger per feature", async () => {
    vi.useFakeTimers();
    let releaseNews: () => void = () => {};
    const started: BriefingFeature[] = [];
    scheduler = new JobScheduler({
      runJob: (feature) => {
        started.push(feature);
        if (feature === "quiz") {
          return Promise.resolve(skipped(feature));
        }
        return new Promise<JobOutcome>((resolve) => {
          releaseNews = () => resolve(skipped(feature));
        });
      },
      deferMs: 10_000,
    });

    scheduler.trigger("news");
    scheduler.trigger("quiz");
    await vi.advanceTimersByTimeAsync(1000);
    scheduler.trigger("quiz");
    await vi.advanceTimersByTimeAsync(1000);
    scheduler.trigger("quiz");

    releaseNews();
    await vi.advanceTimersByTimeAsync(20_000);

    expect(started).toEqual(["news", "quiz"]);
  });

  test("stop cancels deferred triggers", async () => {
    vi.useFakeTimers();
    const { runJob, started, release } = controlledRunner();
    scheduler = new JobScheduler({ runJob, deferMs: 1000 });

    scheduler.trigger("quiz");
    scheduler.trigger("news");
    scheduler.stop();
    await release("quiz");
    await vi.advanceTimersByTimeAsync(5000);

    expect(started).toEqual(["quiz"]);
  });

  test("a crashing run is logged and frees the feature", async () => {
    scheduler = new JobScheduler({ runJob: () => Promise.reject(new Error("boom")) });

    expect(await scheduler.runNow(["news"])).toEqual([null]);
    expect(scheduler.isRunning("news")).toBe(false);
  });
});

describe("JobScheduler.runNow", () => {
  test("runs features one after another", async () => {
    const order: string[] = [];
    scheduler = new JobScheduler({
      runJob: async (feature) => {
        order.push(`start ${feature}`);
        await Promise.resolve();
        order.push(`end ${feature}`);
        return skipped(feature);
      },
    });

    const outcomes = await scheduler.runNow(["news", "quiz"]);

    expect(order).toEqual(["start news", "end news", "start quiz", "end quiz"]);
    expect(outcomes).toEqual([skipped("news"), skipped("quiz")]);
  });

  test("yields null for a feature that is already running", async () => {
    const { runJob, release } = controlledRunner();
    scheduler = new JobScheduler({ runJob });

    scheduler.trigger("news");
    const outcomes = await scheduler.runNow(["news"]);
    await release("news");

    expect(outcomes).toEqual([null]);
  });
});
