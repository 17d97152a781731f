/**
 * Job Scheduler
 *
 * Registers one cron job per schedule entry and feature. The two features
 * never run at the same time: a trigger that fires while the other feature is
 * running is retried after DEFER_MS (a newer collision replaces the pending
 * retry), and a trigger for a feature that is already running is dropped.
 */

import { CronJob } from "cron";
import type { BriefingFeature } from "@study-brief/shared";
import type { AppConfig, ScheduleEntry } from "../app-config.js";
import { jobLog as log } from "../logger.js";
import { errorMessage } from "../file-utils.js";
import type { JobOutcome } from "./job-runner.js";

/**
 * Delay before retrying a trigger that collided with the other feature.
 */
export const DEFER_MS = 3 * 60 * 1000;

const FEATURES: readonly BriefingFeature[] = ["news", "quiz"];

export type FeatureRunner = (feature: BriefingFeature) => Promise<JobOutcome>;

export interface JobSchedulerOptions {
  runJob: FeatureRunner;
  deferMs?: number;
}

/**
 * Cron expression (minute hour * * day-of-week) for a schedule entry.
 */
export function toCronExpression(entry: ScheduleEntry): string {
  return `${entry.minute} ${entry.hour} * * ${entry.dayOfWeek}`;
}

function otherFeature(feature: BriefingFeature): BriefingFeature {
  return feature === "news" ? "quiz" : "news";
}

export class JobScheduler {
  private readonly runJob: FeatureRunner;
  private readonly deferMs: number;
  private cronJobs: CronJob[] = [];
  private readonly running = new Set<BriefingFeature>();
  /** At most one deferred trigger per feature */
  private readonly deferTimers = new Map<BriefingFeature, ReturnType<typeof setTimeout>>();

  constructor(options: JobSchedulerOptions) {
    this.runJob = options.runJob;
    this.deferMs = options.deferMs ?? DEFER_MS;
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  start(config: AppConfig): void {
    for (const feature of FEATURES) {
      for (const entry of config.schedule[feature]) {
        const expression = toCronExpression(entry);
        this.cronJobs.push(
          new CronJob(
            expression,
            () => this.trigger(feature),
            null, // onComplete
            true // start
          )
        );
        log.info(`Scheduled ${feature}: ${expression}`);
      }
    }
  }

  stop(): void {
    for (const job of this.cronJobs) {
      void job.stop();
    }
    this.cronJobs = [];
    for (const timer of this.deferTimers.values()) {
      clearTimeout(timer);
    }
    this.deferTimers.clear();
  }

  /**
   * Replace every cron job with the schedule from `config`.
   */
  reload(config: AppConfig): void {
    this.stop();
    this.start(config);
    log.info("Schedule reloaded");
  }

  get scheduledJobCount(): number {
    return this.cronJobs.length;
  }

  /**
   * Next fire time of each cron job, soonest first.
   */
  nextRuns(): Date[] {
    return this.cronJobs
      .map((job) => job.nextDate().toJSDate())
      .sort((a, b) => a.getTime() - b.getTime());
  }

  isRunning(feature: BriefingFeature): boolean {
    return this.running.has(feature);
  }

  // ---------------------------------------------------------------------------
  // Triggers
  // ---------------------------------------------------------------------------

  /**
   * Handle a scheduled trigger.
   */
  trigger(feature: BriefingFeature): void {
    if (this.running.has(feature)) {
      log.warn(`${feature} is already running, trigger ignored`);
      return;
    }

    const other = otherFeature(feature);
    if (this.running.has(other)) {
      log.info(`${other} is running, deferring ${feature} by ${this.deferMs / 1000}s`);
      const previous = this.deferTimers.get(feature);
      if (previous !== undefined) {
        clearTimeout(previous);
      }
      const timer = setTimeout(() => {
        this.deferTimers.delete(feature);
        this.trigger(feature);
      }, this.deferMs);
      this.deferTimers.set(feature, timer);
      return;
    }

    void this.execute(feature);
  }

  /**
   * Run features now, one after another. A feature that is already running
   * is skipped and yields null.
   */
  async runNow(features: readonly BriefingFeature[]): Promise<Array<JobOutcome | null>> {
    const outcomes: Array<JobOutcome | null> = [];
    for (const feature of features) {
      log.info(`Manual run: ${feature}`);
      outcomes.push(await this.execute(feature));
    }
    return outcomes;
  }

  private async execute(feature: BriefingFeature): Promise<JobOutcome | null> {
    if (this.running.has(feature)) {
      log.warn(`${feature} is already running`);
      return null;
    }

    this.running.add(feature);
    try {
      const outcome = await this.runJob(feature);
      if (outcome.status === "skipped") {
        log.info(`${feature} skipped: ${outcome.reason}`);
      } else if (outcome.status === "failed") {
        log.error(`${feature} failed: ${outcome.error}`);
      }
      return outcome;
    } catch (error) {
      log.error(`${feature} run crashed: ${errorMessage(error)}`);
      return null;
    } finally {
      this.running.delete(feature);
    }
  }
}
