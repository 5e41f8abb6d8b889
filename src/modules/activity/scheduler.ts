/**
 * Periodic jobs of the activity engine.
 *
 * State machine per job: idle -> waiting -> running -> waiting ... -> stopped.
 * - A tick that finds the job already running is skipped, never queued.
 * - Errors thrown by a tick are logged at the job boundary; the schedule keeps going.
 * - Timers are unref'd so they never keep the process alive on shutdown.
 */
import { toError } from "@/utils/discordErrors";
import { MAX_TIMER_DELAY_MS } from "./constants";
import type { ReportCycleOutcome, RetentionOutcome } from "./cycle";
import type { ActivityLogger } from "./types";

export type JobState = "idle" | "waiting" | "running" | "stopped";

export type TickResult<T> =
  | { status: "completed"; value: T }
  | { status: "skipped" }
  | { status: "failed"; error: Error };

export interface PeriodicJobOptions<T> {
  name: string;
  intervalMs: number;
  run: () => Promise<T>;
  logger: ActivityLogger;
}

export class PeriodicJob<T> {
  private timer: NodeJS.Timeout | null = null;
  private state: JobState = "idle";
  /** State to return to when the current tick ends. */
  private resumeState: JobState = "idle";

  constructor(private readonly options: PeriodicJobOptions<T>) {
    const { intervalMs, name } = options;
    if (!Number.isInteger(intervalMs) || intervalMs < 1 || intervalMs > MAX_TIMER_DELAY_MS) {
      throw new RangeError(
        `${name}: intervalMs must be an integer in 1..${MAX_TIMER_DELAY_MS}, got ${intervalMs}`,
      );
    }
  }

  get status(): JobState {
    return this.state;
  }

  get name(): string {
    return this.options.name;
  }

  /**
   * Waits for `ready`, runs one tick immediately, then every `intervalMs`.
   * Resolves after the first tick. Rejects only if `ready` rejects.
   */
  async start(ready: Promise<unknown>): Promise<void> {
    if (this.state !== "idle") return;
    this.state = "waiting";
    await ready;
    // stop() may have run while waiting.
    if (this.status === "stopped") return;

    this.timer = setInterval(() => {
      void this.tick();
    }, this.options.intervalMs);
    this.timer.unref();

    await this.tick();
  }

  /** Runs the job body once, unless a tick is already running or the job stopped. */
  async tick(): Promise<TickResult<T>> {
    const { logger, name } = this.options;
    if (this.state === "running") {
      logger.debug(`[activity:scheduler] ${name} still running; tick skipped`);
      return { status: "skipped" };
    }
    if (this.state === "stopped") return { status: "skipped" };

    this.resumeState = this.state;
    this.state = "running";
    try {
      const value = await this.options.run();
      return { status: "completed", value };
    } catch (error) {
      logger.error(`[activity:scheduler] ${name} failed`, error);
      return { status: "failed", error: toError(error) };
    } finally {
      if (this.state === "running") this.state = this.resumeState;
    }
  }

  stop(): void {
    if (this.timer) clearInterval(this.timer);
    this.timer = null;
    this.state = "stopped";
  }
}

export interface ActivitySchedulerOptions {
  reportIntervalMinutes: number;
  retentionIntervalHours: number;
  reportCycle: { run(): Promise<ReportCycleOutcome[]> };
  retentionCycle: { run(): Promise<RetentionOutcome> };
  logger: ActivityLogger;
}

/** Owns both jobs and their configuration; built once at startup. */
export class ActivityScheduler {
  readonly reportJob: PeriodicJob<ReportCycleOutcome[]>;
  readonly retentionJob: PeriodicJob<RetentionOutcome>;

  constructor(private readonly options: ActivitySchedulerOptions) {
    this.reportJob = new PeriodicJob({
      name: "report",
      intervalMs: options.reportIntervalMinutes * 60_000,
      run: () => options.reportCycle.run(),
      logger: options.logger,
    });
    this.retentionJob = new PeriodicJob({
      name: "retention",
      intervalMs: options.retentionIntervalHours * 3_600_000,
      run: () => options.retentionCycle.run(),
      logger: options.logger,
    });
  }

  async start(ready: Promise<unknown>): Promise<void> {
    this.options.logger.info(
      `[activity:scheduler] reports every ${this.options.reportIntervalMinutes}m, retention every ${this.options.retentionIntervalHours}h`,
    );
    await Promise.all([this.reportJob.start(ready), this.retentionJob.start(ready)]);
  }

  stop(): void {
    this.reportJob.stop();
    this.retentionJob.stop();
  }

  runReportNow(): Promise<TickResult<ReportCycleOutcome[]>> {
    return this.reportJob.tick();
  }

  runRetentionNow(): Promise<TickResult<RetentionOutcome>> {
    return this.retentionJob.tick();
  }
}
