import { createChildLogger } from '../lib/logger.js';
import { crashedCycleReport } from '../workflows/cycle-report.js';
import type { CycleReport, CycleTrigger, Notifier } from '../workflows/types.js';

const log = createChildLogger('cycle-runner');

/** What holds the runner: a reply cycle, or a preview that posts nothing. */
export type RunnerActivity = CycleTrigger | 'preview';

export type RunnerState =
  | { status: 'idle' }
  | { status: 'running'; trigger: RunnerActivity; startedAt: Date };

export interface RunnerBusy {
  accepted: false;
  reason: 'cycle_in_progress';
  runningSince: Date;
  runningTrigger: RunnerActivity;
}

export type RunResult<T> = { accepted: true; startedAt: Date; done: Promise<T> } | RunnerBusy;

export type TriggerResult = RunResult<CycleReport>;

export type CycleFn = (trigger: CycleTrigger) => Promise<CycleReport>;

export interface CycleRunnerOptions {
  /** Receives the report of a cycle that crashed before it could send its own. */
  notifier?: Notifier;
}

/**
 * Owns the idle/running state shared by the timer, the manual trigger and
 * the preview. At most one of them runs at a time; anything that arrives
 * while one is running is turned away, not queued.
 */
export class CycleRunner {
  private state: RunnerState = { status: 'idle' };
  private inflight: Promise<unknown> | null = null;
  private last: CycleReport | null = null;

  constructor(
    private readonly runCycle: CycleFn,
    private readonly options: CycleRunnerOptions = {},
  ) {}

  get current(): RunnerState {
    return this.state;
  }

  get lastReport(): CycleReport | null {
    return this.last;
  }

  trigger(trigger: CycleTrigger): TriggerResult {
    return this.runExclusive(trigger, (startedAt) => this.execute(trigger, startedAt));
  }

  /**
   * Run a task that must not overlap a cycle. Its errors reach the caller
   * through `done`; it leaves `lastReport` alone.
   */
  preview<T>(task: () => Promise<T>): RunResult<T> {
    return this.runExclusive('preview', async () => {
      try {
        return await task();
      } finally {
        this.release();
      }
    });
  }

  /** Resolves once nothing is running. */
  async whenIdle(): Promise<void> {
    if (this.inflight) {
      await this.inflight.catch(() => undefined);
    }
  }

  private runExclusive<T>(
    activity: RunnerActivity,
    start: (startedAt: Date) => Promise<T>,
  ): RunResult<T> {
    if (this.state.status === 'running') {
      log.warn(
        { trigger: activity, runningTrigger: this.state.trigger, runningSince: this.state.startedAt },
        'Review reply cycle still running, ignoring trigger',
      );
      return {
        accepted: false,
        reason: 'cycle_in_progress',
        runningSince: this.state.startedAt,
        runningTrigger: this.state.trigger,
      };
    }

    const startedAt = new Date();
    this.state = { status: 'running', trigger: activity, startedAt };
    const done = start(startedAt);
    this.inflight = done;

    return { accepted: true, startedAt, done };
  }

  private release(): void {
    this.state = { status: 'idle' };
    this.inflight = null;
  }

  private async execute(trigger: CycleTrigger, startedAt: Date): Promise<CycleReport> {
    let report: CycleReport;
    try {
      report = await this.runCycle(trigger);
    } catch (err) {
      log.error({ err, trigger }, 'Review reply cycle crashed');
      report = crashedCycleReport(trigger, startedAt, err);
      await this.notifyCrash(report);
    } finally {
      this.release();
    }

    this.last = report;
    return report;
  }

  private async notifyCrash(report: CycleReport): Promise<void> {
    if (!this.options.notifier) return;
    try {
      await this.options.notifier.notify(report);
    } catch (err) {
      log.error({ err, trigger: report.trigger }, 'Failed to deliver crashed cycle report');
    }
  }
}
