import { ok, err, type Result, createLogger, toError } from '@mailpilot/utils';
import { nextRunAfter, validateTrigger } from './next-run.js';
import {
  SchedulerErrorCode,
  type JobRunResult,
  type JobStatus,
  type ScheduledJobDefinition,
  type SchedulerError,
} from './types.js';

const logger = createLogger({ service: 'scheduler' });

export interface SchedulerOptions {
  // How often the timer loop checks for due jobs
  tickMs?: number;
  now?: () => Date;
}

interface JobState {
  definition: ScheduledJobDefinition;
  nextRunAt: Date | null;
  lastRunAt: Date | null;
  lastDurationMs: number | null;
  lastError: string | null;
  runCount: number;
  failureCount: number;
  // Set while a run is in flight; a job never overlaps itself
  inFlight: Promise<JobRunResult> | null;
}

const unknownJob = (name: string): SchedulerError => ({
  code: SchedulerErrorCode.UNKNOWN_JOB,
  message: `No job named '${name}'`,
  details: { name },
});

/**
 * Runs a table of jobs on interval or cron triggers. Due times come from the
 * injected clock; missed fire times collapse into a single run.
 */
export class Scheduler {
  private readonly jobs = new Map<string, JobState>();
  private readonly tickMs: number;
  private readonly now: () => Date;
  private timer: ReturnType<typeof setInterval> | null = null;
  private controller = new AbortController();

  constructor(options: SchedulerOptions = {}) {
    this.tickMs = options.tickMs ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  addJob(definition: ScheduledJobDefinition): Result<void, SchedulerError> {
    if (this.jobs.has(definition.name)) {
      return err({
        code: SchedulerErrorCode.DUPLICATE_JOB,
        message: `Job '${definition.name}' is already scheduled`,
        details: { name: definition.name },
      });
    }
    const valid = validateTrigger(definition.trigger);
    if (!valid.ok) {
      return valid;
    }

    this.jobs.set(definition.name, {
      definition,
      nextRunAt: nextRunAfter(definition.trigger, this.now()),
      lastRunAt: null,
      lastDurationMs: null,
      lastError: null,
      runCount: 0,
      failureCount: 0,
      inFlight: null,
    });
    logger.info({ job: definition.name, trigger: definition.trigger }, 'Job scheduled');
    return ok(undefined);
  }

  // A run already in flight finishes; the job is simply not scheduled again
  removeJob(name: string): Result<void, SchedulerError> {
    if (!this.jobs.delete(name)) {
      return err(unknownJob(name));
    }
    logger.info({ job: name }, 'Job removed');
    return ok(undefined);
  }

  /**
   * Start every active job that is due at `now` and not already running.
   * Returns the names of the jobs started; their runs continue in the
   * background (see `whenIdle`).
   */
  tick(now: Date = this.now()): string[] {
    const started: string[] = [];
    for (const [name, state] of this.jobs) {
      if (!state.definition.active || !state.nextRunAt || state.nextRunAt > now) {
        continue;
      }
      if (state.inFlight) {
        logger.warn({ job: name }, 'Previous run still in progress, skipping');
        continue;
      }
      state.nextRunAt = nextRunAfter(state.definition.trigger, now);
      this.launch(state, now);
      started.push(name);
    }
    return started;
  }

  /**
   * Run a job immediately, outside its schedule. Refused while the same job
   * is running; the next scheduled time is left as it was.
   */
  async runNow(name: string): Promise<Result<JobRunResult, SchedulerError>> {
    const state = this.jobs.get(name);
    if (!state) {
      return err(unknownJob(name));
    }
    if (state.inFlight) {
      return err({
        code: SchedulerErrorCode.JOB_RUNNING,
        message: `Job '${name}' is already running`,
        details: { name },
      });
    }
    return ok(await this.launch(state, this.now()));
  }

  start(): void {
    if (this.timer !== null) {
      logger.warn('Scheduler already running');
      return;
    }
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    this.timer = setInterval(() => {
      this.tick();
    }, this.tickMs);
    logger.info({ tickMs: this.tickMs, jobs: [...this.jobs.keys()] }, 'Scheduler started');
  }

  /**
   * Stop the timer, signal running jobs to wind down and wait for them.
   */
  async stop(): Promise<void> {
    if (this.timer !== null) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.controller.abort();
    await this.whenIdle();
    logger.info('Scheduler stopped');
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  // Resolves once no job is in flight
  async whenIdle(): Promise<void> {
    const running = [...this.jobs.values()]
      .map((state) => state.inFlight)
      .filter((run): run is Promise<JobRunResult> => run !== null);
    await Promise.all(running);
  }

  getJobStatus(): JobStatus[] {
    return [...this.jobs.values()].map((state) => ({
      name: state.definition.name,
      active: state.definition.active,
      running: state.inFlight !== null,
      lastRunAt: state.lastRunAt,
      nextRunAt: state.nextRunAt,
      lastDurationMs: state.lastDurationMs,
      lastError: state.lastError,
      runCount: state.runCount,
      failureCount: state.failureCount,
    }));
  }

  private launch(state: JobState, now: Date): Promise<JobRunResult> {
    const run = this.execute(state, now).finally(() => {
      state.inFlight = null;
    });
    state.inFlight = run;
    return run;
  }

  // Never rejects: a failing handler is recorded on the job and logged
  private async execute(state: JobState, now: Date): Promise<JobRunResult> {
    const name = state.definition.name;
    const log = logger.child({ job: name });
    const startedAt = performance.now();
    state.lastRunAt = now;
    state.runCount++;

    log.info('Job started');
    try {
      await state.definition.handler({ signal: this.controller.signal, now });
      const durationMs = Math.round(performance.now() - startedAt);
      state.lastDurationMs = durationMs;
      state.lastError = null;
      log.info({ durationMs }, 'Job completed');
      return { name, ok: true, durationMs };
    } catch (error) {
      const durationMs = Math.round(performance.now() - startedAt);
      const message = toError(error).message;
      state.lastDurationMs = durationMs;
      state.lastError = message;
      state.failureCount++;
      log.error({ durationMs, error: message }, 'Job failed');
      return { name, ok: false, durationMs, error: message };
    }
  }
}
