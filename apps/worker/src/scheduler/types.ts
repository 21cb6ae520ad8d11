export type JobTrigger =
  | { kind: 'interval'; everyMs: number }
  // Five-field cron expression, evaluated in `timezone` or the process zone
  | { kind: 'cron'; expression: string; timezone?: string };

export interface JobContext {
  // Aborted when the scheduler stops
  signal: AbortSignal;
  // Time the run was started for
  now: Date;
}

export interface ScheduledJobDefinition {
  name: string;
  trigger: JobTrigger;
  handler: (context: JobContext) => Promise<void>;
  active: boolean;
}

export interface JobStatus {
  name: string;
  active: boolean;
  running: boolean;
  lastRunAt: Date | null;
  nextRunAt: Date | null;
  lastDurationMs: number | null;
  lastError: string | null;
  runCount: number;
  failureCount: number;
}

export const SchedulerErrorCode = {
  DUPLICATE_JOB: 'DUPLICATE_JOB',
  UNKNOWN_JOB: 'UNKNOWN_JOB',
  INVALID_TRIGGER: 'INVALID_TRIGGER',
  JOB_RUNNING: 'JOB_RUNNING',
} as const;
export type SchedulerErrorCode = (typeof SchedulerErrorCode)[keyof typeof SchedulerErrorCode];

export interface SchedulerError {
  code: SchedulerErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface JobRunResult {
  name: string;
  ok: boolean;
  durationMs: number;
  error?: string;
}
