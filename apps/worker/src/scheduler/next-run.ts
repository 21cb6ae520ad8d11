import { Cron } from 'croner';
import { ok, err, type Result } from '@mailpilot/utils';
import { SchedulerErrorCode, type JobTrigger, type SchedulerError } from './types.js';

const invalidTrigger = (message: string, trigger: JobTrigger): SchedulerError => ({
  code: SchedulerErrorCode.INVALID_TRIGGER,
  message,
  details: { trigger },
});

/**
 * Check a trigger once, up front, so the scheduler never meets a bad one later.
 */
export function validateTrigger(trigger: JobTrigger): Result<void, SchedulerError> {
  if (trigger.kind === 'interval') {
    if (!Number.isFinite(trigger.everyMs) || trigger.everyMs <= 0) {
      return err(invalidTrigger(`Interval must be a positive number of ms, got ${trigger.everyMs}`, trigger));
    }
    return ok(undefined);
  }

  try {
    // Without a callback croner only parses; nothing is scheduled
    new Cron(trigger.expression, trigger.timezone ? { timezone: trigger.timezone } : {});
    return ok(undefined);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return err(invalidTrigger(`Invalid cron expression '${trigger.expression}': ${reason}`, trigger));
  }
}

// First fire time strictly after `from`; null when a cron pattern never fires again
export function nextRunAfter(trigger: JobTrigger, from: Date): Date | null {
  if (trigger.kind === 'interval') {
    return new Date(from.getTime() + trigger.everyMs);
  }
  const cron = new Cron(trigger.expression, trigger.timezone ? { timezone: trigger.timezone } : {});
  return cron.nextRun(from);
}
