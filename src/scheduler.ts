import cron from 'node-cron';
import type { ScheduledTask } from 'node-cron';
import { DAILY_CRON, MONTHLY_FULL_CRON, resolveUpdateMode } from './mode';
import type { UpdateMode } from './mode';
import { dbg, errorMessage, logError } from './log';

export type ScheduledRun = (mode: UpdateMode) => Promise<void>;

// Wraps a run so a trigger firing while the previous run is still going is dropped
export function guardOverlap(run: ScheduledRun): (schedule: string) => Promise<boolean> {
  let running = false;
  return async (schedule: string) => {
    if (running) {
      dbg('Previous run still in progress, skipping', schedule);
      return false;
    }
    running = true;
    try {
      await run(resolveUpdateMode({ eventName: 'schedule', schedule }));
      return true;
    } catch (e) {
      logError('Scheduled run failed:', errorMessage(e));
      return false;
    } finally {
      running = false;
    }
  };
}

/** Daily run at 00:00 UTC, full run at 01:00 UTC on the 1st of every month. */
export function startScheduler(run: ScheduledRun): ScheduledTask[] {
  const trigger = guardOverlap(run);
  const tasks = [DAILY_CRON, MONTHLY_FULL_CRON].map(expr =>
    cron.schedule(expr, () => { void trigger(expr); }, { timezone: 'UTC' }));
  dbg('Scheduler started:', DAILY_CRON, '(daily),', MONTHLY_FULL_CRON, '(full)');
  return tasks;
}
