import { DateTime } from 'luxon';

export const DAILY_CRON = '0 0 * * *';
export const MONTHLY_FULL_CRON = '0 1 1 * *';
export const FULL_UPDATE_FLAG = '--full-update';

export type UpdateType = 'daily' | 'full';

export type TriggerInfo = {
  eventName: string; // schedule, workflow_dispatch, ...
  updateType?: string; // workflow_dispatch input
  schedule?: string; // cron expression that fired, when the runner reports it
  now?: DateTime;
};

export type UpdateMode = {
  fullUpdate: boolean;
  modeFlag: string;
  commitMessage: string;
};

function isMonthlySlot(now: DateTime): boolean {
  const t = now.toUTC();
  return t.day === 1 && t.hour === 1 && t.minute === 0;
}

export function resolveUpdateMode(trigger: TriggerInfo): UpdateMode {
  const now = (trigger.now || DateTime.utc()).toUTC();
  const date = now.toFormat('yyyy-MM-dd');
  if (trigger.eventName === 'schedule') {
    const cron = (trigger.schedule || '').trim();
    if (cron ? cron === MONTHLY_FULL_CRON : isMonthlySlot(now)) {
      return { fullUpdate: true, modeFlag: FULL_UPDATE_FLAG, commitMessage: `Auto-update (monthly, full): ${date}` };
    }
  } else if (trigger.eventName === 'workflow_dispatch' && trigger.updateType === 'full') {
    return { fullUpdate: true, modeFlag: FULL_UPDATE_FLAG, commitMessage: `Manual full update: ${date}` };
  }
  return { fullUpdate: false, modeFlag: '', commitMessage: `Auto-update (daily): ${date}` };
}

// Lines for $GITHUB_OUTPUT
export function formatGithubOutput(mode: UpdateMode): string {
  return `mode_flag=${mode.modeFlag}\ncommit_message=${mode.commitMessage}\n`;
}
