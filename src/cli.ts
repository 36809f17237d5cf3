import fs from 'fs';
import { Command, CommanderError } from 'commander';
import { getUpdaterConfig } from './config';
import type { Env } from './config';
import { commitChanges, createGitRunner } from './git';
import { errorMessage, logError } from './log';
import { formatGithubOutput, resolveUpdateMode } from './mode';
import { startScheduler } from './scheduler';
import { runUpdate } from './updater';

interface UpdateOptions {
  fullUpdate?: boolean;
  commit?: boolean;
  push: boolean;
  message?: string;
}

interface CommitOptions {
  message: string;
  push: boolean;
}

interface PlanOptions {
  event?: string;
  updateType?: string;
  schedule?: string;
}

function buildProgram(env: Env): Command {
  const program = new Command();
  program
    .name('epg-mirror')
    .description('Mirror XMLTV feeds and pool their channel icons')
    .exitOverride();

  program
    .command('update', { isDefault: true })
    .description('download every source, rewrite icons, publish under data/')
    .option('--full-update', 'rebuild icons_map.json and the icon pool')
    .option('--commit', 'commit and push the result')
    .option('--no-push', 'commit without pushing')
    .option('--message <text>', 'commit message')
    .allowExcessArguments(false)
    .action(async (opts: UpdateOptions) => {
      const fullUpdate = opts.fullUpdate === true;
      const cfg = getUpdaterConfig(env);
      await runUpdate({ fullUpdate }, cfg);
      if (!opts.commit) return;
      const message = opts.message
        || resolveUpdateMode({ eventName: 'workflow_dispatch', updateType: fullUpdate ? 'full' : 'daily' }).commitMessage;
      commitChanges(createGitRunner(cfg.root), message, { push: opts.push });
    });

  program
    .command('commit')
    .description('commit tracked outputs if any changed')
    .requiredOption('--message <text>', 'commit message')
    .option('--no-push', 'commit without pushing')
    .allowExcessArguments(false)
    .action((opts: CommitOptions) => {
      const cfg = getUpdaterConfig(env);
      commitChanges(createGitRunner(cfg.root), opts.message, { push: opts.push });
    });

  program
    .command('plan')
    .description('print mode_flag and commit_message for the workflow')
    .option('--event <name>', 'trigger event, defaults to $GITHUB_EVENT_NAME')
    .option('--update-type <type>', 'daily or full, for manual runs')
    .option('--schedule <cron>', 'cron expression of a scheduled run')
    .allowExcessArguments(false)
    .action((opts: PlanOptions) => {
      const mode = resolveUpdateMode({
        eventName: opts.event || env.GITHUB_EVENT_NAME || 'workflow_dispatch',
        updateType: opts.updateType || env.EPG_UPDATE_TYPE,
        schedule: opts.schedule || env.EPG_SCHEDULE,
      });
      const out = formatGithubOutput(mode);
      process.stdout.write(out);
      if (env.GITHUB_OUTPUT) fs.appendFileSync(env.GITHUB_OUTPUT, out, 'utf8');
    });

  program
    .command('schedule')
    .description('run daily and monthly updates in-process on UTC cron')
    .allowExcessArguments(false)
    .action(() => {
      const cfg = getUpdaterConfig(env);
      const git = createGitRunner(cfg.root);
      startScheduler(async mode => {
        await runUpdate({ fullUpdate: mode.fullUpdate }, cfg);
        commitChanges(git, mode.commitMessage);
      });
    });

  return program;
}

export async function main(argv: string[], env: Env = process.env): Promise<number> {
  try {
    await buildProgram(env).parseAsync(argv, { from: 'user' });
    return 0;
  } catch (e) {
    // commander has already printed its own usage errors
    if (e instanceof CommanderError) return e.exitCode;
    logError(errorMessage(e));
    return 1;
  }
}
