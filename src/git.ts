import { execFileSync } from 'child_process';
import { TRACKED_PATHS } from './config';
import { dbg } from './log';

export interface GitRunner {
  run(args: string[]): string;
}

export const BOT_NAME = 'github-actions[bot]';
export const BOT_EMAIL = 'github-actions[bot]@users.noreply.github.com';

export function createGitRunner(cwd: string): GitRunner {
  return {
    run(args: string[]): string {
      return execFileSync('git', args, { cwd, encoding: 'utf8', stdio: ['ignore', 'pipe', 'inherit'] });
    },
  };
}

// Porcelain status also lists untracked files, so a first-time data file counts as a change
export function changedPaths(git: GitRunner, paths: readonly string[] = TRACKED_PATHS): string[] {
  return paths.filter(p => git.run(['status', '--porcelain', '--', p]).trim().length > 0);
}

export type CommitOptions = { push?: boolean; paths?: readonly string[] };

/** Commits the tracked outputs in one commit. Returns false when nothing changed. */
export function commitChanges(git: GitRunner, message: string, opts: CommitOptions = {}): boolean {
  const changed = changedPaths(git, opts.paths || TRACKED_PATHS);
  if (!changed.length) {
    dbg('No changes to commit.');
    return false;
  }
  git.run(['config', 'user.name', BOT_NAME]);
  git.run(['config', 'user.email', BOT_EMAIL]);
  // -A stages removed feeds; unchanged paths stay out since an unmatched pathspec fails the add
  git.run(['add', '-A', '--', ...changed]);
  git.run(['commit', '-m', message]);
  if (opts.push !== false) git.run(['push']);
  dbg('Committed:', message);
  return true;
}
