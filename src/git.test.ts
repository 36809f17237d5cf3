import { describe, expect, it } from 'vitest';
import { changedPaths, commitChanges } from './git';
import type { GitRunner } from './git';

class FakeGit implements GitRunner {
  calls: string[][] = [];
  constructor(private status: Record<string, string> = {}) {}
  run(args: string[]): string {
    this.calls.push(args);
    if (args[0] === 'status') return this.status[args[args.length - 1]] || '';
    return '';
  }
  commits(): string[][] {
    return this.calls.filter(c => c[0] === 'commit');
  }
}

describe('commitChanges', () => {
  it('does not commit when no tracked path changed', () => {
    const git = new FakeGit();
    expect(commitChanges(git, 'Auto-update (daily): 2026-03-02')).toBe(false);
    expect(git.commits()).toEqual([]);
    expect(git.calls.map(c => c[c.length - 1])).toEqual(['data/', 'icons/', 'README.md', 'icons_map.json']);
  });

  it('makes exactly one commit with the given message', () => {
    const git = new FakeGit({ 'data/': '?? data/guide.xml.gz\n', 'README.md': ' M README.md\n' });
    expect(commitChanges(git, 'Auto-update (monthly, full): 2026-03-01')).toBe(true);
    expect(git.commits()).toEqual([['commit', '-m', 'Auto-update (monthly, full): 2026-03-01']]);
    expect(git.calls).toContainEqual(['add', '-A', '--', 'data/', 'README.md']);
    expect(git.calls[git.calls.length - 1]).toEqual(['push']);
  });

  it('sets the bot identity before committing', () => {
    const git = new FakeGit({ 'icons_map.json': ' M icons_map.json\n' });
    commitChanges(git, 'msg');
    const names = git.calls.map(c => c.join(' '));
    expect(names.indexOf('config user.name github-actions[bot]')).toBeLessThan(names.indexOf('commit -m msg'));
    expect(names).toContain('config user.email github-actions[bot]@users.noreply.github.com');
  });

  it('can skip the push', () => {
    const git = new FakeGit({ 'icons/': '?? icons/pool/a.png\n' });
    commitChanges(git, 'msg', { push: false });
    expect(git.calls).not.toContainEqual(['push']);
  });
});

describe('changedPaths', () => {
  it('ignores whitespace-only status output', () => {
    expect(changedPaths(new FakeGit({ 'data/': '\n', 'README.md': ' M README.md\n' }))).toEqual(['README.md']);
  });
});
