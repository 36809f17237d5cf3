import path from 'path';

export type UpdaterConfig = {
  owner: string;
  repo: string;
  branch: string; // branch the raw links point at
  root: string; // working tree the job reads and writes
  maxWorkers: number;
  requestTimeoutMs: number;
  iconTimeoutMs: number;
};

export type Env = Record<string, string | undefined>;

export const SOURCES_FILE = 'sources.json';
export const DATA_DIR = 'data';
export const ICONS_DIR = 'icons';
export const ICON_POOL_DIR = 'icons/pool';
export const ICONS_MAP_FILE = 'icons_map.json';
export const README_FILE = 'README.md';

// Paths the commit step looks at; order matches the git command line
export const TRACKED_PATHS = [`${DATA_DIR}/`, `${ICONS_DIR}/`, README_FILE, ICONS_MAP_FILE];

export function envBool(val?: string): boolean {
  if (!val) return false;
  const v = val.toLowerCase();
  return v === '1' || v === 'true' || v === 'yes' || v === 'on';
}

export function envInt(val: string | undefined, fallback: number): number {
  const n = Number((val || '').trim());
  return Number.isFinite(n) && n > 0 ? Math.floor(n) : fallback;
}

export function parseRepository(raw?: string): { owner: string; repo: string } {
  const parts = (raw || '').trim().split('/');
  if (parts.length !== 2 || !parts[0] || !parts[1]) {
    throw new Error('GITHUB_REPOSITORY is not set (expected "owner/repo")');
  }
  return { owner: parts[0], repo: parts[1] };
}

export function getUpdaterConfig(env: Env = process.env): UpdaterConfig {
  const { owner, repo } = parseRepository(env.GITHUB_REPOSITORY);
  return {
    owner,
    repo,
    branch: (env.EPG_BRANCH || 'main').trim(),
    root: path.resolve((env.EPG_ROOT || '').trim() || process.cwd()),
    maxWorkers: envInt(env.EPG_MAX_WORKERS, 25),
    requestTimeoutMs: envInt(env.EPG_REQUEST_TIMEOUT_MS, 60000),
    iconTimeoutMs: envInt(env.EPG_ICON_TIMEOUT_MS, 20000),
  };
}

// Resolve one of the fixed relative paths against the configured root
export function resolvePath(cfg: Pick<UpdaterConfig, 'root'>, rel: string): string {
  return path.join(cfg.root, ...rel.split('/'));
}

// `${owner}/${repo}/${branch}/${relPath}` on raw.githubusercontent.com; relPath is always `/`-separated
export function rawUrl(cfg: Pick<UpdaterConfig, 'owner' | 'repo' | 'branch'>, relPath: string): string {
  const clean = relPath.replace(/\\/g, '/').replace(/^\/+/, '');
  return `https://raw.githubusercontent.com/${cfg.owner}/${cfg.repo}/${cfg.branch}/${clean}`;
}
