import fs from 'fs';
import path from 'path';
import { ICONS_MAP_FILE, ICON_POOL_DIR, resolvePath } from '../config';
import type { JobContext } from '../context';
import { downloadIcon } from '../fetch/download';
import type { DownloadOk, DownloadResult, IconStatus } from '../fetch/download';
import { readXmlFile } from '../epg/files';
import { extractChannelIcons, iconSignature } from '../epg/xmltv';
import type { ChannelIconMap } from '../epg/types';
import { mapLimit } from '../limit';
import { dbg, errorMessage, logError } from '../log';
import { poolPathFor } from './pool';

export interface IconGroup {
  icon_map: ChannelIconMap;
}

export interface IconData {
  // upstream icon url -> pool path relative to the repo root
  icon_pool: Record<string, string>;
  // icon signature -> channel icons shared by every source with that signature
  groups: Record<string, IconGroup>;
  // source url -> signature (null: source carries no icons)
  source_to_group: Record<string, string | null>;
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

function stringRecord(v: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (!isRecord(v)) return out;
  for (const [k, val] of Object.entries(v)) if (typeof val === 'string') out[k] = val;
  return out;
}

export function parseIconData(raw: string): IconData {
  const j: unknown = JSON.parse(raw);
  if (!isRecord(j)) throw new Error('expected a JSON object');
  const groups: Record<string, IconGroup> = {};
  if (isRecord(j.groups)) {
    for (const [sig, g] of Object.entries(j.groups)) {
      groups[sig] = { icon_map: stringRecord(isRecord(g) ? g.icon_map : undefined) };
    }
  }
  const sourceToGroup: Record<string, string | null> = {};
  if (isRecord(j.source_to_group)) {
    for (const [url, sig] of Object.entries(j.source_to_group)) {
      sourceToGroup[url] = typeof sig === 'string' ? sig : null;
    }
  }
  return { icon_pool: stringRecord(j.icon_pool), groups, source_to_group: sourceToGroup };
}

export function loadIconData(file: string): IconData | null {
  if (!fs.existsSync(file)) {
    dbg('Icon map not found:', file);
    return null;
  }
  try {
    const data = parseIconData(fs.readFileSync(file, 'utf8'));
    dbg('Icon map loaded with', Object.keys(data.icon_pool).length, 'icons');
    return data;
  } catch (e) {
    logError('Cannot load icon map', file, errorMessage(e));
    return null;
  }
}

export function saveIconData(file: string, data: IconData) {
  fs.writeFileSync(file, JSON.stringify(data, null, 2), 'utf8');
}

export function groupMapFor(data: IconData, sourceUrl: string): ChannelIconMap {
  const sig = data.source_to_group[sourceUrl];
  if (!sig) return {};
  return data.groups[sig]?.icon_map ?? {};
}

// Sources sharing the exact same icon url set share one icon map
export function groupBySignature(results: readonly DownloadResult[]): Map<string | null, DownloadOk[]> {
  const groups = new Map<string | null, DownloadOk[]>();
  for (const res of results) {
    if (!res.ok) continue;
    dbg('Analysing:', res.entry.desc);
    let sig: string | null = null;
    try {
      sig = iconSignature(readXmlFile(res.tempPath).xml);
    } catch (e) {
      logError('Cannot build signature for', res.entry.desc, errorMessage(e));
    }
    const bucket = groups.get(sig);
    if (bucket) bucket.push(res);
    else groups.set(sig, [res]);
  }
  return groups;
}

// Removes pool files no url in `keep` points at
export function prunePool(poolDir: string, keep: Iterable<string>): number {
  if (!fs.existsSync(poolDir)) return 0;
  const wanted = new Set<string>();
  for (const rel of keep) wanted.add(path.posix.basename(rel));
  let removed = 0;
  for (const name of fs.readdirSync(poolDir)) {
    if (wanted.has(name)) continue;
    fs.rmSync(path.join(poolDir, name), { recursive: true, force: true });
    removed++;
  }
  return removed;
}

export async function downloadPool(pool: Record<string, string>, ctx: JobContext): Promise<Record<IconStatus, number>> {
  const counts: Record<IconStatus, number> = { downloaded: 0, skipped: 0, failed: 0 };
  const entries = Object.entries(pool);
  const total = entries.length;
  let done = 0;
  await mapLimit(entries, ctx.maxWorkers, async ([url, rel]) => {
    const status = await downloadIcon(url, resolvePath(ctx, rel), { fetch: ctx.fetch, timeoutMs: ctx.iconTimeoutMs });
    counts[status]++;
    done++;
    if (done % 100 === 0 || done === total) {
      dbg(`Icons ${done}/${total} | new: ${counts.downloaded} | skipped: ${counts.skipped} | failed: ${counts.failed}`);
    }
  });
  return counts;
}

/**
 * Full update: rebuilds icons_map.json from freshly downloaded sources and brings the
 * pool in line with it. Cached pool files that are still referenced are reused.
 */
export async function buildIconData(results: readonly DownloadResult[], ctx: JobContext): Promise<IconData> {
  const groups = groupBySignature(results);
  dbg('Found', groups.size, 'source groups');

  const data: IconData = { icon_pool: {}, groups: {}, source_to_group: {} };
  const urls = new Set<string>();

  for (const [sig, members] of groups) {
    if (sig === null) {
      for (const res of members) data.source_to_group[res.entry.url] = null;
      continue;
    }
    let iconMap: ChannelIconMap;
    try {
      iconMap = extractChannelIcons(readXmlFile(members[0].tempPath).xml);
    } catch (e) {
      logError('Cannot parse', members[0].entry.desc, errorMessage(e));
      continue;
    }
    for (const url of Object.values(iconMap)) urls.add(url);
    data.groups[sig] = { icon_map: iconMap };
    for (const res of members) data.source_to_group[res.entry.url] = sig;
    dbg(`Group ${sig.slice(0, 8)}: ${Object.keys(iconMap).length} channel icons`);
  }

  for (const url of Array.from(urls).sort()) data.icon_pool[url] = poolPathFor(url);

  const poolDir = resolvePath(ctx, ICON_POOL_DIR);
  const removed = prunePool(poolDir, Object.values(data.icon_pool));
  if (removed) dbg('Removed', removed, 'stale pool files');

  if (urls.size) {
    dbg('Icons to fetch or check:', urls.size);
    await downloadPool(data.icon_pool, ctx);
  }

  saveIconData(resolvePath(ctx, ICONS_MAP_FILE), data);
  dbg('Icon map saved');
  return data;
}
