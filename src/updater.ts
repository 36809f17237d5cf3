import fs from 'fs';
import path from 'path';
import { DATA_DIR, ICONS_MAP_FILE, README_FILE, SOURCES_FILE, resolvePath } from './config';
import type { JobContext } from './context';
import { downloadEpg } from './fetch/download';
import { processEpgFile } from './epg/rewrite';
import { finalizeResults } from './finalize';
import type { FinalResult } from './finalize';
import { buildIconData, groupMapFor, loadIconData } from './icons/iconMap';
import type { IconData } from './icons/iconMap';
import { mapLimit } from './limit';
import { dbg, errorMessage, logError } from './log';
import { writeReadme } from './readme';
import { readSources } from './sources';

export type UpdateOptions = { fullUpdate: boolean };

// Empties a directory (creating it when missing) without removing the directory itself
export function clearDirectory(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
    return;
  }
  for (const name of fs.readdirSync(dir)) {
    const item = path.join(dir, name);
    try {
      fs.rmSync(item, { recursive: true, force: true });
    } catch (e) {
      logError('Cannot remove', item, errorMessage(e));
    }
  }
}

/**
 * One run of the mirror: download every source, (re)build or load the icon map, point
 * channel icons at the pool, publish under data/ and regenerate the README.
 *
 * Per-source failures end up in the returned results; config and sources.json problems throw.
 */
export async function runUpdate(opts: UpdateOptions, ctx: JobContext): Promise<FinalResult[]> {
  dbg(`Starting EPG update for ${ctx.owner}/${ctx.repo}`);
  const { sources, notes } = readSources(resolvePath(ctx, SOURCES_FILE));

  const dataDir = resolvePath(ctx, DATA_DIR);
  clearDirectory(dataDir);
  const downloads = await mapLimit(sources, ctx.maxWorkers, entry =>
    downloadEpg(entry, dataDir, { fetch: ctx.fetch, timeoutMs: ctx.requestTimeoutMs }));

  let iconData: IconData | null;
  if (opts.fullUpdate) {
    dbg('Mode: full update');
    iconData = await buildIconData(downloads, ctx);
  } else {
    dbg('Mode: daily update');
    iconData = loadIconData(resolvePath(ctx, ICONS_MAP_FILE));
  }

  if (iconData) {
    for (const res of downloads) {
      if (!res.ok) continue;
      processEpgFile(res.tempPath, groupMapFor(iconData, res.entry.url), iconData.icon_pool, ctx, res.entry);
    }
  } else {
    dbg('No icon data, icon rewrite skipped');
  }

  const results = finalizeResults(downloads, ctx);
  writeReadme(resolvePath(ctx, README_FILE), results, notes);
  dbg('README updated');
  dbg('Update finished:', results.filter(r => r.ok).length, 'of', results.length, 'sources published');
  return results;
}
