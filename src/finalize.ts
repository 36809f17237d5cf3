import fs from 'fs';
import path from 'path';
import { DATA_DIR, rawUrl, resolvePath } from './config';
import type { UpdaterConfig } from './config';
import type { DownloadFailed, DownloadResult } from './fetch/download';
import { isGzipped } from './epg/files';
import type { SourceEntry } from './sources';
import { errorMessage } from './log';

export type PublishedResult = { entry: SourceEntry; ok: true; sizeMb: number; path: string; rawUrl: string };
export type FinalResult = PublishedResult | DownloadFailed;

function splitSuffixes(name: string): { stem: string; suffixes: string } {
  const dot = name.indexOf('.', 1);
  if (dot < 0) return { stem: name, suffixes: '' };
  return { stem: name.slice(0, dot), suffixes: name.slice(dot) };
}

// Last path segment of the source url; extension added from the payload when missing
export function baseFileName(sourceUrl: string, gzipped: boolean): string {
  let pathname: string;
  try {
    pathname = new URL(sourceUrl).pathname;
  } catch {
    pathname = sourceUrl.split(/[?#]/)[0];
  }
  const name = path.posix.basename(pathname) || 'epg';
  if (path.posix.extname(name)) return name;
  return `${name}${gzipped ? '.xml.gz' : '.xml'}`;
}

// guide.xml.gz, guide-1.xml.gz, guide-2.xml.gz, ...
export function uniqueName(name: string, used: Set<string>): string {
  let proposed = name;
  let counter = 1;
  const { stem, suffixes } = splitSuffixes(name);
  while (used.has(proposed)) {
    proposed = `${stem}-${counter}${suffixes}`;
    counter++;
  }
  used.add(proposed);
  return proposed;
}

/**
 * Moves temp downloads to their published names under data/.
 * `results` holds one download per sources.json entry, in file order; a url listed twice
 * is published twice.
 */
export function finalizeResults(results: readonly DownloadResult[], cfg: UpdaterConfig): FinalResult[] {
  const used = new Set<string>();
  const out: FinalResult[] = [];

  for (const res of results) {
    if (!res.ok) {
      out.push(res);
      continue;
    }
    const name = uniqueName(baseFileName(res.entry.url, isGzipped(res.tempPath)), used);
    const rel = `${DATA_DIR}/${name}`;
    try {
      fs.renameSync(res.tempPath, resolvePath(cfg, rel));
      out.push({ entry: res.entry, ok: true, sizeMb: res.sizeMb, path: rel, rawUrl: rawUrl(cfg, rel) });
    } catch (e) {
      out.push({ entry: res.entry, ok: false, error: `Cannot move file: ${errorMessage(e)}` });
    }
  }
  return out;
}
