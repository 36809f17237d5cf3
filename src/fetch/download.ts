import fs from 'fs';
import path from 'path';
import crypto from 'crypto';
import { pipeline } from 'stream/promises';
import nodeFetch from 'node-fetch';
import type { RequestInit, Response } from 'node-fetch';
import type { SourceEntry } from '../sources';
import { dbg, errorMessage, logError } from '../log';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type DownloadOk = { entry: SourceEntry; ok: true; sizeMb: number; tempPath: string };
export type DownloadFailed = { entry: SourceEntry; ok: false; error: string };
export type DownloadResult = DownloadOk | DownloadFailed;

export type IconStatus = 'downloaded' | 'skipped' | 'failed';

export type DownloadOptions = { fetch?: FetchLike; timeoutMs: number };

const MB = 1024 * 1024;

export function toMb(bytes: number): number {
  return Math.round((bytes / MB) * 100) / 100;
}

async function saveBody(res: Response, file: string): Promise<void> {
  await pipeline(res.body, fs.createWriteStream(file));
}

function removeQuietly(file: string) {
  try {
    fs.rmSync(file, { force: true });
  } catch (e) {
    logError('Cannot remove', file, errorMessage(e));
  }
}

export async function downloadEpg(entry: SourceEntry, dataDir: string, opts: DownloadOptions): Promise<DownloadResult> {
  const fetch = opts.fetch || nodeFetch;
  const tempPath = path.join(dataDir, `tmp_${crypto.randomBytes(4).toString('hex')}`);
  try {
    dbg('Downloading EPG:', entry.desc);
    const res = await fetch(entry.url, { timeout: opts.timeoutMs });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    await saveBody(res, tempPath);
    const size = fs.statSync(tempPath).size;
    if (size === 0) throw new Error('empty response');
    const sizeMb = toMb(size);
    dbg('EPG downloaded:', entry.desc, `(${sizeMb} MB)`);
    return { entry, ok: true, sizeMb, tempPath };
  } catch (e) {
    const error = `EPG download failed: ${errorMessage(e)}`;
    logError(entry.desc, error);
    removeQuietly(tempPath);
    return { entry, ok: false, error };
  }
}

export async function downloadIcon(url: string, savePath: string, opts: DownloadOptions): Promise<IconStatus> {
  if (fs.existsSync(savePath) && fs.statSync(savePath).size > 0) return 'skipped';
  const fetch = opts.fetch || nodeFetch;
  try {
    fs.mkdirSync(path.dirname(savePath), { recursive: true });
    const res = await fetch(url, { timeout: opts.timeoutMs });
    if (!res.ok) throw new Error(`HTTP ${res.status}`);
    await saveBody(res, savePath);
    return 'downloaded';
  } catch (e) {
    dbg('Icon failed:', url, errorMessage(e));
    removeQuietly(savePath);
    return 'failed';
  }
}
