import fs from 'fs';
import os from 'os';
import path from 'path';
import { Readable } from 'stream';
import { Response } from 'node-fetch';
import type { UpdaterConfig } from './config';
import type { FetchLike } from './fetch/download';

export type FakeRoute = { status?: number; body: string | Buffer };

// In-process stand-in for the network: unknown urls answer 404
export function fakeFetch(routes: Record<string, FakeRoute>, seen: string[] = []): FetchLike {
  return async (url: string) => {
    seen.push(url);
    const route = routes[url] || { status: 404, body: 'not found' };
    const body = typeof route.body === 'string' ? Buffer.from(route.body, 'utf8') : route.body;
    return new Response(Readable.from(body.length ? [body] : []), { status: route.status || 200 });
  };
}

export function tempRoot(prefix = 'epg-mirror-'): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function testConfig(root: string): UpdaterConfig {
  return { owner: 'octo', repo: 'guide', branch: 'main', root, maxWorkers: 4, requestTimeoutMs: 1000, iconTimeoutMs: 1000 };
}
