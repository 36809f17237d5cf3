import crypto from 'crypto';
import fs from 'fs';
import path from 'path';
import zlib from 'zlib';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { clearDirectory, runUpdate } from './updater';
import { fakeFetch, tempRoot, testConfig } from './testing';
import type { FakeRoute } from './testing';

const ICON = 'https://img.test/one.png';
const GUIDE = `<tv><channel id="one"><display-name>One</display-name><icon src="${ICON}"/></channel></tv>`;
const POOL_REL = `icons/pool/${crypto.createHash('sha1').update(ICON).digest('hex')}.png`;
const REWRITTEN = [
  "<?xml version='1.0' encoding='UTF-8'?>",
  '<!DOCTYPE tv SYSTEM "https://iptvx.one/xmltv.dtd">',
  '<tv>',
  '  <channel id="one">',
  '    <display-name>One</display-name>',
  `    <icon src="https://raw.githubusercontent.com/octo/guide/main/${POOL_REL}"/>`,
  '  </channel>',
  '</tv>',
  '',
].join('\n');

const SOURCES = {
  notes: 'Test mirror',
  sources: [
    { url: 'https://feeds.test/a/guide.xml', desc: 'Plain' },
    { url: 'https://feeds.test/b/guide.xml.gz', desc: 'Gzipped' },
    { url: 'https://feeds.test/missing.xml', desc: 'Missing' },
  ],
};

const ROUTES: Record<string, FakeRoute> = {
  'https://feeds.test/a/guide.xml': { body: GUIDE },
  'https://feeds.test/b/guide.xml.gz': { body: zlib.gzipSync(GUIDE) },
  [ICON]: { body: 'PNG' },
};

describe('runUpdate', () => {
  let root: string;
  const read = (rel: string) => fs.readFileSync(path.join(root, ...rel.split('/')));

  beforeEach(() => {
    root = tempRoot();
    fs.writeFileSync(path.join(root, 'sources.json'), JSON.stringify(SOURCES));
  });
  afterEach(() => { fs.rmSync(root, { recursive: true, force: true }); });

  it('full update builds the pool and rewrites every feed', async () => {
    const results = await runUpdate({ fullUpdate: true }, { ...testConfig(root), fetch: fakeFetch(ROUTES) });

    expect(results.map(r => r.ok)).toEqual([true, true, false]);
    expect(results[0]).toMatchObject({ path: 'data/guide.xml', rawUrl: 'https://raw.githubusercontent.com/octo/guide/main/data/guide.xml' });
    expect(results[2]).toMatchObject({ ok: false, error: 'EPG download failed: HTTP 404' });

    expect(read('data/guide.xml').toString('utf8')).toBe(REWRITTEN);
    expect(zlib.gunzipSync(read('data/guide.xml.gz')).toString('utf8')).toBe(REWRITTEN);
    expect(fs.readdirSync(path.join(root, 'data')).sort()).toEqual(['guide.xml', 'guide.xml.gz']);
    expect(read(POOL_REL).toString('utf8')).toBe('PNG');

    const map = JSON.parse(read('icons_map.json').toString('utf8'));
    expect(map.icon_pool).toEqual({ [ICON]: POOL_REL });
    const sig = map.source_to_group['https://feeds.test/a/guide.xml'];
    expect(map.source_to_group['https://feeds.test/b/guide.xml.gz']).toBe(sig);
    expect(map.groups[sig]).toEqual({ icon_map: { one: ICON } });

    const readme = read('README.md').toString('utf8');
    expect(readme.startsWith('Test mirror\n\n---\n')).toBe(true);
    expect(readme).toContain('**3. Missing**\n\n**Status:** ❌ Error\n`EPG download failed: HTTP 404`');
  });

  it('daily update reuses the saved map without touching icons', async () => {
    await runUpdate({ fullUpdate: true }, { ...testConfig(root), fetch: fakeFetch(ROUTES) });

    const seen: string[] = [];
    await runUpdate({ fullUpdate: false }, { ...testConfig(root), fetch: fakeFetch(ROUTES, seen) });

    expect(seen).not.toContain(ICON);
    expect(read('data/guide.xml').toString('utf8')).toBe(REWRITTEN);
  });

  it('daily update without an icon map publishes feeds untouched', async () => {
    await runUpdate({ fullUpdate: false }, { ...testConfig(root), fetch: fakeFetch(ROUTES) });
    expect(read('data/guide.xml').toString('utf8')).toBe(GUIDE);
    expect(fs.existsSync(path.join(root, 'icons_map.json'))).toBe(false);
  });

  it('publishes a source listed twice under two names', async () => {
    const twice = { sources: [SOURCES.sources[0], { ...SOURCES.sources[0], desc: 'Plain again' }] };
    fs.writeFileSync(path.join(root, 'sources.json'), JSON.stringify(twice));

    const results = await runUpdate({ fullUpdate: false }, { ...testConfig(root), fetch: fakeFetch(ROUTES) });

    expect(results.map(r => (r.ok ? r.path : r.error))).toEqual(['data/guide.xml', 'data/guide-1.xml']);
    expect(read('data/guide-1.xml').toString('utf8')).toBe(GUIDE);
    expect(fs.readdirSync(path.join(root, 'data')).sort()).toEqual(['guide-1.xml', 'guide.xml']);
  });

  it('fails when sources.json is missing', async () => {
    fs.rmSync(path.join(root, 'sources.json'));
    await expect(runUpdate({ fullUpdate: false }, { ...testConfig(root), fetch: fakeFetch(ROUTES) })).rejects.toThrow('Cannot read');
  });
});

describe('clearDirectory', () => {
  it('empties a directory and creates a missing one', () => {
    const root = tempRoot();
    const dir = path.join(root, 'data');
    clearDirectory(dir);
    fs.mkdirSync(path.join(dir, 'nested'));
    fs.writeFileSync(path.join(dir, 'old.xml'), 'x');
    clearDirectory(dir);
    expect(fs.readdirSync(dir)).toEqual([]);
    fs.rmSync(root, { recursive: true, force: true });
  });
});
