import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, expect, it } from 'vitest';
import { parseSources, readSources } from './sources';

describe('parseSources', () => {
  it('reads sources and notes', () => {
    const parsed = parseSources(JSON.stringify({
      notes: 'Mirror notes',
      sources: [{ url: ' https://feeds.test/a.xml ', desc: 'A' }],
    }));
    expect(parsed).toEqual({ notes: 'Mirror notes', sources: [{ url: 'https://feeds.test/a.xml', desc: 'A' }] });
  });

  it('defaults missing fields', () => {
    expect(parseSources('{}')).toEqual({ sources: [], notes: '' });
  });

  it('rejects entries without a url', () => {
    expect(() => parseSources('{"sources":[{"desc":"A"}]}')).toThrow('sources[0]: "url" is required');
  });

  it('rejects entries without a description', () => {
    expect(() => parseSources('{"sources":[{"url":"https://feeds.test/a.xml"}]}')).toThrow('sources[0]: "desc" is required');
  });
});

describe('readSources', () => {
  it('names the file it could not read', () => {
    const file = path.join(os.tmpdir(), 'epg-mirror-missing', 'sources.json');
    expect(() => readSources(file)).toThrow(`Cannot read ${file}`);
  });

  it('reads a file from disk', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'epg-sources-'));
    const file = path.join(dir, 'sources.json');
    fs.writeFileSync(file, '{"sources":[{"url":"https://feeds.test/a.xml","desc":"A"}]}');
    expect(readSources(file).sources).toHaveLength(1);
    fs.rmSync(dir, { recursive: true, force: true });
  });
});
