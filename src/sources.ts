import fs from 'fs';

export type SourceEntry = { url: string; desc: string };
export type SourcesFile = { sources: SourceEntry[]; notes: string };

function isRecord(v: unknown): v is Record<string, unknown> {
  return !!v && typeof v === 'object' && !Array.isArray(v);
}

export function parseSources(raw: string): SourcesFile {
  const j: unknown = JSON.parse(raw);
  if (!isRecord(j)) throw new Error('expected a JSON object');
  const list = j.sources ?? [];
  if (!Array.isArray(list)) throw new Error('"sources" must be an array');
  const sources = list.map((item: unknown, i: number): SourceEntry => {
    if (!isRecord(item) || typeof item.url !== 'string' || !item.url.trim()) {
      throw new Error(`sources[${i}]: "url" is required`);
    }
    if (typeof item.desc !== 'string' || !item.desc.trim()) {
      throw new Error(`sources[${i}]: "desc" is required`);
    }
    return { url: item.url.trim(), desc: item.desc };
  });
  const notes = typeof j.notes === 'string' ? j.notes : '';
  return { sources, notes };
}

export function readSources(file: string): SourcesFile {
  try {
    return parseSources(fs.readFileSync(file, 'utf8'));
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new Error(`Cannot read ${file}: ${msg}`);
  }
}
