import fs from 'fs';
import { TextDecoder } from 'util';
import zlib from 'zlib';
import type { XmlFile } from './types';

function hasGzipMagic(buf: Buffer): boolean {
  return buf.length >= 2 && buf[0] === 0x1f && buf[1] === 0x8b;
}

export function isGzipped(file: string): boolean {
  let fd: number | undefined;
  try {
    fd = fs.openSync(file, 'r');
    const head = Buffer.alloc(2);
    const n = fs.readSync(fd, head, 0, 2, 0);
    return n === 2 && hasGzipMagic(head);
  } catch {
    return false;
  } finally {
    if (fd !== undefined) fs.closeSync(fd);
  }
}

export class UnsupportedEncodingError extends Error {
  constructor(readonly encoding: string) {
    super(`Unsupported encoding: ${encoding}`);
    this.name = 'UnsupportedEncodingError';
  }
}

const DECLARATION_RE = /^(?:\u00EF\u00BB\u00BF)?\s*<\?xml\s[^>]*?\bencoding\s*=\s*["']([A-Za-z][A-Za-z0-9._-]*)["']/;

/** Encoding named by the XML declaration, or utf-8 when there is none. */
export function declaredEncoding(buf: Buffer): string {
  // the declaration is ASCII in every encoding a feed can use, so a latin1 view is enough to find it
  const head = buf.subarray(0, 256).toString('latin1');
  const m = DECLARATION_RE.exec(head);
  return m ? m[1].toLowerCase() : 'utf-8';
}

function decoderFor(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding);
  } catch (e) {
    if (e instanceof RangeError) throw new UnsupportedEncodingError(encoding);
    throw e;
  }
}

export function readXmlFile(file: string): XmlFile {
  const buf = fs.readFileSync(file);
  const gzipped = hasGzipMagic(buf);
  const raw = gzipped ? zlib.gunzipSync(buf) : buf;
  const encoding = declaredEncoding(raw);
  // TextDecoder drops a leading BOM
  const xml = decoderFor(encoding).decode(raw);
  return { xml, gzipped, encoding };
}

// gzip header carries mtime 0, so identical XML gives identical bytes between runs
export function writeXmlFile(file: string, xml: string, gzipped: boolean) {
  const buf = Buffer.from(xml, 'utf8');
  fs.writeFileSync(file, gzipped ? zlib.gzipSync(buf, { level: 9 }) : buf);
}
