import crypto from 'crypto';
import path from 'path';
import { ICON_POOL_DIR } from '../config';

// ".v2.png" for ".../logo.v2.png", "" when the last segment has no dot-suffix
export function urlSuffixes(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    pathname = url.split(/[?#]/)[0];
  }
  const name = path.posix.basename(pathname);
  if (!name || name.endsWith('.')) return '';
  const parts = name.replace(/^\.+/, '').split('.');
  if (parts.length < 2) return '';
  return parts.slice(1).map(p => `.${p}`).join('');
}

// Pool file for an upstream icon url, relative to the repo root and always `/`-separated
export function poolPathFor(url: string): string {
  const hash = crypto.createHash('sha1').update(url, 'utf8').digest('hex');
  return `${ICON_POOL_DIR}/${hash}${urlSuffixes(url) || '.png'}`;
}
