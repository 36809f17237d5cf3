import { envBool } from './config';

// on unless EPG_DEBUG is set to something other than a true value
export function debugEnabled(val = process.env.EPG_DEBUG): boolean {
  return val === undefined || !val.trim() || envBool(val.trim());
}

export function dbg(...args: unknown[]) {
  if (debugEnabled()) console.log('[EPG]', ...args);
}

export function logError(...args: unknown[]) {
  console.error('[EPG]', ...args);
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
