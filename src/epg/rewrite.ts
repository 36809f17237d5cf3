import fs from 'fs';
import { rawUrl, resolvePath } from '../config';
import type { UpdaterConfig } from '../config';
import type { SourceEntry } from '../sources';
import { dbg, errorMessage, logError } from '../log';
import { readXmlFile, UnsupportedEncodingError, writeXmlFile } from './files';
import { rewriteChannelIcons } from './xmltv';
import type { ChannelIconMap, IconResolver } from './types';

// channel id -> raw url of its pooled icon, only for icons actually present on disk
export function poolResolver(groupMap: ChannelIconMap, iconPool: Record<string, string>, cfg: UpdaterConfig): IconResolver {
  return (channelId: string) => {
    const upstream = groupMap[channelId];
    if (!upstream) return undefined;
    const rel = iconPool[upstream];
    if (!rel || !fs.existsSync(resolvePath(cfg, rel))) return undefined;
    return rawUrl(cfg, rel);
  };
}

/** Points a downloaded feed's channel icons at the pool, in place. Returns false if the file could not be processed.
 * Feeds in an encoding the runtime cannot decode are left as downloaded. */
export function processEpgFile(file: string, groupMap: ChannelIconMap, iconPool: Record<string, string>, cfg: UpdaterConfig, entry: SourceEntry): boolean {
  dbg('Processing:', entry.desc);
  if (!Object.keys(groupMap).length || !Object.keys(iconPool).length) {
    dbg('  skipped: no icon map');
    return true;
  }
  try {
    const { xml, gzipped } = readXmlFile(file);
    const result = rewriteChannelIcons(xml, poolResolver(groupMap, iconPool, cfg));
    if (result.changes > 0) {
      writeXmlFile(file, result.xml, gzipped);
      dbg('  icons changed:', result.changes);
    } else {
      dbg('  no changes needed');
    }
    return true;
  } catch (e) {
    if (e instanceof UnsupportedEncodingError) {
      dbg('  skipped:', e.message);
      return true;
    }
    logError('Cannot process', entry.desc, errorMessage(e));
    return false;
  }
}
