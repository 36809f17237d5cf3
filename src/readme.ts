import fs from 'fs';
import { DateTime } from 'luxon';
import type { FinalResult } from './finalize';

export function renderReadme(results: readonly FinalResult[], notes: string, now: DateTime = DateTime.utc()): string {
  const lines: string[] = notes ? [notes, '\n---'] : [];
  lines.push(`\n# 🔄 Updated: ${now.toUTC().toFormat('yyyy-MM-dd HH:mm')} UTC\n`);
  results.forEach((r, i) => {
    lines.push(`**${i + 1}. ${r.entry.desc}**\n`);
    if (r.ok) {
      lines.push(`**Size:** ${r.sizeMb} MB`, '', '**Link:**', `\`${r.rawUrl}\``, '\n---');
    } else {
      lines.push('**Status:** ❌ Error', `\`${r.error}\``, '\n---');
    }
  });
  return lines.join('\n');
}

export function writeReadme(file: string, results: readonly FinalResult[], notes: string, now?: DateTime) {
  fs.writeFileSync(file, renderReadme(results, notes, now), 'utf8');
}
