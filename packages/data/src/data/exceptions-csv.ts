/**
 * Exception table CSV loading
 *
 * One row per character: `word,reading,type,mora`. Rows of the same word and
 * reading must be consecutive and in character order.
 */

import fs from 'fs';
import path from 'path';
import { parse } from 'csv-parse/sync';
import { exceptionKey, parseExceptionTable, type ExceptionMora } from '@yomikata/core';

export function parseExceptionCsv(content: string, origin = 'exception csv'): Map<string, ExceptionMora[]> {
  const records: string[][] = parse(content, {
    skip_empty_lines: true,
    trim: true,
    relax_column_count: true,
    comment: '#',
    from_line: 2 // Skip header
  });

  const raw: Record<string, Array<{ type: string; mora: string }>> = {};
  records.forEach((record, index) => {
    const [word, reading, type, mora] = record;
    if (!word || !reading || !type || !mora) {
      throw new Error(`${origin}: row ${index + 2} needs word, reading, type and mora`);
    }
    const key = exceptionKey(word, reading);
    (raw[key] ??= []).push({ type, mora });
  });

  // Same checks as the bundled JSON table
  return parseExceptionTable(raw, origin);
}

export function exportExceptionJson(table: ReadonlyMap<string, readonly ExceptionMora[]>, outFile: string): void {
  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(outFile, JSON.stringify(Object.fromEntries(table), null, 2) + '\n', 'utf-8');
  console.log(`✓ Wrote ${table.size} exceptions to ${outFile}`);
}
