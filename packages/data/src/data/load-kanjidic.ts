/**
 * Kanjidic2 XML Loader
 * Extracts on/kun readings from kanjidic2.xml into the JSON file used by
 * JsonKanjiSource, or into the kanji/reading tables used by PostgresKanjiSource
 */

import fs from 'fs';
import path from 'path';
import { gunzipSync } from 'zlib';
import { XMLParser } from 'fast-xml-parser';
import type postgres from 'postgres';
import { dp, type KanjiReadingData } from '@yomikata/core';
import { createKanjiTable, createReadingTable } from './schema.js';

export interface KanjidicEntry {
  literal: string;
  /** Katakana, as in the dictionary */
  onyomi: string[];
  /** Hiragana with a `.` before the okurigana */
  kunyomi: string[];
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

/**
 * Drop the `-` that marks a prefix (`お-`) or suffix (`-び`) reading.
 */
export function stripAffixMarkers(reading: string): string {
  return reading.replace(/^-+|-+$/g, '');
}

function pushUnique(list: string[], value: string): void {
  if (value && !list.includes(value)) list.push(value);
}

/**
 * Parses kanjidic2 XML content into reading entries
 */
export function parseKanjidic(content: string): KanjidicEntry[] {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '',
    textNodeName: '#text',
    trimValues: true,
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (name) => ['character', 'rmgroup', 'reading'].includes(name)
  });

  const parsed: unknown = parser.parse(content);
  const root = isNode(parsed) ? parsed.kanjidic2 : undefined;
  if (!isNode(root)) {
    throw new Error('Not a kanjidic2 document: missing <kanjidic2> root');
  }

  const entries: KanjidicEntry[] = [];
  for (const character of asArray(root.character)) {
    if (!isNode(character) || typeof character.literal !== 'string') continue;

    const entry: KanjidicEntry = { literal: character.literal, onyomi: [], kunyomi: [] };
    const readingMeaning = character.reading_meaning;
    const groups = isNode(readingMeaning) ? asArray(readingMeaning.rmgroup) : [];

    for (const group of groups) {
      if (!isNode(group)) continue;
      for (const reading of asArray(group.reading)) {
        if (!isNode(reading) || typeof reading['#text'] !== 'string') continue;
        const text = stripAffixMarkers(reading['#text']);
        if (reading.r_type === 'ja_on') {
          pushUnique(entry.onyomi, text);
        } else if (reading.r_type === 'ja_kun') {
          pushUnique(entry.kunyomi, text);
        }
      }
    }

    if (entry.onyomi.length === 0 && entry.kunyomi.length === 0) {
      dp(`parseKanjidic - no Japanese readings for ${entry.literal}`);
      continue;
    }
    entries.push(entry);
  }
  return entries;
}

/**
 * Reads kanjidic2.xml from disk, decompressing .gz files
 */
export function readKanjidicFile(xmlPath: string): KanjidicEntry[] {
  const content = xmlPath.endsWith('.gz')
    ? gunzipSync(fs.readFileSync(xmlPath)).toString('utf-8')
    : fs.readFileSync(xmlPath, 'utf-8');
  return parseKanjidic(content);
}

export function toKanjiData(entries: readonly KanjidicEntry[]): Record<string, KanjiReadingData> {
  const data: Record<string, KanjiReadingData> = {};
  for (const entry of entries) {
    data[entry.literal] = { onyomi: [...entry.onyomi], kunyomi: [...entry.kunyomi] };
  }
  return data;
}

/**
 * Writes entries as `{ "漢": { "onyomi": [...], "kunyomi": [...] } }`
 */
export function exportKanjiJson(entries: readonly KanjidicEntry[], outFile: string): void {
  fs.mkdirSync(path.dirname(outFile), { recursive: true });
  fs.writeFileSync(outFile, JSON.stringify(toKanjiData(entries), null, 2) + '\n', 'utf-8');
  console.log(`✓ Wrote ${entries.length} kanji to ${outFile}`);
}

interface ReadingRecord {
  kanji_id: number;
  type: 'ja_on' | 'ja_kun';
  text: string;
}

/**
 * Inserts entries into the kanji and reading tables in batches
 */
export async function loadKanjiToDb(
  sql: postgres.Sql,
  entries: readonly KanjidicEntry[],
  batchSize = 500
): Promise<number> {
  await createKanjiTable(sql);
  await createReadingTable(sql);

  let loaded = 0;
  for (let i = 0; i < entries.length; i += batchSize) {
    const batch = entries.slice(i, i + batchSize);

    const inserted = await sql<Array<{ id: number; text: string }>>`
      INSERT INTO kanji ${sql(batch.map((entry) => ({ text: entry.literal })))}
      ON CONFLICT (text) DO UPDATE SET text = EXCLUDED.text
      RETURNING id, text
    `;
    const textToId = new Map(inserted.map((row) => [row.text, row.id]));

    const readings: ReadingRecord[] = [];
    for (const entry of batch) {
      const kanjiId = textToId.get(entry.literal);
      if (kanjiId === undefined) continue;
      for (const text of entry.onyomi) readings.push({ kanji_id: kanjiId, type: 'ja_on', text });
      for (const text of entry.kunyomi) readings.push({ kanji_id: kanjiId, type: 'ja_kun', text });
    }

    if (textToId.size > 0) {
      await sql`DELETE FROM reading WHERE kanji_id IN ${sql([...textToId.values()])}`;
    }
    if (readings.length > 0) {
      await sql`INSERT INTO reading ${sql(readings)}`;
    }

    loaded += batch.length;
    console.log(`Loaded ${loaded} / ${entries.length} characters...`);
  }

  console.log(`✓ Loaded ${loaded} kanji characters`);
  return loaded;
}
