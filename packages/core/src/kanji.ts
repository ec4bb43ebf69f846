// yomikata/kanji - Kanji reading sources (JSON file, PostgreSQL, in-memory)

import fs from 'fs';
import { fileURLToPath } from 'url';
import { LRUCache } from 'lru-cache';
import { getConnection, defineCache, dp } from './conn.js';
import { digitsToKanji } from './numbers.js';
import { isDigits, REPEATER } from './characters.js';
import type { KanjiReadingData, KanjiTable } from './types.js';

export const KANJI_DATA_ENV = 'YOMIKATA_KANJI_DATA';

export class KanjiDataError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'KanjiDataError';
  }
}

/**
 * Where kanji readings come from. A missing kanji resolves to null, never an error.
 */
export interface KanjiReadingSource {
  getReadings(kanji: string): Promise<KanjiReadingData | null>;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((item) => typeof item === 'string');
}

/**
 * Validate the parsed contents of a kanji data file:
 * `{ "漢": { "onyomi": ["カン"], "kunyomi": ["から"] }, ... }`
 */
export function parseKanjiData(raw: unknown, origin = 'kanji data'): Map<string, KanjiReadingData> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new KanjiDataError(`${origin}: expected an object keyed by kanji`);
  }

  const table = new Map<string, KanjiReadingData>();
  for (const [kanji, value] of Object.entries(raw)) {
    if (typeof value !== 'object' || value === null) {
      throw new KanjiDataError(`${origin}: entry for ${kanji} is not an object`);
    }
    const onyomi: unknown = 'onyomi' in value ? value.onyomi : [];
    const kunyomi: unknown = 'kunyomi' in value ? value.kunyomi : [];
    if (!isStringArray(onyomi) || !isStringArray(kunyomi)) {
      throw new KanjiDataError(`${origin}: readings for ${kanji} must be string arrays`);
    }
    table.set(kanji, { onyomi, kunyomi });
  }
  return table;
}

export function defaultKanjiDataPath(): string {
  const override = process.env[KANJI_DATA_ENV];
  if (override) return override;
  return fileURLToPath(new URL('../data/kanji-readings.json', import.meta.url));
}

export class MemoryKanjiSource implements KanjiReadingSource {
  private readonly table: Map<string, KanjiReadingData>;

  constructor(data: Record<string, KanjiReadingData> | Map<string, KanjiReadingData>) {
    this.table = data instanceof Map ? new Map(data) : new Map(Object.entries(data));
  }

  async getReadings(kanji: string): Promise<KanjiReadingData | null> {
    return this.table.get(kanji) ?? null;
  }

  get size(): number {
    return this.table.size;
  }
}

/**
 * Readings from a JSON file, read once on first lookup.
 */
export class JsonKanjiSource implements KanjiReadingSource {
  private readonly load: () => Promise<Map<string, KanjiReadingData>>;

  constructor(readonly filePath: string = defaultKanjiDataPath()) {
    this.load = defineCache(`kanji-json:${filePath}`, async () => {
      const content = await fs.promises.readFile(filePath, 'utf-8');
      let raw: unknown;
      try {
        raw = JSON.parse(content);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new KanjiDataError(`Invalid JSON in ${filePath}: ${message}`);
      }
      const table = parseKanjiData(raw, filePath);
      dp(`Loaded ${table.size} kanji from ${filePath}`);
      return table;
    });
  }

  async getReadings(kanji: string): Promise<KanjiReadingData | null> {
    const table = await this.load();
    return table.get(kanji) ?? null;
  }
}

/**
 * Readings from the `kanji` and `reading` tables written by the data loader.
 */
export class PostgresKanjiSource implements KanjiReadingSource {
  private readonly cache = new LRUCache<string, { data: KanjiReadingData | null }>({ max: 5000 });

  async getReadings(kanji: string): Promise<KanjiReadingData | null> {
    const cached = this.cache.get(kanji);
    if (cached) return cached.data;

    const sql = getConnection();
    const rows = await sql<Array<{ text: string; type: string }>>`
      SELECT r.text, r.type
      FROM kanji k
      INNER JOIN reading r ON r.kanji_id = k.id
      WHERE k.text = ${kanji}
      ORDER BY r.id
    `;

    const data: KanjiReadingData | null = rows.length === 0
      ? null
      : {
          onyomi: rows.filter((row) => row.type === 'ja_on').map((row) => row.text),
          kunyomi: rows.filter((row) => row.type === 'ja_kun').map((row) => row.text)
        };
    this.cache.set(kanji, { data });
    return data;
  }
}

/**
 * The dictionary key a word character is looked up under: digits by their
 * kanji numeral, everything else as is.
 */
export function kanjiLookupKey(char: string): string {
  return isDigits(char) ? digitsToKanji(char) : char;
}

/**
 * Prefetch the readings of every kanji in `word` into a read-only table,
 * so alignment can run without awaiting per character.
 */
export async function loadKanjiTable(
  source: KanjiReadingSource,
  word: string
): Promise<KanjiTable> {
  const table = new Map<string, KanjiReadingData>();
  for (const char of new Set(word)) {
    if (char === REPEATER) continue;
    const key = kanjiLookupKey(char);
    if (table.has(key)) continue;
    const data = await source.getReadings(key);
    if (data) {
      table.set(key, data);
    } else {
      dp(`loadKanjiTable - no readings for ${key}`);
    }
  }
  return table;
}
