// yomikata/exceptions - Hand-written alignments for words the matcher gets wrong

import fs from 'fs';
import { fileURLToPath } from 'url';
import { dp } from './conn.js';
import type { ExceptionMora, ExceptionTable, MoraAlignment, ReadingClass } from './types.js';

export class ExceptionTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExceptionTableError';
  }
}

const READING_CLASSES: readonly ReadingClass[] = ['onyomi', 'kunyomi', 'jukujikun'];

function isReadingClass(value: unknown): value is ReadingClass {
  return READING_CLASSES.some((readingClass) => readingClass === value);
}

/**
 * Keys are `word_furigana`; the word never contains an underscore.
 */
export function splitExceptionKey(key: string): { word: string; furigana: string } | null {
  const separator = key.indexOf('_');
  if (separator <= 0 || separator === key.length - 1) return null;
  return { word: key.slice(0, separator), furigana: key.slice(separator + 1) };
}

export function exceptionKey(word: string, furigana: string): string {
  return `${word}_${furigana}`;
}

/**
 * Validate a parsed exception file. Every entry must carry one reading per
 * character of its word.
 */
export function parseExceptionTable(raw: unknown, origin = 'exception table'): Map<string, ExceptionMora[]> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ExceptionTableError(`${origin}: expected an object keyed by word_furigana`);
  }

  const table = new Map<string, ExceptionMora[]>();
  for (const [key, value] of Object.entries(raw)) {
    const parts = splitExceptionKey(key);
    if (!parts) {
      throw new ExceptionTableError(`${origin}: malformed key "${key}"`);
    }
    if (!Array.isArray(value)) {
      throw new ExceptionTableError(`${origin}: entry "${key}" is not an array`);
    }

    const entries: ExceptionMora[] = [];
    for (const item of value) {
      if (typeof item !== 'object' || item === null) {
        throw new ExceptionTableError(`${origin}: entry "${key}" has a non-object item`);
      }
      const type: unknown = 'type' in item ? item.type : undefined;
      const mora: unknown = 'mora' in item ? item.mora : undefined;
      if (!isReadingClass(type) || typeof mora !== 'string' || !mora) {
        throw new ExceptionTableError(`${origin}: entry "${key}" needs a reading type and mora on every item`);
      }
      entries.push({ type, mora });
    }

    const length = [...parts.word].length;
    if (entries.length !== length) {
      throw new ExceptionTableError(
        `${origin}: "${key}" has ${entries.length} readings for ${length} characters`
      );
    }
    if (entries.map((entry) => entry.mora).join('') !== parts.furigana) {
      throw new ExceptionTableError(`${origin}: readings of "${key}" do not spell its furigana`);
    }
    table.set(key, entries);
  }
  return table;
}

export function exceptionDataPath(): string {
  return fileURLToPath(new URL('../data/furigana-exceptions.json', import.meta.url));
}

let defaultTable: ExceptionTable | null = null;

export function getExceptionTable(): ExceptionTable {
  if (!defaultTable) {
    const raw: unknown = JSON.parse(fs.readFileSync(exceptionDataPath(), 'utf-8'));
    defaultTable = parseExceptionTable(raw, exceptionDataPath());
  }
  return defaultTable;
}

/**
 * A complete alignment taken verbatim from an exception entry.
 */
export function buildExceptionAlignment(word: string, entries: readonly ExceptionMora[]): MoraAlignment {
  const chars = [...word];
  if (chars.length !== entries.length) {
    throw new ExceptionTableError(`Exception for ${word} has ${entries.length} readings for ${chars.length} characters`);
  }

  return {
    positions: entries.map((entry, index) => ({
      kind: 'matched' as const,
      match: {
        matchedMora: entry.mora,
        dictForm: entry.mora,
        matchType: entry.type,
        variant: 'plain' as const,
        kanji: chars[index],
        okurigana: '',
        restKana: ''
      }
    })),
    moraSplit: entries.map((entry) => [entry.mora]),
    unmatchedPositions: [],
    isComplete: true,
    finalOkurigana: '',
    finalRestKana: ''
  };
}

/**
 * Look up the word with its hiragana furigana in the exception table.
 */
export function checkException(
  word: string,
  furigana: string,
  table: ExceptionTable = getExceptionTable()
): MoraAlignment | null {
  const entries = table.get(exceptionKey(word, furigana));
  if (!entries) return null;
  dp('checkException - hit', word, furigana);
  return buildExceptionAlignment(word, entries);
}
